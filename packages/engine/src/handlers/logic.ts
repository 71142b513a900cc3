// Comparison and bitwise handlers. Boolean results are pushed as 1 or 0.

import { fromBoolean, fromSigned, toSigned, MAX_WORD } from "../word.js";
import type { Word } from "../word.js";
import { binaryOp, unaryOp } from "./types.js";
import type { HandlerMap } from "./types.js";

export function byte(i: Word, x: Word): Word {
  if (i >= 32n) return 0n;
  return (x >> ((31n - i) * 8n)) & 0xffn;
}

export function shl(shift: Word, value: Word): Word {
  if (shift >= 256n) return 0n;
  return (value << shift) & MAX_WORD;
}

export function shr(shift: Word, value: Word): Word {
  if (shift >= 256n) return 0n;
  return value >> shift;
}

/** Arithmetic shift: vacated bits take the sign bit. */
export function sar(shift: Word, value: Word): Word {
  const signed = toSigned(value);
  if (shift >= 256n) return signed < 0n ? MAX_WORD : 0n;
  return fromSigned(signed >> shift);
}

export const logicHandlers: HandlerMap = {
  LT: binaryOp((a, b) => fromBoolean(a < b)),
  GT: binaryOp((a, b) => fromBoolean(a > b)),
  SLT: binaryOp((a, b) => fromBoolean(toSigned(a) < toSigned(b))),
  SGT: binaryOp((a, b) => fromBoolean(toSigned(a) > toSigned(b))),
  EQ: binaryOp((a, b) => fromBoolean(a === b)),
  ISZERO: unaryOp((a) => fromBoolean(a === 0n)),
  AND: binaryOp((a, b) => a & b),
  OR: binaryOp((a, b) => a | b),
  XOR: binaryOp((a, b) => a ^ b),
  NOT: unaryOp((a) => a ^ MAX_WORD),
  BYTE: binaryOp(byte),
  SHL: binaryOp(shl),
  SHR: binaryOp(shr),
  SAR: binaryOp(sar),
};
