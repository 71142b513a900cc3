// Arithmetic instruction handlers. All results are reduced modulo 2^256.

import { fromSigned, toSigned, toWord, MAX_WORD } from "../word.js";
import type { Word } from "../word.js";
import { binaryOp, ternaryOp } from "./types.js";
import type { HandlerMap } from "./types.js";

export function add(a: Word, b: Word): Word {
  return toWord(a + b);
}

export function sub(a: Word, b: Word): Word {
  return toWord(a - b);
}

export function mul(a: Word, b: Word): Word {
  return toWord(a * b);
}

export function div(a: Word, b: Word): Word {
  return b === 0n ? 0n : a / b;
}

export function mod(a: Word, b: Word): Word {
  return b === 0n ? 0n : a % b;
}

/**
 * Signed division, truncating toward zero. `MIN / -1` overflows back to
 * `MIN`, which is what reducing `2^255` modulo 2^256 gives.
 */
export function sdiv(a: Word, b: Word): Word {
  if (b === 0n) return 0n;
  return fromSigned(toSigned(a) / toSigned(b));
}

/** Signed remainder; the result takes the sign of the dividend. */
export function smod(a: Word, b: Word): Word {
  if (b === 0n) return 0n;
  return fromSigned(toSigned(a) % toSigned(b));
}

export function addmod(a: Word, b: Word, n: Word): Word {
  return n === 0n ? 0n : (a + b) % n;
}

export function mulmod(a: Word, b: Word, n: Word): Word {
  return n === 0n ? 0n : (a * b) % n;
}

/** `base ** exponent mod 2^256` by square-and-multiply. */
export function exp(base: Word, exponent: Word): Word {
  let result = 1n;
  let factor = base;
  let e = exponent;
  while (e > 0n) {
    if ((e & 1n) === 1n) result = (result * factor) & MAX_WORD;
    factor = (factor * factor) & MAX_WORD;
    e >>= 1n;
  }
  return result;
}

/** Extend the sign bit of the `(b + 1)`-byte value in `x` to 256 bits. */
export function signextend(b: Word, x: Word): Word {
  if (b >= 31n) return x;
  const bits = (b + 1n) * 8n;
  return fromSigned(BigInt.asIntN(Number(bits), x));
}

export const arithmeticHandlers: HandlerMap = {
  ADD: binaryOp(add),
  MUL: binaryOp(mul),
  SUB: binaryOp(sub),
  DIV: binaryOp(div),
  SDIV: binaryOp(sdiv),
  MOD: binaryOp(mod),
  SMOD: binaryOp(smod),
  ADDMOD: ternaryOp(addmod),
  MULMOD: ternaryOp(mulmod),
  EXP: binaryOp(exp),
  SIGNEXTEND: binaryOp(signextend),
};
