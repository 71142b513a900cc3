import {
  Address,
  bigIntToBytes,
  bytesToBigInt,
  setLengthLeft,
  setLengthRight,
} from "@ethereumjs/util";
import { EvmError } from "./errors.js";

/** A 256-bit unsigned integer in `[0, 2^256)`. */
export type Word = bigint;

export const WORD_BYTES = 32;
export const WORD_BITS = 256n;
export const MAX_WORD: Word = (1n << WORD_BITS) - 1n;
/** Smallest signed value, `-2^255`, in its unsigned encoding. */
export const MIN_SIGNED: Word = 1n << 255n;

const ADDRESS_MASK = (1n << 160n) - 1n;

/** Reduce any integer modulo 2^256. */
export function toWord(value: bigint): Word {
  return BigInt.asUintN(256, value);
}

/** Two's-complement reading of a word. */
export function toSigned(word: Word): bigint {
  return BigInt.asIntN(256, word);
}

export function fromSigned(value: bigint): Word {
  return BigInt.asUintN(256, value);
}

export function fromBoolean(condition: boolean): Word {
  return condition ? 1n : 0n;
}

/** 32-byte big-endian encoding. */
export function wordToBytes(word: Word): Uint8Array {
  return setLengthLeft(bigIntToBytes(word), WORD_BYTES);
}

/** Big-endian decoding; inputs shorter than 32 bytes are right-padded. */
export function bytesToWord(bytes: Uint8Array, width = bytes.length): Word {
  return bytesToBigInt(setLengthRight(bytes, width));
}

export function wordToAddress(word: Word): Address {
  return new Address(setLengthLeft(bigIntToBytes(word & ADDRESS_MASK), 20));
}

export function addressToWord(address: Address): Word {
  return bytesToBigInt(address.bytes);
}

/**
 * Convert a word used as a memory offset or size into a JS number. Values that
 * cannot be indexed fail with `outOfResource`.
 */
export function toOffset(word: Word): number {
  if (word > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new EvmError("outOfResource", `offset ${word} is out of range`);
  }
  return Number(word);
}

export function toHexWord(word: Word): string {
  return "0x" + word.toString(16);
}
