import { EvmError } from "./errors.js";
import { toOffset, WORD_BYTES, wordToBytes, bytesToWord } from "./word.js";
import type { Word } from "./word.js";

export const DEFAULT_MEMORY_LIMIT = 32 * 1024 * 1024;

/** A `[offset, offset + length)` byte range in memory. */
export interface MemoryRange {
  offset: number;
  length: number;
}

/**
 * Convert an (offset, size) operand pair into a range. A zero size never
 * touches memory, whatever the offset.
 */
export function toRange(offset: Word, size: Word): MemoryRange {
  if (size === 0n) return { offset: 0, length: 0 };
  return { offset: toOffset(offset), length: toOffset(size) };
}

function ceilToWord(size: number): number {
  return Math.ceil(size / WORD_BYTES) * WORD_BYTES;
}

/**
 * Byte-addressable, zero-initialised memory. Its size is always a multiple of
 * 32 and only grows.
 */
export class Memory {
  private data = new Uint8Array(0);

  constructor(private readonly limit = DEFAULT_MEMORY_LIMIT) {}

  get size(): number {
    return this.data.length;
  }

  /** Grow to cover `[offset, offset + length)`. */
  ensure(offset: number, length: number): void {
    if (length === 0) return;
    const end = offset + length;
    if (end <= this.data.length) return;

    const newSize = ceilToWord(end);
    if (newSize > this.limit) {
      throw new EvmError(
        "outOfResource",
        `memory expansion to ${newSize} bytes exceeds the ${this.limit} byte limit`
      );
    }
    const grown = new Uint8Array(newSize);
    grown.set(this.data);
    this.data = grown;
  }

  storeWord(offset: number, word: Word): void {
    this.write(offset, wordToBytes(word));
  }

  loadWord(offset: number): Word {
    return bytesToWord(this.read(offset, WORD_BYTES));
  }

  storeByte(offset: number, byte: number): void {
    this.ensure(offset, 1);
    this.data[offset] = byte & 0xff;
  }

  loadByte(offset: number): number {
    this.ensure(offset, 1);
    return this.data[offset];
  }

  write(offset: number, bytes: Uint8Array): void {
    this.ensure(offset, bytes.length);
    this.data.set(bytes, offset);
  }

  /** Copy of `[offset, offset + length)`. */
  read(offset: number, length: number): Uint8Array {
    this.ensure(offset, length);
    return this.data.slice(offset, offset + length);
  }

  /** Overlap-safe copy of `length` bytes from `src` to `dst`. */
  copy(src: number, dst: number, length: number): void {
    if (length === 0) return;
    this.ensure(Math.max(src, dst), length);
    this.data.copyWithin(dst, src, src + length);
  }

  /** Copy of the whole buffer. */
  toBytes(): Uint8Array {
    return this.data.slice();
  }
}
