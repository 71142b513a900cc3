import type { Word } from "./word.js";

const JUMPDEST = 0x5b;
const PUSH1 = 0x60;
const PUSH32 = 0x7f;

const cache = new WeakMap<Uint8Array, JumpDestinations>();

/**
 * Bitmap of the offsets in a code buffer that JUMP and JUMPI may target: a
 * JUMPDEST byte that is not part of a PUSH immediate.
 */
export class JumpDestinations {
  private constructor(
    private readonly bits: Uint8Array,
    readonly codeLength: number
  ) {}

  /** Scan `code` once; repeated calls for the same buffer reuse the result. */
  static analyze(code: Uint8Array): JumpDestinations {
    const cached = cache.get(code);
    if (cached) return cached;

    const bits = new Uint8Array(Math.ceil(code.length / 8));
    let pc = 0;
    while (pc < code.length) {
      const opcode = code[pc];
      if (opcode === JUMPDEST) {
        bits[pc >> 3] |= 1 << (pc & 7);
      } else if (opcode >= PUSH1 && opcode <= PUSH32) {
        pc += opcode - PUSH1 + 1;
      }
      pc++;
    }

    const result = new JumpDestinations(bits, code.length);
    cache.set(code, result);
    return result;
  }

  isValid(dest: Word): boolean {
    if (dest >= BigInt(this.codeLength)) return false;
    const offset = Number(dest);
    return (this.bits[offset >> 3] & (1 << (offset & 7))) !== 0;
  }

  /** All valid destinations, ascending. */
  toArray(): number[] {
    const offsets: number[] = [];
    for (let offset = 0; offset < this.codeLength; offset++) {
      if (this.isValid(BigInt(offset))) offsets.push(offset);
    }
    return offsets;
  }
}
