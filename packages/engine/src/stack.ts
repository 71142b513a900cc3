import { EvmError } from "./errors.js";
import type { Word } from "./word.js";

export const STACK_LIMIT = 1024;

/** Saved top of a stack, see `Stack.checkpoint`. */
export interface StackCheckpoint {
  base: number;
  items: Word[];
}

/** LIFO stack of words, at most `STACK_LIMIT` deep. */
export class Stack {
  private readonly items: Word[] = [];

  get length(): number {
    return this.items.length;
  }

  push(word: Word): void {
    if (this.items.length >= STACK_LIMIT) {
      throw new EvmError("stackTooDeep");
    }
    this.items.push(word);
  }

  pop(): Word {
    const word = this.items.pop();
    if (word === undefined) {
      throw new EvmError("stackUnderflow");
    }
    return word;
  }

  /** Pop `count` words, top first. Fails without popping anything. */
  popN(count: number): Word[] {
    this.require(count);
    return this.items.splice(this.items.length - count).reverse();
  }

  /** Read the word `depth` slots below the top (0 = top). */
  peek(depth = 0): Word {
    this.require(depth + 1);
    return this.items[this.items.length - 1 - depth];
  }

  /** Push a copy of the k-th word from the top (1 = top). */
  dup(k: number): void {
    const word = this.peek(k - 1);
    this.push(word);
  }

  /** Exchange the top with the word k slots below it. */
  swap(k: number): void {
    this.require(k + 1);
    const top = this.items.length - 1;
    const other = top - k;
    [this.items[top], this.items[other]] = [this.items[other], this.items[top]];
  }

  /**
   * Remember the top `count` words so that an instruction that consumes at
   * most that many and then fails can be undone with `rollback`.
   */
  checkpoint(count: number): StackCheckpoint {
    const base = Math.max(0, this.items.length - count);
    return { base, items: this.items.slice(base) };
  }

  rollback(checkpoint: StackCheckpoint): void {
    this.items.splice(checkpoint.base, Infinity, ...checkpoint.items);
  }

  /** Copy of the stack, top first. */
  toArray(): Word[] {
    return [...this.items].reverse();
  }

  private require(count: number): void {
    if (this.items.length < count) {
      throw new EvmError("stackUnderflow");
    }
  }
}
