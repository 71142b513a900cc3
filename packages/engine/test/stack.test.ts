import { describe, it, expect } from "vitest";
import { EvmError } from "../src/errors.js";
import { Stack, STACK_LIMIT } from "../src/stack.js";

function filled(count: number): Stack {
  const stack = new Stack();
  for (let i = 0; i < count; i++) stack.push(BigInt(i));
  return stack;
}

function failureReason(fn: () => void): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof EvmError) return error.reason;
    throw error;
  }
  return undefined;
}

describe("Stack", () => {
  it("pops in LIFO order", () => {
    const stack = filled(3);
    expect(stack.pop()).toBe(2n);
    expect(stack.pop()).toBe(1n);
    expect(stack.pop()).toBe(0n);
    expect(stack.length).toBe(0);
  });

  it("fails to pop an empty stack", () => {
    expect(failureReason(() => new Stack().pop())).toBe("stackUnderflow");
  });

  it("accepts exactly 1024 items", () => {
    const stack = filled(STACK_LIMIT);
    expect(stack.length).toBe(1024);
  });

  it("rejects a push at 1024 and leaves the stack unchanged", () => {
    const stack = filled(STACK_LIMIT);
    expect(failureReason(() => stack.push(7n))).toBe("stackTooDeep");
    expect(stack.length).toBe(1024);
    expect(stack.peek()).toBe(1023n);
  });

  it("popN returns the top first and fails atomically", () => {
    const stack = filled(3);
    expect(failureReason(() => stack.popN(4))).toBe("stackUnderflow");
    expect(stack.length).toBe(3);
    expect(stack.popN(2)).toEqual([2n, 1n]);
    expect(stack.toArray()).toEqual([0n]);
  });

  it("dup copies the k-th item", () => {
    const stack = filled(3);
    stack.dup(3);
    expect(stack.toArray()).toEqual([0n, 2n, 1n, 0n]);
  });

  it("dup fails without enough items", () => {
    const stack = filled(2);
    expect(failureReason(() => stack.dup(3))).toBe("stackUnderflow");
    expect(stack.length).toBe(2);
  });

  it("swap exchanges the top with the item k below it", () => {
    const stack = filled(4);
    stack.swap(3);
    expect(stack.toArray()).toEqual([0n, 2n, 1n, 3n]);
  });

  it("swap fails without k+1 items", () => {
    const stack = filled(2);
    expect(failureReason(() => stack.swap(2))).toBe("stackUnderflow");
    expect(stack.toArray()).toEqual([1n, 0n]);
  });

  it("rollback restores consumed items and drops pushed ones", () => {
    const stack = filled(4);
    const checkpoint = stack.checkpoint(2);
    stack.popN(2);
    stack.push(99n);
    stack.rollback(checkpoint);
    expect(stack.toArray()).toEqual([3n, 2n, 1n, 0n]);
  });
});
