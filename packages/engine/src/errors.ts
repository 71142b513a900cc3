import type { FailureReason } from "@wordvm/core";

const defaultMessages: Record<FailureReason, string> = {
  stackUnderflow: "stack underflow",
  stackTooDeep: "stack limit reached",
  invalidOpcode: "invalid opcode",
  invalidJumpDestination: "invalid jump destination",
  outOfResource: "out of resource",
};

/**
 * A classified execution failure. Thrown by primitives, handlers and step
 * hooks; the interpreter turns it into a `failure` exit status.
 */
export class EvmError extends Error {
  readonly reason: FailureReason;

  constructor(reason: FailureReason, message?: string) {
    super(message ?? defaultMessages[reason]);
    this.name = "EvmError";
    this.reason = reason;
  }
}

export function isEvmError(error: unknown): error is EvmError {
  return error instanceof EvmError;
}
