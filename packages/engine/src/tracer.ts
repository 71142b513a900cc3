import { bytesToHex } from "@ethereumjs/util";
import type { Step, StorageChange } from "@wordvm/core";
import type { StepHooks } from "./interpreter.js";
import { toHexWord } from "./word.js";

const SSTORE = 0x55;

export interface Tracer {
  hooks: StepHooks;
  /** Steps recorded so far, in execution order. */
  steps: Step[];
}

/**
 * Record every executed instruction: stack and memory as they were before it
 * ran, plus the storage writes it made.
 */
export function createTracer(): Tracer {
  const steps: Step[] = [];
  let pendingChange: StorageChange | null = null;

  const hooks: StepHooks = {
    beforeStep({ pc, operation, context }) {
      const { stack, memory, storage, address } = context;
      pendingChange = null;
      if (operation.code === SSTORE && stack.length >= 2) {
        const slot = stack.peek(0);
        pendingChange = {
          slot: toHexWord(slot),
          before: toHexWord(storage.get(address, slot)),
          after: toHexWord(stack.peek(1)),
        };
      }
      steps.push({
        pc,
        opcode: operation.code,
        mnemonic: operation.mnemonic,
        stack: stack.toArray().map(toHexWord),
        memory: bytesToHex(memory.toBytes()),
        storageChanges: [],
      });
    },
    afterStep() {
      const step = steps[steps.length - 1];
      if (pendingChange && step) {
        step.storageChanges.push(pendingChange);
      }
      pendingChange = null;
    },
  };

  return { hooks, steps };
}
