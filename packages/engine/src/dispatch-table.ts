import { decode } from "@wordvm/core";
import { arithmeticHandlers } from "./handlers/arithmetic.js";
import { environmentHandlers } from "./handlers/environment.js";
import { flowHandlers, invalidInstruction } from "./handlers/flow.js";
import { logicHandlers } from "./handlers/logic.js";
import { memoryHandlers } from "./handlers/memory.js";
import { stackHandlers } from "./handlers/stack.js";
import type { Handler, HandlerMap } from "./handlers/types.js";

export type DispatchTable = readonly Handler[];

const handlerGroups: HandlerMap[] = [
  arithmeticHandlers,
  logicHandlers,
  environmentHandlers,
  memoryHandlers,
  flowHandlers,
  stackHandlers,
];

/**
 * Build a 256-entry table from opcode byte to handler. Bytes whose operation
 * has no implementation (undefined bytes, and catalogued opcodes such as CALL
 * or LOG0 that this engine does not run) get the invalid-instruction trap.
 */
export function buildDispatchTable(groups: HandlerMap[] = handlerGroups): DispatchTable {
  const byMnemonic = new Map<string, Handler>();
  for (const group of groups) {
    for (const [mnemonic, handler] of Object.entries(group)) {
      if (byMnemonic.has(mnemonic)) {
        throw new Error(`Duplicate handler for ${mnemonic}`);
      }
      byMnemonic.set(mnemonic, handler);
    }
  }

  return Object.freeze(
    Array.from({ length: 256 }, (_, code) => {
      const operation = decode(code);
      if (!operation.defined) return invalidInstruction;
      return byMnemonic.get(operation.mnemonic) ?? invalidInstruction;
    })
  );
}

/** Shared by every interpreter; built once when this module loads. */
export const dispatchTable: DispatchTable = buildDispatchTable();

/** Mnemonics that have a handler other than the trap. */
export function implementedMnemonics(table: DispatchTable = dispatchTable): string[] {
  const names: string[] = [];
  table.forEach((handler, code) => {
    const operation = decode(code);
    if (operation.defined && handler !== invalidInstruction) {
      names.push(operation.mnemonic);
    }
  });
  return names;
}
