// Control-flow and halting handlers.

import { EvmError } from "../errors.js";
import { toRange } from "../memory.js";
import { pushValue } from "./types.js";
import type { Handler, HandlerMap } from "./types.js";

/** Halt with the memory range named by the top two words as return data. */
function haltWithData(status: "success" | "reverted"): Handler {
  return (ctx) => {
    const [offset, size] = ctx.stack.popN(2);
    const range = toRange(offset, size);
    const data = ctx.memory.read(range.offset, range.length);
    ctx.halt({ status }, data);
  };
}

/** Default entry for every byte without an implementation. */
export const invalidInstruction: Handler = (ctx, op) => {
  const name = op.defined ? op.mnemonic : "undefined opcode";
  throw new EvmError(
    "invalidOpcode",
    `${name} (0x${op.code.toString(16).padStart(2, "0")}) at pc ${ctx.pc}`
  );
};

export const flowHandlers: HandlerMap = {
  STOP: (ctx) => {
    ctx.halt({ status: "success" });
  },
  JUMP: (ctx) => {
    ctx.jump(ctx.stack.pop());
  },
  JUMPI: (ctx) => {
    const [dest, cond] = ctx.stack.popN(2);
    if (cond !== 0n) ctx.jump(dest);
  },
  PC: pushValue((ctx) => BigInt(ctx.pc)),
  JUMPDEST: () => {},
  RETURN: haltWithData("success"),
  REVERT: haltWithData("reverted"),
  INVALID: invalidInstruction,
};
