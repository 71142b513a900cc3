// Memory, storage and hashing handlers.

import { keccak_256 } from "@noble/hashes/sha3";
import { toRange } from "../memory.js";
import { bytesToWord, toOffset } from "../word.js";
import { pushValue } from "./types.js";
import type { HandlerMap } from "./types.js";

export const memoryHandlers: HandlerMap = {
  MLOAD: (ctx) => {
    const offset = toOffset(ctx.stack.pop());
    ctx.stack.push(ctx.memory.loadWord(offset));
  },
  MSTORE: (ctx) => {
    const [offset, value] = ctx.stack.popN(2);
    ctx.memory.storeWord(toOffset(offset), value);
  },
  MSTORE8: (ctx) => {
    const [offset, value] = ctx.stack.popN(2);
    ctx.memory.storeByte(toOffset(offset), Number(value & 0xffn));
  },
  MSIZE: pushValue((ctx) => BigInt(ctx.memory.size)),
  MCOPY: (ctx) => {
    const [destOffset, offset, size] = ctx.stack.popN(3);
    if (size === 0n) return;
    ctx.memory.copy(toOffset(offset), toOffset(destOffset), toOffset(size));
  },
  KECCAK256: (ctx) => {
    const [offset, size] = ctx.stack.popN(2);
    const range = toRange(offset, size);
    ctx.stack.push(bytesToWord(keccak_256(ctx.memory.read(range.offset, range.length))));
  },

  SLOAD: (ctx) => {
    const key = ctx.stack.pop();
    ctx.stack.push(ctx.storage.get(ctx.address, key));
  },
  SSTORE: (ctx) => {
    const [key, value] = ctx.stack.popN(2);
    ctx.storage.set(ctx.address, key, value);
  },
};
