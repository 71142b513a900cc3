// Transaction, code and block environment handlers.

import { keccak_256 } from "@noble/hashes/sha3";
import type { ExecutionContext } from "../context.js";
import { toRange } from "../memory.js";
import { addressToWord, bytesToWord, wordToAddress, WORD_BYTES } from "../word.js";
import type { Word } from "../word.js";
import { pushValue } from "./types.js";
import type { HandlerMap } from "./types.js";

/**
 * `length` bytes of `data` starting at `offset`; positions past the end of
 * `data` read as zero.
 */
export function slicePadded(data: Uint8Array, offset: Word, length: number): Uint8Array {
  const result = new Uint8Array(length);
  if (offset < BigInt(data.length)) {
    const start = Number(offset);
    result.set(data.subarray(start, start + length));
  }
  return result;
}

/** Shared body of CALLDATACOPY, CODECOPY and EXTCODECOPY. */
function copyToMemory(
  ctx: ExecutionContext,
  source: Uint8Array,
  [destOffset, offset, size]: Word[]
): void {
  const range = toRange(destOffset, size);
  // Grow (or fail on the limit) before allocating the padded copy.
  ctx.memory.ensure(range.offset, range.length);
  ctx.memory.write(range.offset, slicePadded(source, offset, range.length));
}

export const environmentHandlers: HandlerMap = {
  ADDRESS: pushValue((ctx) => addressToWord(ctx.address)),
  ORIGIN: pushValue((ctx) => addressToWord(ctx.transaction.sender)),
  CALLER: pushValue((ctx) => addressToWord(ctx.transaction.sender)),
  CALLVALUE: pushValue((ctx) => ctx.transaction.value),
  BALANCE: (ctx) => {
    const address = wordToAddress(ctx.stack.pop());
    ctx.stack.push(ctx.storage.balanceOf(address));
  },
  SELFBALANCE: pushValue((ctx) => ctx.storage.balanceOf(ctx.address)),
  CALLDATALOAD: (ctx) => {
    const i = ctx.stack.pop();
    ctx.stack.push(bytesToWord(slicePadded(ctx.transaction.data, i, WORD_BYTES)));
  },
  CALLDATASIZE: pushValue((ctx) => BigInt(ctx.transaction.data.length)),
  CALLDATACOPY: (ctx) => {
    copyToMemory(ctx, ctx.transaction.data, ctx.stack.popN(3));
  },
  CODESIZE: pushValue((ctx) => BigInt(ctx.code.length)),
  CODECOPY: (ctx) => {
    copyToMemory(ctx, ctx.code, ctx.stack.popN(3));
  },
  EXTCODESIZE: (ctx) => {
    const address = wordToAddress(ctx.stack.pop());
    ctx.stack.push(BigInt(ctx.storage.codeOf(address).length));
  },
  EXTCODECOPY: (ctx) => {
    const [address, ...operands] = ctx.stack.popN(4);
    copyToMemory(ctx, ctx.storage.codeOf(wordToAddress(address)), operands);
  },
  EXTCODEHASH: (ctx) => {
    const address = wordToAddress(ctx.stack.pop());
    ctx.stack.push(
      ctx.storage.has(address)
        ? bytesToWord(keccak_256(ctx.storage.codeOf(address)))
        : 0n
    );
  },

  TIMESTAMP: pushValue((ctx) => ctx.block.timestamp),
  NUMBER: pushValue((ctx) => ctx.block.number),
  GASLIMIT: pushValue((ctx) => ctx.block.gasLimit),
  CHAINID: pushValue((ctx) => ctx.block.chainId),
  BASEFEE: pushValue((ctx) => ctx.block.baseFee),
  COINBASE: pushValue((ctx) => addressToWord(ctx.block.coinbase)),
  PREVRANDAO: pushValue((ctx) => ctx.block.prevRandao),
};
