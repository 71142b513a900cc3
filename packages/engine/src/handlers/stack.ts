import { bytesToWord } from "../word.js";
import type { Handler, HandlerMap } from "./types.js";

/** PUSH1..PUSH32: the immediate is right-padded with zeros past the end of code. */
export const push: Handler = (ctx, op) => {
  const start = ctx.pc + 1;
  const immediate = ctx.code.subarray(start, start + op.immediateBytes);
  ctx.stack.push(bytesToWord(immediate, op.immediateBytes));
};

export const dup: Handler = ({ stack }, op) => {
  stack.dup(op.inputNames.length);
};

export const swap: Handler = ({ stack }, op) => {
  stack.swap(op.inputNames.length - 1);
};

/** Same handler under PREFIX1..PREFIXn. */
function family(prefix: string, count: number, handler: Handler): HandlerMap {
  const entries: [string, Handler][] = [];
  for (let i = 1; i <= count; i++) entries.push([`${prefix}${i}`, handler]);
  return Object.fromEntries(entries);
}

export const stackHandlers: HandlerMap = {
  POP: ({ stack }) => {
    stack.pop();
  },
  PUSH0: ({ stack }) => {
    stack.push(0n);
  },
  ...family("PUSH", 32, push),
  ...family("DUP", 16, dup),
  ...family("SWAP", 16, swap),
};
