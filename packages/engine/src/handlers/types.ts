import type { Operation } from "@wordvm/core";
import type { ExecutionContext } from "../context.js";
import type { Word } from "../word.js";

/**
 * Executes one instruction. Operand counts are checked by the interpreter
 * before a handler runs; a handler signals failure by throwing `EvmError`.
 */
export type Handler = (ctx: ExecutionContext, op: Operation) => void;

/** Handlers keyed by mnemonic. */
export type HandlerMap = Readonly<Record<string, Handler>>;

export function unaryOp(fn: (a: Word) => Word): Handler {
  return ({ stack }) => {
    stack.push(fn(stack.pop()));
  };
}

/** `a` is the top of the stack, `b` the word below it. */
export function binaryOp(fn: (a: Word, b: Word) => Word): Handler {
  return ({ stack }) => {
    const [a, b] = stack.popN(2);
    stack.push(fn(a, b));
  };
}

export function ternaryOp(fn: (a: Word, b: Word, c: Word) => Word): Handler {
  return ({ stack }) => {
    const [a, b, c] = stack.popN(3);
    stack.push(fn(a, b, c));
  };
}

/** Push a value read from the context. */
export function pushValue(read: (ctx: ExecutionContext) => Word): Handler {
  return (ctx) => {
    ctx.stack.push(read(ctx));
  };
}
