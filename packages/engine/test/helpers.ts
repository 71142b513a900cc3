import { createAddressFromString, hexToBytes } from "@ethereumjs/util";
import { assemble } from "@wordvm/core";
import { pino } from "pino";
import { DEFAULT_CALLER, DEFAULT_TO, defaultBlockEnv } from "../src/config.js";
import { ExecutionContext } from "../src/context.js";
import type { ExecutionContextInit, Transaction } from "../src/context.js";
import { Interpreter } from "../src/interpreter.js";
import type { ExecutionResult, InterpreterOptions } from "../src/interpreter.js";

export const silentLogger = pino({ level: "silent" });

export const CALLER = createAddressFromString(DEFAULT_CALLER);
export const CONTRACT = createAddressFromString(DEFAULT_TO);

export function code(source: string): Uint8Array {
  const hex = assemble(source);
  return hexToBytes(`0x${hex.slice(2)}`);
}

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    sender: CALLER,
    recipient: CONTRACT,
    value: 0n,
    data: new Uint8Array(0),
    ...overrides,
  };
}

export function makeContext(
  program: string | Uint8Array,
  init: Partial<ExecutionContextInit> = {}
): ExecutionContext {
  return new ExecutionContext({
    code: typeof program === "string" ? code(program) : program,
    transaction: makeTransaction(),
    block: defaultBlockEnv,
    ...init,
  });
}

export function makeInterpreter(
  program: string | Uint8Array,
  init: Partial<ExecutionContextInit> = {},
  options: InterpreterOptions = {}
): Interpreter {
  return new Interpreter(makeContext(program, init), {
    logger: silentLogger,
    ...options,
  });
}

/** Assemble and run a program to completion. */
export function run(
  program: string | Uint8Array,
  init: Partial<ExecutionContextInit> = {},
  options: InterpreterOptions = {}
): ExecutionResult {
  return makeInterpreter(program, init, options).run();
}

/** Run a program and return the single word left on the stack. */
export function evaluate(program: string): bigint {
  const result = run(program);
  if (result.exit.status !== "success" || result.stack.length !== 1) {
    throw new Error(
      `expected one result, got ${result.exit.status} with ${result.stack.length} item(s)`
    );
  }
  return result.stack[0];
}

/** PUSH32 line for a word. */
export function push(value: bigint): string {
  return `PUSH32 0x${value.toString(16).padStart(64, "0")}`;
}
