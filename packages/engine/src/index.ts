export type {
  EvmEngine,
  WorldState,
  AccountState,
  StateModifications,
} from "./engine-types.js";
export type {
  ExecutionParams,
  BlockOverrides,
  EngineOptions,
  ParsedExecutionParams,
  ParsedStateModifications,
} from "./config.js";
export type { Transaction, BlockEnv, ExecutionContextInit } from "./context.js";
export type {
  StepEvent,
  StepHooks,
  InterpreterOptions,
  ExecutionResult,
} from "./interpreter.js";
export type { Handler, HandlerMap } from "./handlers/types.js";
export type { DispatchTable } from "./dispatch-table.js";
export type { AccountRecord, AccountSnapshot } from "./storage.js";
export type { Tracer } from "./tracer.js";
export type { Word } from "./word.js";

export { LocalEngine } from "./local-engine.js";
export { Interpreter, createStepBudget } from "./interpreter.js";
export { ExecutionContext } from "./context.js";
export { Stack, STACK_LIMIT } from "./stack.js";
export { Memory, DEFAULT_MEMORY_LIMIT } from "./memory.js";
export { Storage } from "./storage.js";
export { JumpDestinations } from "./jump-destinations.js";
export { EvmError, isEvmError } from "./errors.js";
export {
  dispatchTable,
  buildDispatchTable,
  implementedMnemonics,
} from "./dispatch-table.js";
export { createTracer } from "./tracer.js";
export {
  parseExecutionParams,
  parseEngineOptions,
  parseStateModifications,
  executionParamsSchema,
  stateModificationsSchema,
  defaultBlockEnv,
  DEFAULT_CALLER,
  DEFAULT_TO,
} from "./config.js";
export { logger } from "./logger.js";
export {
  MAX_WORD,
  MIN_SIGNED,
  toSigned,
  fromSigned,
  wordToBytes,
  bytesToWord,
} from "./word.js";
