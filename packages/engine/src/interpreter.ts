import { decode, inputCount, outputCount } from "@wordvm/core";
import type { ExitStatus, Operation, TerminalStatus } from "@wordvm/core";
import type { ExecutionContext } from "./context.js";
import { dispatchTable as defaultDispatchTable } from "./dispatch-table.js";
import type { DispatchTable } from "./dispatch-table.js";
import { EvmError, isEvmError } from "./errors.js";
import { logger as defaultLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { STACK_LIMIT } from "./stack.js";
import type { Word } from "./word.js";

/** What a step hook sees about the instruction being executed. */
export interface StepEvent {
  /** Number of instructions executed before this one. */
  stepIndex: number;
  /** Program counter of the instruction. */
  pc: number;
  operation: Operation;
  context: ExecutionContext;
}

/**
 * Per-step extension point. Throwing an `EvmError` from either callback ends
 * the run with that failure; `beforeStep` runs before any state changes.
 */
export interface StepHooks {
  beforeStep?(event: StepEvent): void;
  afterStep?(event: StepEvent): void;
}

export interface InterpreterOptions {
  hooks?: StepHooks | StepHooks[];
  logger?: Logger;
  dispatchTable?: DispatchTable;
}

export interface ExecutionResult {
  exit: TerminalStatus;
  /** RETURN/REVERT data; empty for failures and for STOP. */
  returnData: Uint8Array;
  /** Number of instructions executed. */
  steps: number;
  /** Final stack, top first. */
  stack: Word[];
}

/**
 * Fetch-decode-dispatch loop over one execution context. Fully synchronous:
 * the same code and inputs always produce the same result.
 */
export class Interpreter {
  readonly context: ExecutionContext;
  private readonly hooks: StepHooks[];
  private readonly logger: Logger;
  private readonly table: DispatchTable;
  private stepCount = 0;

  constructor(context: ExecutionContext, options: InterpreterOptions = {}) {
    this.context = context;
    this.hooks = options.hooks === undefined ? [] : [options.hooks].flat();
    this.logger = options.logger ?? defaultLogger;
    this.table = options.dispatchTable ?? defaultDispatchTable;
  }

  get status(): ExitStatus {
    return this.context.status;
  }

  get steps(): number {
    return this.stepCount;
  }

  /** Execute one instruction. Does nothing once the context has halted. */
  step(): ExitStatus {
    const ctx = this.context;
    if (!ctx.isRunning) return ctx.status;

    // Running off the end of the code is an implicit STOP.
    if (ctx.pc >= ctx.code.length) {
      ctx.halt({ status: "success" });
      this.logHalt();
      return ctx.status;
    }

    const pc = ctx.pc;
    const operation = decode(ctx.code[pc]);
    const event: StepEvent = { stepIndex: this.stepCount, pc, operation, context: ctx };
    const checkpoint = ctx.stack.checkpoint(inputCount(operation));

    if (this.logger.isLevelEnabled("trace")) {
      this.logger.trace(
        { pc, op: operation.mnemonic, depth: ctx.stack.length },
        "step"
      );
    }

    try {
      for (const hook of this.hooks) hook.beforeStep?.(event);
      this.checkArity(operation);
      ctx.beginInstruction();
      this.table[operation.code](ctx, operation);
    } catch (error) {
      if (!isEvmError(error)) throw error;
      ctx.stack.rollback(checkpoint);
      this.fail(error);
      return ctx.status;
    }

    if (ctx.isRunning && !ctx.redirected) {
      ctx.pc = pc + 1 + operation.immediateBytes;
    }
    this.stepCount++;

    try {
      for (const hook of this.hooks) hook.afterStep?.(event);
    } catch (error) {
      if (!isEvmError(error)) throw error;
      this.fail(error);
      return ctx.status;
    }

    if (!ctx.isRunning) this.logHalt();
    return ctx.status;
  }

  /** Step until the context reaches a terminal status. */
  run(): ExecutionResult {
    while (this.context.isRunning) {
      this.step();
    }
    return this.result();
  }

  result(): ExecutionResult {
    const status = this.context.status;
    if (status.status === "running") {
      throw new Error("Execution has not finished");
    }
    return {
      exit: status,
      returnData: this.context.returnData,
      steps: this.stepCount,
      stack: this.context.stack.toArray(),
    };
  }

  private checkArity(operation: Operation): void {
    const { stack } = this.context;
    const inputs = inputCount(operation);
    if (stack.length < inputs) {
      throw new EvmError(
        "stackUnderflow",
        `${operation.mnemonic} needs ${inputs} stack item(s), found ${stack.length}`
      );
    }
    if (stack.length - inputs + outputCount(operation) > STACK_LIMIT) {
      throw new EvmError("stackTooDeep", `${operation.mnemonic} would exceed ${STACK_LIMIT} stack items`);
    }
  }

  private fail(error: EvmError): void {
    this.context.halt({ status: "failure", reason: error.reason });
    this.logger.debug(
      { pc: this.context.pc, reason: error.reason, detail: error.message, steps: this.stepCount },
      "execution failed"
    );
  }

  private logHalt(): void {
    this.logger.debug(
      { status: this.context.status.status, steps: this.stepCount },
      "execution halted"
    );
  }
}

/**
 * Hook that fails the run with `outOfResource` before the instruction that
 * would exceed `maxSteps` executes.
 */
export function createStepBudget(maxSteps: number): StepHooks {
  return {
    beforeStep({ stepIndex, pc }) {
      if (stepIndex >= maxSteps) {
        throw new EvmError(
          "outOfResource",
          `step budget of ${maxSteps} exhausted at pc ${pc}`
        );
      }
    },
  };
}
