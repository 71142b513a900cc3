import { bytesToHex, createContractAddress } from "@ethereumjs/util";
import type { Address } from "@ethereumjs/util";
import type { Trace } from "@wordvm/core";
import {
  parseEngineOptions,
  parseExecutionParams,
  parseStateModifications,
} from "./config.js";
import type { EngineOptions, ExecutionParams, ResolvedEngineOptions } from "./config.js";
import { ExecutionContext } from "./context.js";
import type {
  AccountState,
  EvmEngine,
  StateModifications,
  WorldState,
} from "./engine-types.js";
import { Interpreter, createStepBudget } from "./interpreter.js";
import type { StepHooks } from "./interpreter.js";
import { logger as defaultLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { Memory } from "./memory.js";
import { Storage } from "./storage.js";
import { createTracer } from "./tracer.js";
import { toHexWord } from "./word.js";

/**
 * In-process engine over the interpreter. Keeps a world state between
 * executions; a run sees a copy of it, which is committed only when the run
 * succeeds.
 */
export class LocalEngine implements EvmEngine {
  private storage = new Storage();
  private readonly nonces = new Map<string, bigint>();
  private readonly options: ResolvedEngineOptions;
  private readonly logger: Logger;

  constructor(options: EngineOptions = {}, logger: Logger = defaultLogger) {
    this.options = parseEngineOptions(options);
    this.logger = logger;
  }

  execute(params: ExecutionParams): Trace {
    const { mode, code: bytecode, transaction, block } = parseExecutionParams(params);
    const working = this.storage.clone();

    let address: Address;
    let code: Uint8Array;
    if (mode === "deploy" && bytecode !== undefined) {
      const nonce = this.nonceOf(transaction.sender);
      address = createContractAddress(transaction.sender, nonce);
      this.nonces.set(transaction.sender.toString(), nonce + 1n);
      code = bytecode;
    } else {
      address = transaction.recipient;
      code = bytecode ?? working.codeOf(address);
    }

    this.logger.debug(
      { mode, address: address.toString(), codeSize: code.length },
      "executing"
    );

    const tracer = createTracer();
    const hooks: StepHooks[] = [tracer.hooks];
    if (this.options.stepLimit !== undefined) {
      hooks.push(createStepBudget(this.options.stepLimit));
    }

    const context = new ExecutionContext({
      code,
      address,
      transaction,
      block,
      storage: working,
      memory: new Memory(this.options.memoryLimit),
    });
    const result = new Interpreter(context, { hooks, logger: this.logger }).run();

    let deployedAddress: string | undefined;
    if (result.exit.status === "success") {
      if (mode === "deploy") {
        if (result.returnData.length === 0) {
          this.logger.warn({ address: address.toString() }, "deployment returned empty code");
        }
        working.setCode(address, result.returnData);
        deployedAddress = address.toString();
      }
      this.storage = working;
      this.logger.debug({ steps: result.steps }, "state committed");
    } else {
      this.logger.debug({ exit: result.exit }, "state changes discarded");
    }

    return {
      code: bytesToHex(code),
      steps: tracer.steps,
      result: {
        exit: result.exit,
        returnData: bytesToHex(result.returnData),
        address: address.toString(),
        deployedAddress,
      },
    };
  }

  getState(): WorldState {
    const accounts = new Map<string, AccountState>();
    for (const [address, account] of this.storage.dump()) {
      const storage = new Map<string, string>();
      for (const [slot, value] of account.slots) {
        storage.set(toHexWord(slot), toHexWord(value));
      }
      accounts.set(address, {
        balance: account.balance,
        nonce: this.nonces.get(address) ?? 0n,
        code: bytesToHex(account.code),
        storage,
      });
    }
    for (const [address, nonce] of this.nonces) {
      if (!accounts.has(address)) {
        accounts.set(address, { balance: 0n, nonce, code: "0x", storage: new Map() });
      }
    }
    return { accounts };
  }

  resetState(): void {
    this.storage.clear();
    this.nonces.clear();
  }

  /** Apply a patch to the world state. Throws `ZodError`, changing nothing, on bad input. */
  setState(modifications: StateModifications): void {
    const { accounts } = parseStateModifications(modifications);
    for (const [address, changes] of accounts ?? []) {
      if (changes.code !== undefined) {
        this.storage.setCode(address, changes.code);
      }
      if (changes.balance !== undefined) {
        this.storage.setBalance(address, changes.balance);
      }
      for (const [slot, value] of changes.storage ?? []) {
        this.storage.set(address, slot, value);
      }
      if (changes.nonce !== undefined) {
        this.nonces.set(address.toString(), changes.nonce);
      }
    }
  }

  private nonceOf(address: Address): bigint {
    return this.nonces.get(address.toString()) ?? 0n;
  }
}
