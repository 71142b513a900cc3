import type { Trace } from "@wordvm/core";
import type { ExecutionParams } from "./config.js";

export interface EvmEngine {
  /** Execute bytecode and return a trace. */
  execute(params: ExecutionParams): Trace;
  /** Get the current world state. */
  getState(): WorldState;
  /** Reset the world state to its initial (empty) state. */
  resetState(): void;
  /** Modify the world state. */
  setState(modifications: StateModifications): void;
}

export interface WorldState {
  /** Keyed by lowercase 0x-prefixed address. */
  accounts: Map<string, AccountState>;
}

export interface AccountState {
  /** Wei. */
  balance: bigint;
  nonce: bigint;
  /** Hex string. */
  code: string;
  /** Slot to value, both as 0x-prefixed hex. Unset slots are absent. */
  storage: Map<string, string>;
}

export interface StateModifications {
  /** Fields given here replace the account's; storage slots are merged. */
  accounts?: Map<string, Partial<AccountState>>;
}
