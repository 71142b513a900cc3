import type { Address } from "@ethereumjs/util";
import type { ExitStatus, TerminalStatus } from "@wordvm/core";
import { EvmError } from "./errors.js";
import { JumpDestinations } from "./jump-destinations.js";
import { Memory } from "./memory.js";
import { Stack } from "./stack.js";
import { Storage } from "./storage.js";
import type { Word } from "./word.js";

/** Read-only transaction inputs. A zero recipient means contract creation. */
export interface Transaction {
  readonly sender: Address;
  readonly recipient: Address;
  readonly value: bigint;
  readonly data: Uint8Array;
}

/** Read-only block inputs. */
export interface BlockEnv {
  readonly chainId: bigint;
  readonly number: bigint;
  readonly timestamp: bigint;
  readonly gasLimit: bigint;
  readonly baseFee: bigint;
  readonly coinbase: Address;
  readonly prevRandao: bigint;
}

export interface ExecutionContextInit {
  code: Uint8Array;
  /** Account whose storage the code reads and writes. Defaults to the recipient. */
  address?: Address;
  transaction: Transaction;
  block: BlockEnv;
  storage?: Storage;
  memory?: Memory;
}

const EMPTY = new Uint8Array(0);

/**
 * Everything one run of a program mutates: program counter, exit status,
 * stack, memory and storage, next to the read-only inputs.
 */
export class ExecutionContext {
  readonly code: Uint8Array;
  readonly address: Address;
  readonly transaction: Transaction;
  readonly block: BlockEnv;
  readonly stack = new Stack();
  readonly memory: Memory;
  readonly storage: Storage;
  readonly jumpDestinations: JumpDestinations;

  pc = 0;
  private _status: ExitStatus = { status: "running" };
  private _returnData: Uint8Array = EMPTY;
  private _redirected = false;

  constructor(init: ExecutionContextInit) {
    this.code = init.code;
    this.transaction = init.transaction;
    this.block = init.block;
    this.address = init.address ?? init.transaction.recipient;
    this.storage = init.storage ?? new Storage();
    this.memory = init.memory ?? new Memory();
    this.jumpDestinations = JumpDestinations.analyze(init.code);
  }

  get status(): ExitStatus {
    return this._status;
  }

  get isRunning(): boolean {
    return this._status.status === "running";
  }

  get returnData(): Uint8Array {
    return this._returnData;
  }

  /** True when the current instruction moved the program counter itself. */
  get redirected(): boolean {
    return this._redirected;
  }

  /**
   * Leave the running state. Later calls are ignored: a terminal status
   * never changes.
   */
  halt(status: TerminalStatus, returnData: Uint8Array = EMPTY): void {
    if (!this.isRunning) return;
    this._status = status;
    this._returnData = status.status === "failure" ? EMPTY : returnData;
  }

  /** Transfer control to `dest`, which must be a marked JUMPDEST. */
  jump(dest: Word): void {
    if (!this.jumpDestinations.isValid(dest)) {
      throw new EvmError(
        "invalidJumpDestination",
        `invalid jump destination 0x${dest.toString(16)}`
      );
    }
    this.pc = Number(dest);
    this._redirected = true;
  }

  /** Called by the interpreter before each instruction. */
  beginInstruction(): void {
    this._redirected = false;
  }
}
