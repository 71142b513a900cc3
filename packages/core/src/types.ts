/** A complete record of one execution. */
export interface Trace {
  /** The bytecode that was executed (hex string). */
  code: string;
  /** Ordered list of executed instructions. */
  steps: Step[];
  /** How the execution ended. */
  result: TraceResult;
}

export interface TraceResult {
  exit: ExitStatus;
  /** Return data copied out of memory by RETURN or REVERT (hex string). */
  returnData: string;
  /** Address of the executing account. */
  address: string;
  /** For deployments that succeeded, the address that received the code. */
  deployedAddress?: string;
}

/** Why an execution stopped with a failure. */
export type FailureReason =
  | "stackUnderflow"
  | "stackTooDeep"
  | "invalidOpcode"
  | "invalidJumpDestination"
  | "outOfResource";

/**
 * Exit status of an execution context. Starts as `running` and moves at most
 * once to one of the terminal values.
 */
export type ExitStatus =
  | { status: "running" }
  | { status: "success" }
  | { status: "failure"; reason: FailureReason }
  | { status: "reverted" };

export type TerminalStatus = Exclude<ExitStatus, { status: "running" }>;

/** A single executed instruction. */
export interface Step {
  /** Program counter. */
  pc: number;
  /** The opcode number (0x00-0xFF). */
  opcode: number;
  /** The opcode mnemonic (e.g., "PUSH1", "MSTORE"). */
  mnemonic: string;
  /** The full stack BEFORE this opcode executes. Top of stack is index 0. */
  stack: string[];
  /** Memory contents BEFORE this opcode executes. */
  memory: string;
  /** Storage writes performed by this step (if any). */
  storageChanges: StorageChange[];
}

export interface StorageChange {
  /** The storage slot. */
  slot: string;
  /** Value before this step. */
  before: string;
  /** Value after this step. */
  after: string;
}

export interface OpcodeInfo {
  /** Opcode number. */
  code: number;
  /** Mnemonic name. */
  mnemonic: string;
  /** Names of the stack inputs, top of stack first. */
  inputNames: string[];
  /** Names of the outputs pushed to the stack. */
  outputNames: string[];
  /** Number of immediate bytes following the opcode. */
  immediateBytes: number;
  defined: true;
}

/** What an unassigned byte decodes to. */
export interface UndefinedOpcode {
  code: number;
  mnemonic: "UNDEFINED";
  inputNames: [];
  outputNames: [];
  immediateBytes: 0;
  defined: false;
}

export type Operation = OpcodeInfo | UndefinedOpcode;

export interface BreakpointCondition {
  /** Break when PC reaches this value. */
  pc?: number;
  /** Break when this opcode is about to execute. */
  opcode?: number;
  /** Break when a specific storage slot is written to. */
  storageSlot?: string;
  /** Break at a specific step index (useful for "run to cursor"). */
  stepIndex?: number;
}

export interface Breakpoint {
  id: string;
  condition: BreakpointCondition;
}
