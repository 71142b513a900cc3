export type {
  Trace,
  TraceResult,
  FailureReason,
  ExitStatus,
  TerminalStatus,
  Step,
  StorageChange,
  OpcodeInfo,
  UndefinedOpcode,
  Operation,
  Breakpoint,
  BreakpointCondition,
} from "./types.js";

export { DebugSession } from "./debug-session.js";
export { assemble, disassemble } from "./assembler.js";
export {
  decode,
  getOpcodeByCode,
  getOpcodeByMnemonic,
  getAllOpcodes,
  inputCount,
  outputCount,
  isPush,
} from "./opcodes.js";
