import type { OpcodeInfo, Operation, UndefinedOpcode } from "./types.js";

function op(
  code: number,
  mnemonic: string,
  inputNames: string[],
  outputNames: string[],
  immediateBytes = 0
): OpcodeInfo {
  return { code, mnemonic, inputNames, outputNames, immediateBytes, defined: true };
}

function unary(code: number, mnemonic: string, output = "result"): OpcodeInfo {
  return op(code, mnemonic, ["a"], [output]);
}

function binary(
  code: number,
  mnemonic: string,
  inputs: [string, string] = ["a", "b"],
  output = "result"
): OpcodeInfo {
  return op(code, mnemonic, inputs, [output]);
}

/** Opcodes that read one value from the environment. */
function env(code: number, mnemonic: string, output: string): OpcodeInfo {
  return op(code, mnemonic, [], [output]);
}

const callInputs = ["gas", "address", "value", "argsOffset", "argsSize", "retOffset", "retSize"];

const opcodeTable: OpcodeInfo[] = [
  // 0x00s: Stop and Arithmetic
  op(0x00, "STOP", [], []),
  binary(0x01, "ADD", ["a", "b"], "sum"),
  binary(0x02, "MUL", ["a", "b"], "product"),
  binary(0x03, "SUB", ["a", "b"], "difference"),
  binary(0x04, "DIV", ["a", "b"], "quotient"),
  binary(0x05, "SDIV", ["a", "b"], "quotient"),
  binary(0x06, "MOD", ["a", "b"], "remainder"),
  binary(0x07, "SMOD", ["a", "b"], "remainder"),
  op(0x08, "ADDMOD", ["a", "b", "N"], ["result"]),
  op(0x09, "MULMOD", ["a", "b", "N"], ["result"]),
  binary(0x0a, "EXP", ["base", "exponent"]),
  binary(0x0b, "SIGNEXTEND", ["b", "x"]),

  // 0x10s: Comparison & Bitwise Logic
  binary(0x10, "LT"),
  binary(0x11, "GT"),
  binary(0x12, "SLT"),
  binary(0x13, "SGT"),
  binary(0x14, "EQ"),
  unary(0x15, "ISZERO"),
  binary(0x16, "AND"),
  binary(0x17, "OR"),
  binary(0x18, "XOR"),
  unary(0x19, "NOT"),
  binary(0x1a, "BYTE", ["i", "x"]),
  binary(0x1b, "SHL", ["shift", "value"]),
  binary(0x1c, "SHR", ["shift", "value"]),
  binary(0x1d, "SAR", ["shift", "value"]),

  binary(0x20, "KECCAK256", ["offset", "size"], "hash"),

  // 0x30s: Environmental Information
  env(0x30, "ADDRESS", "address"),
  op(0x31, "BALANCE", ["address"], ["balance"]),
  env(0x32, "ORIGIN", "address"),
  env(0x33, "CALLER", "address"),
  env(0x34, "CALLVALUE", "value"),
  op(0x35, "CALLDATALOAD", ["i"], ["data"]),
  env(0x36, "CALLDATASIZE", "size"),
  op(0x37, "CALLDATACOPY", ["destOffset", "offset", "size"], []),
  env(0x38, "CODESIZE", "size"),
  op(0x39, "CODECOPY", ["destOffset", "offset", "size"], []),
  env(0x3a, "GASPRICE", "price"),
  op(0x3b, "EXTCODESIZE", ["address"], ["size"]),
  op(0x3c, "EXTCODECOPY", ["address", "destOffset", "offset", "size"], []),
  env(0x3d, "RETURNDATASIZE", "size"),
  op(0x3e, "RETURNDATACOPY", ["destOffset", "offset", "size"], []),
  op(0x3f, "EXTCODEHASH", ["address"], ["hash"]),

  // 0x40s: Block Information
  op(0x40, "BLOCKHASH", ["blockNumber"], ["hash"]),
  env(0x41, "COINBASE", "address"),
  env(0x42, "TIMESTAMP", "timestamp"),
  env(0x43, "NUMBER", "blockNumber"),
  env(0x44, "PREVRANDAO", "prevRandao"),
  env(0x45, "GASLIMIT", "gasLimit"),
  env(0x46, "CHAINID", "chainId"),
  env(0x47, "SELFBALANCE", "balance"),
  env(0x48, "BASEFEE", "baseFee"),

  // 0x50s: Stack, Memory, Storage and Flow
  op(0x50, "POP", ["value"], []),
  op(0x51, "MLOAD", ["offset"], ["value"]),
  op(0x52, "MSTORE", ["offset", "value"], []),
  op(0x53, "MSTORE8", ["offset", "value"], []),
  op(0x54, "SLOAD", ["key"], ["value"]),
  op(0x55, "SSTORE", ["key", "value"], []),
  op(0x56, "JUMP", ["dest"], []),
  op(0x57, "JUMPI", ["dest", "cond"], []),
  env(0x58, "PC", "counter"),
  env(0x59, "MSIZE", "size"),
  env(0x5a, "GAS", "gas"),
  op(0x5b, "JUMPDEST", [], []),
  op(0x5c, "TLOAD", ["key"], ["value"]),
  op(0x5d, "TSTORE", ["key", "value"], []),
  op(0x5e, "MCOPY", ["destOffset", "offset", "size"], []),
  env(0x5f, "PUSH0", "value"),

  // 0x60-0x7f: PUSH1 through PUSH32
  ...Array.from({ length: 32 }, (_, i) =>
    op(0x60 + i, `PUSH${i + 1}`, [], ["value"], i + 1)
  ),

  // 0x80-0x8f: DUPk reads k items and leaves k+1
  ...Array.from({ length: 16 }, (_, i) => {
    const depth = Array.from({ length: i + 1 }, (_, j) => `value${j + 1}`);
    return op(0x80 + i, `DUP${i + 1}`, depth, [`value${i + 1}`, ...depth]);
  }),

  // 0x90-0x9f: SWAPk exchanges the top with the (k+1)-th item
  ...Array.from({ length: 16 }, (_, i) => {
    const depth = Array.from({ length: i + 2 }, (_, j) => `value${j + 1}`);
    const swapped = [depth[depth.length - 1], ...depth.slice(1, -1), depth[0]];
    return op(0x90 + i, `SWAP${i + 1}`, depth, swapped);
  }),

  // 0xa0-0xa4: LOG0 through LOG4
  ...Array.from({ length: 5 }, (_, i) =>
    op(
      0xa0 + i,
      `LOG${i}`,
      ["offset", "size", ...Array.from({ length: i }, (_, j) => `topic${j + 1}`)],
      []
    )
  ),

  // 0xf0s: System
  op(0xf0, "CREATE", ["value", "offset", "size"], ["address"]),
  op(0xf1, "CALL", callInputs, ["success"]),
  op(0xf2, "CALLCODE", callInputs, ["success"]),
  op(0xf3, "RETURN", ["offset", "size"], []),
  op(0xf4, "DELEGATECALL", callInputs.filter((n) => n !== "value"), ["success"]),
  op(0xf5, "CREATE2", ["value", "offset", "size", "salt"], ["address"]),
  op(0xfa, "STATICCALL", callInputs.filter((n) => n !== "value"), ["success"]),
  op(0xfd, "REVERT", ["offset", "size"], []),
  op(0xfe, "INVALID", [], []),
  op(0xff, "SELFDESTRUCT", ["address"], []),
];

const byMnemonic = new Map<string, OpcodeInfo>();
for (const info of opcodeTable) {
  byMnemonic.set(info.mnemonic, info);
}

function undefinedOpcode(code: number): UndefinedOpcode {
  return {
    code,
    mnemonic: "UNDEFINED",
    inputNames: [],
    outputNames: [],
    immediateBytes: 0,
    defined: false,
  };
}

// One entry per byte value, assigned or not.
const catalog: readonly Operation[] = Object.freeze(
  Array.from(
    { length: 256 },
    (_, code): Operation =>
      opcodeTable.find((info) => info.code === code) ?? undefinedOpcode(code)
  )
);

/**
 * Decode a single byte into the operation it names. Total over 0x00-0xFF:
 * unassigned bytes decode to an `UNDEFINED` operation rather than failing.
 */
export function decode(byte: number): Operation {
  return catalog[byte & 0xff];
}

export function getOpcodeByCode(code: number): OpcodeInfo | undefined {
  const operation = catalog[code];
  return operation?.defined ? operation : undefined;
}

export function getOpcodeByMnemonic(
  mnemonic: string
): OpcodeInfo | undefined {
  return byMnemonic.get(mnemonic);
}

export function getAllOpcodes(): OpcodeInfo[] {
  return [...opcodeTable];
}

/** Number of stack items the operation pops. */
export function inputCount(operation: Operation): number {
  return operation.inputNames.length;
}

/** Number of stack items the operation pushes. */
export function outputCount(operation: Operation): number {
  return operation.outputNames.length;
}

export function isPush(operation: Operation): boolean {
  return operation.immediateBytes > 0;
}
