import { decode, getOpcodeByMnemonic } from "./opcodes.js";
import type { OpcodeInfo } from "./types.js";

const LABEL_DEFINITION = /^([A-Za-z_][A-Za-z0-9_]*):$/;
const LABEL_REFERENCE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Blank out // and /* *\/ comments, keeping newlines so line numbers hold. */
function stripComments(source: string): string {
  return source
    .replace(/\/\*[\s\S]*?(\*\/|$)/g, (block) => block.replace(/[^\n]/g, " "))
    .replace(/\/\/[^\n]*/g, "");
}

/** Parse a numeric value from hex (0x...) or decimal string. */
function parseValue(s: string): bigint {
  if (/^0x$/i.test(s)) throw new Error(`Invalid hex value: ${s}`);
  return BigInt(s);
}

/** Convert a bigint to a hex string of exactly `byteCount` bytes (no 0x prefix). */
function toHex(value: bigint, byteCount: number): string {
  if (value < 0n) throw new Error(`Negative value not allowed: ${value}`);
  const maxValue = (1n << BigInt(byteCount * 8)) - 1n;
  if (value > maxValue) {
    throw new Error(
      `Value ${value} does not fit in ${byteCount} byte(s) (max ${maxValue})`
    );
  }
  return value.toString(16).padStart(byteCount * 2, "0");
}

interface SourceInstruction {
  line: number;
  info: OpcodeInfo;
  operand?: string;
}

/**
 * Assemble mnemonic source into bytecode (hex string).
 *
 * Input format (one instruction per line):
 *   PUSH1 0x05
 *   PUSH1 end
 *   JUMP
 *   end:
 *   JUMPDEST
 *
 * PUSH immediates are hex (0x60), decimal (96) or the name of a label. A
 * label (`name:` on its own line) marks the offset of the next instruction;
 * it does not emit a JUMPDEST by itself.
 *
 * Empty lines and comments (// and block) are ignored.
 */
export function assemble(source: string): string {
  const lines = stripComments(source).split("\n");
  const labels = new Map<string, number>();
  const instructions: SourceInstruction[] = [];
  let offset = 0;

  // First pass: resolve label offsets.
  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    const line = lines[lineNum].trim();
    if (line === "") continue;

    const label = LABEL_DEFINITION.exec(line);
    if (label) {
      if (labels.has(label[1])) {
        throw new Error(`Duplicate label "${label[1]}" on line ${lineNum + 1}`);
      }
      labels.set(label[1], offset);
      continue;
    }

    const parts = line.split(/\s+/);
    const info = getOpcodeByMnemonic(parts[0].toUpperCase());
    if (!info) {
      throw new Error(`Unknown mnemonic "${parts[0]}" on line ${lineNum + 1}`);
    }
    if (info.immediateBytes > 0 && parts.length < 2) {
      throw new Error(
        `${info.mnemonic} requires a ${info.immediateBytes}-byte immediate value on line ${lineNum + 1}`
      );
    }

    instructions.push({ line: lineNum + 1, info, operand: parts[1] });
    offset += 1 + info.immediateBytes;
  }

  // Second pass: emit.
  let output = "";
  for (const { line, info, operand } of instructions) {
    output += info.code.toString(16).padStart(2, "0");
    if (info.immediateBytes === 0 || operand === undefined) continue;

    try {
      const target = LABEL_REFERENCE.test(operand) ? labels.get(operand) : undefined;
      if (LABEL_REFERENCE.test(operand) && target === undefined) {
        throw new Error(`Unknown label "${operand}"`);
      }
      const value = target !== undefined ? BigInt(target) : parseValue(operand);
      output += toHex(value, info.immediateBytes);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new Error(
        `Invalid immediate value for ${info.mnemonic} on line ${line}: ${reason}`
      );
    }
  }

  return "0x" + output;
}

/** Disassemble bytecode (hex string) into mnemonic source. */
export function disassemble(bytecode: string): string {
  let hex = bytecode;
  if (hex.startsWith("0x") || hex.startsWith("0X")) {
    hex = hex.slice(2);
  }
  hex = hex.toLowerCase();

  if (hex.length % 2 !== 0) {
    throw new Error("Bytecode has odd number of hex characters");
  }
  if (!/^[0-9a-f]*$/.test(hex)) {
    throw new Error("Bytecode contains non-hex characters");
  }

  const lines: string[] = [];
  let i = 0;

  while (i < hex.length) {
    const opByte = parseInt(hex.slice(i, i + 2), 16);
    i += 2;

    const operation = decode(opByte);
    if (!operation.defined) {
      lines.push(`UNDEFINED(0x${opByte.toString(16).padStart(2, "0")})`);
      continue;
    }

    const width = operation.immediateBytes * 2;
    if (width === 0) {
      lines.push(operation.mnemonic);
      continue;
    }

    const dataHex = hex.slice(i, i + width);
    i += width;
    lines.push(
      dataHex.length < width
        ? `${operation.mnemonic} 0x${dataHex} // truncated`
        : `${operation.mnemonic} 0x${dataHex}`
    );
  }

  return lines.join("\n");
}
