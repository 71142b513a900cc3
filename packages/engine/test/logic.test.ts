import { describe, it, expect } from "vitest";
import { byte, sar, shl, shr } from "../src/handlers/logic.js";
import { fromSigned, MAX_WORD } from "../src/word.js";
import { evaluate, push } from "./helpers.js";

describe("bitwise", () => {
  it("BYTE counts from the most significant byte", () => {
    const x = 0x0102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f20n;
    expect(byte(0n, x)).toBe(0x01n);
    expect(byte(31n, x)).toBe(0x20n);
    expect(byte(32n, x)).toBe(0n);
    expect(byte(MAX_WORD, x)).toBe(0n);
  });

  it("shifts of 256 or more clear the word", () => {
    expect(shl(256n, 1n)).toBe(0n);
    expect(shr(256n, MAX_WORD)).toBe(0n);
    expect(shl(MAX_WORD, 1n)).toBe(0n);
  });

  it("SHL drops bits shifted past the top", () => {
    expect(shl(1n, MAX_WORD)).toBe(MAX_WORD - 1n);
    expect(shl(4n, 1n)).toBe(16n);
  });

  it("SHR is a logical shift", () => {
    expect(shr(1n, 1n << 255n)).toBe(1n << 254n);
  });

  it("SAR keeps the sign", () => {
    expect(sar(1n, fromSigned(-16n))).toBe(fromSigned(-8n));
    expect(sar(4n, 16n)).toBe(1n);
    expect(sar(300n, fromSigned(-1n))).toBe(MAX_WORD);
    expect(sar(300n, 1n << 254n)).toBe(0n);
  });
});

describe("comparison handlers", () => {
  it("LT and GT compare unsigned with the top as the left operand", () => {
    expect(evaluate("PUSH1 0x02\nPUSH1 0x01\nLT")).toBe(1n);
    expect(evaluate("PUSH1 0x02\nPUSH1 0x01\nGT")).toBe(0n);
    expect(evaluate(`PUSH1 0x01\n${push(MAX_WORD)}\nGT`)).toBe(1n);
  });

  it("SLT and SGT compare signed", () => {
    expect(evaluate(`PUSH1 0x01\n${push(MAX_WORD)}\nSLT`)).toBe(1n);
    expect(evaluate(`PUSH1 0x01\n${push(MAX_WORD)}\nSGT`)).toBe(0n);
  });

  it("EQ and ISZERO push 1 or 0", () => {
    expect(evaluate("PUSH1 0x07\nPUSH1 0x07\nEQ")).toBe(1n);
    expect(evaluate("PUSH1 0x07\nPUSH1 0x08\nEQ")).toBe(0n);
    expect(evaluate("PUSH0\nISZERO")).toBe(1n);
    expect(evaluate("PUSH1 0x03\nISZERO")).toBe(0n);
  });

  it("NOT flips every bit", () => {
    expect(evaluate("PUSH0\nNOT")).toBe(MAX_WORD);
  });

  it("AND, OR and XOR combine bits", () => {
    expect(evaluate("PUSH1 0x0c\nPUSH1 0x0a\nAND")).toBe(0x08n);
    expect(evaluate("PUSH1 0x0c\nPUSH1 0x0a\nOR")).toBe(0x0en);
    expect(evaluate("PUSH1 0x0c\nPUSH1 0x0a\nXOR")).toBe(0x06n);
  });

  it("SHL takes the shift from the top", () => {
    expect(evaluate("PUSH1 0x01\nPUSH1 0x04\nSHL")).toBe(16n);
  });
});
