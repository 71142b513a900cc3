import { describe, it, expect } from "vitest";
import { JumpDestinations } from "../src/jump-destinations.js";
import { code } from "./helpers.js";

describe("JumpDestinations", () => {
  it("marks JUMPDEST bytes", () => {
    const dests = JumpDestinations.analyze(new Uint8Array([0x5b, 0x00, 0x5b]));
    expect(dests.toArray()).toEqual([0, 2]);
  });

  it("skips PUSH immediates that contain 0x5b", () => {
    // PUSH2 0x5b5b, JUMPDEST
    const dests = JumpDestinations.analyze(new Uint8Array([0x61, 0x5b, 0x5b, 0x5b]));
    expect(dests.isValid(1n)).toBe(false);
    expect(dests.isValid(2n)).toBe(false);
    expect(dests.isValid(3n)).toBe(true);
  });

  it("skips a PUSH32 immediate", () => {
    const bytes = new Uint8Array(34).fill(0x5b);
    bytes[0] = 0x7f;
    expect(JumpDestinations.analyze(bytes).toArray()).toEqual([33]);
  });

  it("handles a PUSH truncated by the end of code", () => {
    expect(JumpDestinations.analyze(new Uint8Array([0x5b, 0x62, 0x5b])).toArray()).toEqual([0]);
  });

  it("rejects offsets past the end of code", () => {
    const dests = JumpDestinations.analyze(code("JUMPDEST"));
    expect(dests.isValid(0n)).toBe(true);
    expect(dests.isValid(1n)).toBe(false);
    expect(dests.isValid(2n ** 255n)).toBe(false);
  });

  it("reuses the analysis of the same buffer", () => {
    const bytes = code("JUMPDEST\nSTOP");
    expect(JumpDestinations.analyze(bytes)).toBe(JumpDestinations.analyze(bytes));
  });
});
