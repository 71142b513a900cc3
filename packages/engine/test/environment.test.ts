import { describe, it, expect } from "vitest";
import { createAddressFromString } from "@ethereumjs/util";
import { defaultBlockEnv } from "../src/config.js";
import { slicePadded } from "../src/handlers/environment.js";
import { Storage } from "../src/storage.js";
import { MAX_WORD } from "../src/word.js";
import type { ExecutionContextInit } from "../src/context.js";
import { CALLER, CONTRACT, makeInterpreter, makeTransaction, push, run } from "./helpers.js";

const KECCAK_EMPTY = 0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470n;
const other = createAddressFromString("0x00000000000000000000000000000000000000a1");

function top(program: string, init: Partial<ExecutionContextInit> = {}): bigint {
  const result = run(program, init);
  expect(result.exit).toEqual({ status: "success" });
  return result.stack[0];
}

describe("slicePadded", () => {
  it("zero-fills past the end of the data", () => {
    expect(Array.from(slicePadded(new Uint8Array([1, 2, 3]), 2n, 3))).toEqual([3, 0, 0]);
  });

  it("returns zeros for an offset beyond the data", () => {
    expect(Array.from(slicePadded(new Uint8Array([1]), MAX_WORD, 2))).toEqual([0, 0]);
  });
});

describe("transaction handlers", () => {
  const transaction = makeTransaction({ value: 5n, data: new Uint8Array([0xaa, 0xbb]) });

  it("pushes the account, sender and value", () => {
    expect(top("ADDRESS")).toBe(0x2222222222222222222222222222222222222222n);
    expect(top("CALLER")).toBe(0x1111111111111111111111111111111111111111n);
    expect(top("ORIGIN")).toBe(0x1111111111111111111111111111111111111111n);
    expect(top("CALLVALUE", { transaction })).toBe(5n);
  });

  it("reads calldata words, padding with zeros", () => {
    expect(top("PUSH1 0x01\nCALLDATALOAD", { transaction })).toBe(0xbbn << 248n);
    expect(top(`${push(MAX_WORD)}\nCALLDATALOAD`, { transaction })).toBe(0n);
    expect(top("CALLDATASIZE", { transaction })).toBe(2n);
  });

  it("copies calldata into memory", () => {
    const interpreter = makeInterpreter("PUSH1 0x03\nPUSH1 0x01\nPUSH0\nCALLDATACOPY", {
      transaction,
    });
    interpreter.run();
    expect(Array.from(interpreter.context.memory.read(0, 3))).toEqual([0xbb, 0, 0]);
    expect(interpreter.context.memory.size).toBe(32);
  });

  it("reports the running account's own storage address", () => {
    const address = createAddressFromString("0x00000000000000000000000000000000000000c0");
    expect(top("ADDRESS", { address })).toBe(0xc0n);
  });
});

describe("code handlers", () => {
  it("pushes the code size", () => {
    expect(top("CODESIZE")).toBe(1n);
  });

  it("copies the running code into memory", () => {
    const interpreter = makeInterpreter("PUSH1 0x04\nPUSH0\nPUSH0\nCODECOPY");
    interpreter.run();
    expect(Array.from(interpreter.context.memory.read(0, 5))).toEqual([0x60, 0x04, 0x5f, 0x5f, 0]);
  });

  it("reads other accounts' code from storage", () => {
    const storage = new Storage();
    storage.setCode(other, new Uint8Array([1, 2, 3]));
    expect(top("PUSH20 0xa1\nEXTCODESIZE", { storage })).toBe(3n);

    const interpreter = makeInterpreter(
      "PUSH1 0x02\nPUSH1 0x01\nPUSH0\nPUSH20 0xa1\nEXTCODECOPY",
      { storage }
    );
    interpreter.run();
    expect(Array.from(interpreter.context.memory.read(0, 2))).toEqual([2, 3]);
  });

  it("hashes the code of existing accounts only", () => {
    const storage = new Storage();
    expect(top("PUSH20 0xa1\nEXTCODEHASH", { storage })).toBe(0n);
    storage.set(other, 1n, 1n);
    expect(top("PUSH20 0xa1\nEXTCODEHASH", { storage })).toBe(KECCAK_EMPTY);
  });

  it("sees an empty account for an unknown address", () => {
    expect(top("PUSH20 0xa1\nEXTCODESIZE")).toBe(0n);
  });
});

describe("balance handlers", () => {
  it("reads the balance of the address on the stack", () => {
    const storage = new Storage();
    storage.setBalance(other, 42n);
    expect(top("PUSH20 0xa1\nBALANCE", { storage })).toBe(42n);
    expect(top("PUSH20 0xb0\nBALANCE", { storage })).toBe(0n);
  });

  it("reads the running account's balance", () => {
    const storage = new Storage();
    storage.setBalance(CONTRACT, 9n);
    storage.setBalance(CALLER, 1n);
    expect(top("SELFBALANCE", { storage })).toBe(9n);
  });

  it("fails BALANCE on an empty stack", () => {
    expect(run("BALANCE").exit).toEqual({ status: "failure", reason: "stackUnderflow" });
  });
});

describe("block handlers", () => {
  it("pushes the default block values", () => {
    expect(top("CHAINID")).toBe(defaultBlockEnv.chainId);
    expect(top("NUMBER")).toBe(1n);
    expect(top("TIMESTAMP")).toBe(0n);
    expect(top("GASLIMIT")).toBe(30_000_000n);
    expect(top("BASEFEE")).toBe(7n);
  });

  it("pushes a zero coinbase and randomness by default", () => {
    expect(top("COINBASE")).toBe(0n);
    expect(top("PREVRANDAO")).toBe(0n);
  });

  it("pushes the block coinbase and randomness", () => {
    const block = { ...defaultBlockEnv, coinbase: other, prevRandao: 0x5eedn };
    expect(top("COINBASE", { block })).toBe(0xa1n);
    expect(top("PREVRANDAO", { block })).toBe(0x5eedn);
  });

  it("pushes overridden block values", () => {
    const block = { ...defaultBlockEnv, number: 100n, timestamp: 1_700_000_000n };
    expect(top("NUMBER", { block })).toBe(100n);
    expect(top("TIMESTAMP", { block })).toBe(1_700_000_000n);
  });
});

describe("memory and storage handlers", () => {
  it("grows memory to cover a word stored at offset 100", () => {
    expect(top("PUSH1 0x2a\nPUSH1 0x64\nMSTORE\nMSIZE")).toBe(160n);
  });

  it("reads back a stored word", () => {
    expect(top("PUSH1 0x2a\nPUSH1 0x64\nMSTORE\nPUSH1 0x64\nMLOAD")).toBe(0x2an);
  });

  it("stores the low byte with MSTORE8", () => {
    expect(top("PUSH2 0x1234\nPUSH0\nMSTORE8\nPUSH0\nMLOAD")).toBe(0x34n << 248n);
  });

  it("copies within memory", () => {
    const program = [
      "PUSH1 0x2a",
      "PUSH0",
      "MSTORE",
      "PUSH1 0x20",
      "PUSH0",
      "PUSH1 0x20",
      "MCOPY",
      "PUSH1 0x20",
      "MLOAD",
    ].join("\n");
    expect(top(program)).toBe(0x2an);
  });

  it("ignores offsets of a zero-length MCOPY", () => {
    const interpreter = makeInterpreter(`PUSH0\n${push(MAX_WORD)}\n${push(MAX_WORD)}\nMCOPY`);
    expect(interpreter.run().exit).toEqual({ status: "success" });
    expect(interpreter.context.memory.size).toBe(0);
  });

  it("hashes a memory range", () => {
    expect(top("PUSH0\nPUSH0\nKECCAK256")).toBe(KECCAK_EMPTY);
  });

  it("writes and reads the running account's storage", () => {
    const storage = new Storage();
    expect(top("PUSH1 0x2a\nPUSH1 0x01\nSSTORE\nPUSH1 0x01\nSLOAD", { storage })).toBe(0x2an);
    expect(storage.get(CONTRACT, 1n)).toBe(0x2an);
    expect(storage.get(CALLER, 1n)).toBe(0n);
  });

  it("reads zero from an unset slot", () => {
    expect(top("PUSH1 0x09\nSLOAD")).toBe(0n);
  });
});
