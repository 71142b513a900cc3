import {
  createAddressFromString,
  createZeroAddress,
  hexToBytes,
  isValidAddress,
} from "@ethereumjs/util";
import { z } from "zod";
import type { BlockEnv, Transaction } from "./context.js";
import { DEFAULT_MEMORY_LIMIT } from "./memory.js";
import { MAX_WORD } from "./word.js";

export const DEFAULT_CALLER = "0x1111111111111111111111111111111111111111";
export const DEFAULT_TO = "0x2222222222222222222222222222222222222222";
export const DEFAULT_GAS_LIMIT = 30_000_000n;

export const defaultBlockEnv: BlockEnv = Object.freeze({
  chainId: 1n,
  number: 1n,
  timestamp: 0n,
  gasLimit: DEFAULT_GAS_LIMIT,
  baseFee: 7n,
  coinbase: createZeroAddress(),
  prevRandao: 0n,
});

const hexBytes = z
  .string()
  .regex(/^0x([0-9a-fA-F]{2})*$/, "expected 0x-prefixed hex bytes")
  .transform((hex) => hexToBytes(`0x${hex.slice(2)}`));

const address = z
  .string()
  .refine(isValidAddress, "expected a 20-byte 0x-prefixed address")
  .transform((hex) => createAddressFromString(hex));

const uint256 = z.bigint().nonnegative().lte(MAX_WORD);

/** 0x-prefixed hex number in word range, e.g. a storage slot or value. */
const hexWord = z
  .string()
  .regex(/^0x[0-9a-fA-F]+$/, "expected a 0x-prefixed hex number")
  .transform((hex) => BigInt(hex))
  .pipe(uint256);

export const blockOverridesSchema = z
  .object({
    chainId: uint256.optional(),
    number: uint256.optional(),
    timestamp: uint256.optional(),
    gasLimit: uint256.optional(),
    baseFee: uint256.optional(),
    coinbase: address.optional(),
    prevRandao: uint256.optional(),
  })
  .strict();

export const executionParamsSchema = z
  .object({
    /** The bytecode to execute. In "call" mode defaults to the code stored at `to`. */
    bytecode: hexBytes.optional(),
    /** "call" = treat as runtime code; "deploy" = treat as initcode. */
    mode: z.enum(["call", "deploy"]).default("call"),
    /** Calldata. Ignored in "deploy" mode. */
    calldata: hexBytes.default("0x"),
    /** Value sent with the transaction (in wei). */
    value: uint256.default(0n),
    from: address.default(DEFAULT_CALLER),
    /** Account whose code runs in "call" mode. */
    to: address.default(DEFAULT_TO),
    block: blockOverridesSchema.default({}),
  })
  .strict()
  .refine((params) => params.mode === "call" || params.bytecode !== undefined, {
    message: "deploy mode needs bytecode",
    path: ["bytecode"],
  });

export type ExecutionParams = z.input<typeof executionParamsSchema>;
export type BlockOverrides = z.input<typeof blockOverridesSchema>;

export interface ParsedExecutionParams {
  mode: "call" | "deploy";
  code: Uint8Array | undefined;
  transaction: Transaction;
  block: BlockEnv;
}

/** Validate execution parameters and fill in defaults. Throws `ZodError`. */
export function parseExecutionParams(params: ExecutionParams): ParsedExecutionParams {
  const parsed = executionParamsSchema.parse(params);
  const deploying = parsed.mode === "deploy";
  return {
    mode: parsed.mode,
    code: parsed.bytecode,
    transaction: {
      sender: parsed.from,
      recipient: deploying ? createZeroAddress() : parsed.to,
      value: parsed.value,
      data: deploying ? new Uint8Array(0) : parsed.calldata,
    },
    block: {
      chainId: parsed.block.chainId ?? defaultBlockEnv.chainId,
      number: parsed.block.number ?? defaultBlockEnv.number,
      timestamp: parsed.block.timestamp ?? defaultBlockEnv.timestamp,
      gasLimit: parsed.block.gasLimit ?? defaultBlockEnv.gasLimit,
      baseFee: parsed.block.baseFee ?? defaultBlockEnv.baseFee,
      coinbase: parsed.block.coinbase ?? defaultBlockEnv.coinbase,
      prevRandao: parsed.block.prevRandao ?? defaultBlockEnv.prevRandao,
    },
  };
}

export const accountModificationSchema = z
  .object({
    balance: uint256.optional(),
    nonce: z.bigint().nonnegative().optional(),
    code: hexBytes.optional(),
    /** Slots to merge in; a zero value clears the slot. */
    storage: z.map(hexWord, hexWord).optional(),
  })
  .strict();

export const stateModificationsSchema = z
  .object({
    accounts: z.map(address, accountModificationSchema).optional(),
  })
  .strict();

export type ParsedStateModifications = z.output<typeof stateModificationsSchema>;

/** Validate a world-state patch. Throws `ZodError`. */
export function parseStateModifications(
  modifications: z.input<typeof stateModificationsSchema>
): ParsedStateModifications {
  return stateModificationsSchema.parse(modifications);
}

export const interpreterOptionsSchema = z
  .object({
    /** Largest memory size, in bytes, before expansion fails with outOfResource. */
    memoryLimit: z.number().int().positive().default(DEFAULT_MEMORY_LIMIT),
    /** Maximum number of instructions per execution. Unlimited when unset. */
    stepLimit: z.number().int().positive().optional(),
  })
  .strict();

export type EngineOptions = z.input<typeof interpreterOptionsSchema>;
export type ResolvedEngineOptions = z.output<typeof interpreterOptionsSchema>;

export function parseEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  return interpreterOptionsSchema.parse(options);
}
