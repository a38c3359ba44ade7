/**
 * Call data — how a method call travels as opaque bytes.
 *
 * Encoding: RFC 8785 canonical JSON of `{ method, args }`, UTF-8.
 * bigint arguments travel as decimal strings. The wallet never looks
 * inside; destinations decode and validate with Zod before acting.
 */

import { canonicalize } from "json-canonicalize";
import { bytesToHex, hexToBytes, isHex } from "viem";
import { z } from "zod";
import type { Address, CallContext, EventValue, Payload } from "@phasevault/types";
import { canonicalAddress, isAddress } from "@phasevault/types";
import { ChainError } from "./types.js";

// =============================================================================
// Encoding
// =============================================================================

export type CallArgument =
  | string
  | number
  | boolean
  | bigint
  | readonly CallArgument[]
  | { readonly [key: string]: CallArgument };

export interface DecodedCall {
  readonly method: string;
  readonly args: readonly unknown[];
}

export const EMPTY_PAYLOAD: Payload = new Uint8Array(0);

const CallEnvelopeSchema = z.object({
  method: z.string().min(1),
  args: z.array(z.unknown()),
});

export function encodeCall(method: string, args: readonly CallArgument[] = []): Payload {
  const body = canonicalize({ method, args: args.map(toJsonValue) });
  return new TextEncoder().encode(body);
}

/**
 * @throws ChainError INVALID_CALLDATA
 */
export function decodeCall(payload: Payload): DecodedCall {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(payload));
  } catch (error) {
    throw new ChainError(
      "INVALID_CALLDATA",
      `Call data is not a JSON call: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = CallEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    throw new ChainError("INVALID_CALLDATA", `Malformed call: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function payloadToHex(payload: Payload): `0x${string}` {
  return bytesToHex(payload);
}

/**
 * @throws ChainError INVALID_CALLDATA
 */
export function hexToPayload(hex: string): Payload {
  if (!isHex(hex)) {
    throw new ChainError("INVALID_CALLDATA", `Not a 0x-prefixed hex string: "${hex}"`);
  }
  return hexToBytes(hex);
}

function toJsonValue(arg: CallArgument): EventValue {
  if (typeof arg === "bigint") return arg.toString();
  if (typeof arg !== "object") return arg;
  if (isArgumentList(arg)) return arg.map(toJsonValue);
  return Object.fromEntries(
    Object.entries(arg).map(([key, value]) => [key, toJsonValue(value)]),
  );
}

function isArgumentList(
  arg: readonly CallArgument[] | { readonly [key: string]: CallArgument },
): arg is readonly CallArgument[] {
  return Array.isArray(arg);
}

// =============================================================================
// Addresses
// =============================================================================

/**
 * Lower-case and validate an address.
 *
 * @throws ChainError INVALID_ADDRESS
 */
export function normalizeAddress(value: string): Address {
  const address = canonicalAddress(value);
  if (address === undefined) {
    throw new ChainError("INVALID_ADDRESS", `Invalid address: "${value}"`);
  }
  return address;
}

// =============================================================================
// Argument schemas
// =============================================================================

export const addressSchema = z.string().transform((value, ctx): Address => {
  const lower = value.toLowerCase();
  if (!isAddress(lower)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid address: "${value}"` });
    return z.NEVER;
  }
  return lower;
});

/** Base-unit amount: a decimal digit string or a safe non-negative integer. */
export const amountSchema = z
  .union([z.string().regex(/^\d+$/, "Expected a non-negative integer string"), z.number().int().nonnegative().safe()])
  .transform((value) => BigInt(value));

export const uintSchema = z.number().int().nonnegative().safe();

// =============================================================================
// Routing
// =============================================================================

export type CallRoute = (context: CallContext, args: readonly unknown[]) => void;

export type CallRoutes = Readonly<Record<string, CallRoute>>;

/**
 * Bind a method handler to the schema of its argument list.
 */
export function route<S extends z.ZodTypeAny>(
  schema: S,
  handler: (context: CallContext, args: z.output<S>) => void,
): CallRoute {
  return (context, args) => {
    const result = schema.safeParse(args);
    if (!result.success) {
      throw new ChainError("INVALID_CALLDATA", `Invalid arguments: ${formatIssues(result.error)}`);
    }
    handler(context, result.data);
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
