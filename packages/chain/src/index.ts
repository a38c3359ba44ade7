/**
 * @phasevault/chain — In-process execution substrate.
 *
 * Provides:
 * - Chain: native balances, contract registry, atomic call frames
 * - Contract: base class for call-addressable components
 * - Call data codec and argument routing
 * - SystemClock and ManualClock
 *
 * @packageDocumentation
 */

export type { ChainContext, EmittedEvent, ChainErrorCode } from "./types.js";
export { ChainError } from "./types.js";

export { SystemClock, ManualClock } from "./clock.js";

export type { CallArgument, DecodedCall, CallRoute, CallRoutes } from "./calldata.js";
export {
  EMPTY_PAYLOAD,
  encodeCall,
  decodeCall,
  payloadToHex,
  hexToPayload,
  normalizeAddress,
  addressSchema,
  amountSchema,
  uintSchema,
  route,
} from "./calldata.js";

export { Contract } from "./contract.js";

export type { ChainOptions, ContractFactory } from "./chain.js";
export { Chain } from "./chain.js";
