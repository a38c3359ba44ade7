/**
 * Request schemas and response views.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Views turn domain records into JSON: bigints become decimal strings
 * and payloads become hex.
 */

import { z } from "zod";
import type { Address } from "@phasevault/types";
import {
  addressSchema,
  amountSchema,
  payloadToHex,
  type CallArgument,
} from "@phasevault/chain";
import type { MultisigTransaction, TransactionStatus } from "@phasevault/multisig";
import type { VestedAmount, VestingPhase, VestingSchedule, VestingType } from "@phasevault/vesting";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const IdParamSchema = z.coerce.number().int().min(0);

const callArgumentSchema: z.ZodType<CallArgument> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.array(callArgumentSchema), z.record(callArgumentSchema)]),
);

// =============================================================================
// Wallet DTOs
// =============================================================================

export const SubmitTransactionSchema = z
  .object({
    destination: addressSchema,
    value: amountSchema.default("0"),
    /** Native value the submitter sends along; defaults to `value` */
    attachedValue: amountSchema.optional(),
    payload: z.string().optional(),
    call: z
      .object({
        method: z.string().min(1),
        args: z.array(callArgumentSchema).default([]),
      })
      .optional(),
  })
  .refine((body) => body.payload === undefined || body.call === undefined, {
    message: "Provide either payload or call, not both",
    path: ["call"],
  });

export type SubmitTransactionDto = z.infer<typeof SubmitTransactionSchema>;

export const WithdrawalSchema = z.object({
  destination: addressSchema,
  amount: amountSchema,
});

export type WithdrawalDto = z.infer<typeof WithdrawalSchema>;

export const ListTransactionsQuerySchema = z.object({
  status: z.enum(["pending", "approved", "executed"]).optional(),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Views
// =============================================================================

export interface TransactionView {
  readonly id: number;
  readonly status: TransactionStatus;
  readonly destination: Address;
  readonly value: string;
  readonly payload: string;
  readonly executed: boolean;
  readonly approvalCount: number;
  readonly approvedBy: readonly Address[];
  readonly submittedBy: Address;
  readonly failedAttempts: number;
}

export function toTransactionView(transaction: MultisigTransaction, status: TransactionStatus): TransactionView {
  return {
    id: transaction.id,
    status,
    destination: transaction.destination,
    value: transaction.value.toString(),
    payload: payloadToHex(transaction.payload),
    executed: transaction.executed,
    approvalCount: transaction.approvalCount,
    approvedBy: transaction.approvedBy,
    submittedBy: transaction.submittedBy,
    failedAttempts: transaction.failedAttempts,
  };
}

export interface VestingTypeView {
  readonly id: number;
  readonly phases: readonly VestingPhase[];
}

export function toVestingTypeView(type: VestingType): VestingTypeView {
  return { id: type.id, phases: type.phases };
}

export interface ScheduleView {
  readonly beneficiary: Address;
  readonly typeId: number;
  readonly startTime: number;
  readonly phases: readonly VestingPhase[];
  readonly totalAllocation: string;
  readonly releasedAmount: string;
  readonly vestedAmount: string;
  readonly releasableAmount: string;
  /** Basis points of the allocation vested so far */
  readonly vestedBps: number;
  readonly disabled: boolean;
}

export function toScheduleView(schedule: VestingSchedule, amounts: VestedAmount, vestedBps: number): ScheduleView {
  return {
    beneficiary: schedule.beneficiary,
    typeId: schedule.typeId,
    startTime: schedule.startTime,
    phases: schedule.phases,
    totalAllocation: schedule.totalAllocation.toString(),
    releasedAmount: amounts.released.toString(),
    vestedAmount: amounts.vested.toString(),
    releasableAmount: amounts.releasable.toString(),
    vestedBps,
    disabled: schedule.disabled,
  };
}
