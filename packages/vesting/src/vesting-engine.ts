/**
 * Vesting Engine — phased token vesting held in custody.
 *
 * Publishes phase templates, instantiates one schedule per beneficiary
 * from them, and pays out what has vested as the clock advances.
 *
 * Rules:
 * - Privileged operations check the caller against the owner, whoever
 *   forwards them
 * - A schedule is created only if custody covers every outstanding
 *   commitment plus the new allocation
 * - `totalAllocated` is the outstanding commitment: allocations minus
 *   what has been paid out or forfeited
 * - Each operation reads the clock once
 * - Every mutating operation is all-or-nothing
 *
 * Termination:
 * - revoke (hard): the unreleased remainder goes back to the owner and
 *   the schedule is deleted
 * - disable (soft): the vested remainder is paid to the beneficiary, the
 *   allocation is clamped to what vested, and the schedule is frozen
 */

import { z } from "zod";
import type { Address, EventSource, FungibleToken } from "@phasevault/types";
import { ZERO_ADDRESS, canonicalAddress } from "@phasevault/types";
import {
  Contract,
  addressSchema,
  amountSchema,
  normalizeAddress,
  route,
  uintSchema,
  type CallRoutes,
  type ChainContext,
} from "@phasevault/chain";
import {
  CUSTODY_EVENTS,
  type VestingDisabledPayload,
  type VestingReleasedPayload,
  type VestingRevokedPayload,
  type VestingScheduleCreatedPayload,
  type VestingTokenRecoveredPayload,
  type VestingTypeAddedPayload,
} from "@phasevault/event-store";
import { VestingCatalog, copyPhases } from "./catalog.js";
import { toBasisPoints, vestedAmountAt } from "./phase-math.js";
import {
  VestingError,
  type ScheduleRequest,
  type VestedAmount,
  type VestingEngineOptions,
  type VestingPhase,
  type VestingSchedule,
  type VestingType,
} from "./types.js";

// =============================================================================
// Call schemas
// =============================================================================

const phaseSchema = z.object({
  start: uintSchema,
  end: uintSchema,
  percentage: uintSchema,
});

const scheduleRequestSchema = z.object({
  beneficiary: addressSchema,
  typeId: uintSchema,
  amount: amountSchema,
  startTime: uintSchema.optional(),
});

const createScheduleArgs = z
  .tuple([addressSchema, uintSchema, amountSchema])
  .rest(uintSchema)
  .refine((args) => args.length <= 4, "Expected (beneficiary, typeId, amount[, startTime])");

// =============================================================================
// Engine
// =============================================================================

export class VestingEngine extends Contract {
  override readonly source: EventSource = "vesting";

  readonly owner: Address;
  readonly tokenAddress: Address;

  private readonly token: FungibleToken;
  private catalog = new VestingCatalog();
  private schedules: Map<Address, VestingSchedule> = new Map();
  private outstanding = 0n;

  constructor(chain: ChainContext, address: Address, options: VestingEngineOptions) {
    super(chain, address);
    const tokenAddress = canonicalAddress(options.token);
    const token = tokenAddress === undefined ? undefined : chain.tokenAt(tokenAddress);
    if (!token) {
      throw new VestingError("TOKEN_NOT_FOUND", `No token deployed at ${options.token}`);
    }
    this.owner = normalizeAddress(options.owner);
    this.tokenAddress = token.address;
    this.token = token;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Catalog
  // ───────────────────────────────────────────────────────────────────────

  addVestingType(caller: Address, id: number, phases: readonly VestingPhase[]): VestingType {
    return this.atomically(() => {
      const admin = this.adminOf(caller);
      const type = this.catalog.add(id, phases);
      this.emit(CUSTODY_EVENTS.VESTING_TYPE_ADDED, admin, {
        typeId: id,
        phaseCount: type.phases.length,
      } satisfies VestingTypeAddedPayload);
      return type;
    });
  }

  getVestingType(id: number): VestingType {
    return this.catalog.get(id);
  }

  listVestingTypes(): readonly VestingType[] {
    return this.catalog.list();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Schedule creation
  // ───────────────────────────────────────────────────────────────────────

  createVestingSchedule(
    caller: Address,
    beneficiary: Address,
    typeId: number,
    amount: bigint,
    startTime?: number,
  ): VestingSchedule {
    return this.atomically(() => {
      const admin = this.adminOf(caller);
      const now = this.chain.now();
      const schedule = this.prepareSchedule({ beneficiary, typeId, amount, startTime }, now);
      this.assertFunded(amount);
      return this.openSchedule(admin, schedule);
    });
  }

  /**
   * Create several schedules at once. Either all are created or none:
   * duplicates within the batch and the combined funding requirement are
   * checked before anything is stored.
   */
  createVestingSchedules(caller: Address, requests: readonly ScheduleRequest[]): readonly VestingSchedule[] {
    return this.atomically(() => {
      const admin = this.adminOf(caller);
      const now = this.chain.now();

      const seen = new Set<Address>();
      const prepared = requests.map((request) => {
        const schedule = this.prepareSchedule(request, now);
        if (seen.has(schedule.beneficiary)) {
          throw new VestingError(
            "SCHEDULE_EXISTS",
            `Beneficiary ${schedule.beneficiary} appears more than once in the batch`,
          );
        }
        seen.add(schedule.beneficiary);
        return schedule;
      });

      this.assertFunded(prepared.reduce((sum, schedule) => sum + schedule.totalAllocation, 0n));
      return prepared.map((schedule) => this.openSchedule(admin, schedule));
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Payout & termination
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay the caller everything vested on their schedule and not yet
   * released. Returns the amount paid.
   */
  release(caller: Address): bigint {
    return this.atomically(() => {
      const now = this.chain.now();
      const schedule = this.getSchedule(caller);
      const beneficiary = schedule.beneficiary;
      if (schedule.disabled) {
        throw new VestingError("SCHEDULE_DISABLED", `The vesting schedule of ${beneficiary} is disabled`);
      }

      const { releasable } = this.accrual(schedule, now);
      if (releasable === 0n) {
        throw new VestingError("NOTHING_TO_RELEASE", `Nothing to release for ${beneficiary} at ${now}`);
      }

      this.schedules.set(beneficiary, { ...schedule, releasedAmount: schedule.releasedAmount + releasable });
      this.outstanding -= releasable;
      this.pay(beneficiary, releasable);

      this.emit(CUSTODY_EVENTS.VESTING_RELEASED, beneficiary, {
        beneficiary,
        amount: releasable.toString(),
      } satisfies VestingReleasedPayload);
      this.assertInvariants();
      return releasable;
    });
  }

  /**
   * Delete a schedule and return its unreleased remainder to the owner.
   * Returns the amount returned.
   */
  revokeBeneficiary(caller: Address, beneficiary: Address): bigint {
    return this.atomically(() => {
      const admin = this.adminOf(caller);
      const schedule = this.getSchedule(beneficiary);
      const remaining = schedule.totalAllocation - schedule.releasedAmount;

      this.schedules.delete(schedule.beneficiary);
      this.outstanding -= remaining;
      if (remaining > 0n) {
        this.pay(this.owner, remaining);
      }

      this.emit(CUSTODY_EVENTS.VESTING_REVOKED, admin, {
        beneficiary: schedule.beneficiary,
        returnedAmount: remaining.toString(),
      } satisfies VestingRevokedPayload);
      this.assertInvariants();
      return remaining;
    });
  }

  /**
   * Freeze a schedule: pay out what has vested, forfeit the rest.
   * Returns the frozen schedule.
   */
  disableVestingSchedule(caller: Address, beneficiary: Address): VestingSchedule {
    return this.atomically(() => {
      const admin = this.adminOf(caller);
      const now = this.chain.now();
      const schedule = this.getSchedule(beneficiary);
      if (schedule.disabled) {
        throw new VestingError("SCHEDULE_DISABLED", `The vesting schedule of ${schedule.beneficiary} is already disabled`);
      }

      const { vested, releasable } = this.accrual(schedule, now);
      const forfeited = schedule.totalAllocation - vested;
      const frozen: VestingSchedule = {
        ...schedule,
        totalAllocation: vested,
        releasedAmount: vested,
        disabled: true,
      };

      this.schedules.set(schedule.beneficiary, frozen);
      this.outstanding -= releasable + forfeited;
      if (releasable > 0n) {
        this.pay(schedule.beneficiary, releasable);
      }

      this.emit(CUSTODY_EVENTS.VESTING_DISABLED, admin, {
        beneficiary: schedule.beneficiary,
        releasedAmount: releasable.toString(),
        forfeitedAmount: forfeited.toString(),
      } satisfies VestingDisabledPayload);
      this.assertInvariants();
      return frozen;
    });
  }

  /**
   * Send a foreign token held by the engine to the owner.
   */
  recoverToken(caller: Address, token: Address, amount: bigint): void {
    this.atomically(() => {
      const admin = this.adminOf(caller);
      const tokenAddress = canonicalAddress(token);
      if (tokenAddress === this.tokenAddress) {
        throw new VestingError("CANNOT_RECOVER_VESTED_TOKEN", "The vested token cannot be recovered");
      }
      const foreign = tokenAddress === undefined ? undefined : this.chain.tokenAt(tokenAddress);
      if (!foreign) {
        throw new VestingError("TOKEN_NOT_FOUND", `No token deployed at ${token}`);
      }
      if (amount <= 0n) {
        throw new VestingError("ZERO_AMOUNT", "Recovered amount must be positive");
      }

      if (!foreign.transfer(this.address, this.owner, amount)) {
        throw new VestingError("TRANSFER_FAILED", `Token ${token} refused to transfer ${amount}`);
      }
      this.emit(CUSTODY_EVENTS.VESTING_TOKEN_RECOVERED, admin, {
        token: foreign.address,
        amount: amount.toString(),
      } satisfies VestingTokenRecoveredPayload);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getSchedule(beneficiary: Address): VestingSchedule {
    const schedule = this.findSchedule(beneficiary);
    if (!schedule) {
      throw new VestingError("SCHEDULE_NOT_FOUND", `No vesting schedule for ${beneficiary}`);
    }
    return schedule;
  }

  hasSchedule(beneficiary: Address): boolean {
    return this.findSchedule(beneficiary) !== undefined;
  }

  listSchedules(): readonly VestingSchedule[] {
    return [...this.schedules.values()];
  }

  getSchedulePhases(beneficiary: Address): readonly VestingPhase[] {
    return this.getSchedule(beneficiary).phases;
  }

  getVestedAmount(beneficiary: Address): VestedAmount {
    return this.accrual(this.getSchedule(beneficiary), this.chain.now());
  }

  calculateReleasable(beneficiary: Address): bigint {
    return this.getVestedAmount(beneficiary).releasable;
  }

  /** Vested share of the allocation, in basis points (10 000 = 100 %). */
  getVestedPercentage(beneficiary: Address): number {
    const schedule = this.getSchedule(beneficiary);
    const { vested } = this.accrual(schedule, this.chain.now());
    return toBasisPoints(vested, schedule.totalAllocation);
  }

  totalAllocationOf(beneficiary: Address): bigint {
    return this.findSchedule(beneficiary)?.totalAllocation ?? 0n;
  }

  get totalAllocated(): bigint {
    return this.outstanding;
  }

  custodyBalance(): bigint {
    return this.token.balanceOf(this.address);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Substrate
  // ───────────────────────────────────────────────────────────────────────

  protected override routes(): CallRoutes {
    return {
      addVestingType: route(z.tuple([uintSchema, z.array(phaseSchema)]), ({ sender }, [id, phases]) => {
        this.addVestingType(sender, id, phases);
      }),
      createVestingSchedule: route(createScheduleArgs, ({ sender }, [beneficiary, typeId, amount, startTime]) => {
        this.createVestingSchedule(sender, beneficiary, typeId, amount, startTime);
      }),
      createVestingSchedules: route(z.tuple([z.array(scheduleRequestSchema)]), ({ sender }, [requests]) => {
        this.createVestingSchedules(sender, requests);
      }),
      release: route(z.tuple([]), ({ sender }) => {
        this.release(sender);
      }),
      revokeBeneficiary: route(z.tuple([addressSchema]), ({ sender }, [beneficiary]) => {
        this.revokeBeneficiary(sender, beneficiary);
      }),
      disableVestingSchedule: route(z.tuple([addressSchema]), ({ sender }, [beneficiary]) => {
        this.disableVestingSchedule(sender, beneficiary);
      }),
      recoverToken: route(z.tuple([addressSchema, amountSchema]), ({ sender }, [token, amount]) => {
        this.recoverToken(sender, token, amount);
      }),
    };
  }

  override checkpoint(): () => void {
    const catalog = this.catalog.clone();
    const schedules = new Map(this.schedules);
    const outstanding = this.outstanding;
    return () => {
      this.catalog = catalog;
      this.schedules = schedules;
      this.outstanding = outstanding;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private prepareSchedule(request: ScheduleRequest, now: number): VestingSchedule {
    const beneficiary = canonicalAddress(request.beneficiary);
    if (beneficiary === undefined || beneficiary === ZERO_ADDRESS || beneficiary === this.address) {
      throw new VestingError("INVALID_BENEFICIARY", `Invalid beneficiary: "${request.beneficiary}"`);
    }
    if (this.schedules.has(beneficiary)) {
      throw new VestingError("SCHEDULE_EXISTS", `${beneficiary} already has a vesting schedule`);
    }
    if (request.amount <= 0n) {
      throw new VestingError("ZERO_AMOUNT", "Vesting amount must be positive");
    }
    const type = this.catalog.get(request.typeId);

    const startTime = request.startTime ?? now;
    if (!Number.isSafeInteger(startTime) || startTime < 0) {
      throw new VestingError("INVALID_START_TIME", `Start time must be non-negative integer seconds, got ${startTime}`);
    }
    const lastEnd = type.phases.at(-1)?.end ?? 0;
    if (startTime > Number.MAX_SAFE_INTEGER - lastEnd) {
      throw new VestingError("INVALID_START_TIME", `A schedule starting at ${startTime} would end past the last safe second`);
    }

    return {
      beneficiary,
      typeId: type.id,
      startTime,
      phases: copyPhases(type.phases),
      totalAllocation: request.amount,
      releasedAmount: 0n,
      disabled: false,
    };
  }

  private openSchedule(caller: Address, schedule: VestingSchedule): VestingSchedule {
    this.schedules.set(schedule.beneficiary, schedule);
    this.outstanding += schedule.totalAllocation;
    this.emit(CUSTODY_EVENTS.VESTING_SCHEDULE_CREATED, caller, {
      beneficiary: schedule.beneficiary,
      typeId: schedule.typeId,
      amount: schedule.totalAllocation.toString(),
      startTime: schedule.startTime,
    } satisfies VestingScheduleCreatedPayload);
    return schedule;
  }

  private accrual(schedule: VestingSchedule, now: number): VestedAmount {
    if (schedule.disabled) {
      return { vested: schedule.totalAllocation, released: schedule.releasedAmount, releasable: 0n };
    }

    const vested = vestedAmountAt(schedule.totalAllocation, schedule.startTime, schedule.phases, now);
    if (vested < schedule.releasedAmount || vested > schedule.totalAllocation) {
      throw new VestingError(
        "INVARIANT_VIOLATION",
        `Vested ${vested} outside [${schedule.releasedAmount}, ${schedule.totalAllocation}] for ${schedule.beneficiary}`,
      );
    }
    return { vested, released: schedule.releasedAmount, releasable: vested - schedule.releasedAmount };
  }

  private assertFunded(additional: bigint): void {
    const custody = this.custodyBalance();
    if (custody < this.outstanding + additional) {
      throw new VestingError(
        "INSUFFICIENT_FUNDING",
        `Custody balance ${custody} cannot cover ${this.outstanding} outstanding plus ${additional}`,
      );
    }
  }

  private pay(to: Address, amount: bigint): void {
    if (!this.token.transfer(this.address, to, amount)) {
      throw new VestingError("TRANSFER_FAILED", `Token transfer of ${amount} to ${to} failed`);
    }
  }

  private assertInvariants(): void {
    const custody = this.custodyBalance();
    if (this.outstanding < 0n || this.outstanding > custody) {
      throw new VestingError(
        "INVARIANT_VIOLATION",
        `Outstanding commitment ${this.outstanding} is outside [0, ${custody}]`,
      );
    }
  }

  private findSchedule(beneficiary: Address): VestingSchedule | undefined {
    const key = canonicalAddress(beneficiary);
    return key === undefined ? undefined : this.schedules.get(key);
  }

  /** The caller, if it is the administrator. */
  private adminOf(caller: Address): Address {
    if (canonicalAddress(caller) !== this.owner) {
      throw new VestingError("NOT_OWNER", `${caller} is not the vesting administrator`);
    }
    return this.owner;
  }
}
