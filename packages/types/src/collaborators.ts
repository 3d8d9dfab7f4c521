/**
 * Collaborator Contracts
 *
 * The invoice core depends on two things it does not implement:
 * a clock and a way to move value between parties. Both are injected.
 */

import type { Money } from "./financial.js";
import type { PartyId } from "./party.js";

/**
 * Source of the current time. Assumed monotonic.
 */
export interface Clock {
  now(): Date;
}

/**
 * The system clock.
 */
export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A request to move value from one party to another.
 */
export interface TransferRequest {
  readonly from: PartyId;
  readonly to: PartyId;
  readonly money: Money;

  /** Caller-supplied reference, e.g. "invoice-7" */
  readonly reference: string;
}

export type TransferOutcome =
  | { readonly ok: true; readonly transferId: string }
  | { readonly ok: false; readonly reason: string };

/**
 * Value transfer rail.
 *
 * A transfer either completes in full or has no effect.
 * Failure may be reported as `{ ok: false }` or by rejecting.
 */
export interface TransferRail {
  transfer(request: TransferRequest): Promise<TransferOutcome>;
}
