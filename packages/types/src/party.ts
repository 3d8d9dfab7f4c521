/**
 * Party Types
 *
 * Every invoice is held between exactly two parties: the issuer, who
 * creates it and is owed payment, and the recipient, who pays it.
 *
 * Identities are opaque strings supplied by the caller's environment.
 * The core never parses them beyond recognising the null identity.
 */

/**
 * Opaque identity of a party (user id, account address, API principal).
 */
export type PartyId = string;

/**
 * The all-zero address, treated as "no party".
 */
export const ZERO_PARTY: PartyId = "0x0000000000000000000000000000000000000000";

/**
 * True for the empty identity and for ZERO_PARTY.
 */
export function isNullParty(party: PartyId): boolean {
  const trimmed = party.trim();
  return trimmed === "" || trimmed.toLowerCase() === ZERO_PARTY;
}
