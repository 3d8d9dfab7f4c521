import { describe, it, expect } from "vitest";
import { isNullParty, ZERO_PARTY } from "../src/party.js";

describe("isNullParty", () => {
  it("treats the empty string as null", () => {
    expect(isNullParty("")).toBe(true);
    expect(isNullParty("   ")).toBe(true);
  });

  it("treats the zero address as null, case-insensitively", () => {
    expect(isNullParty(ZERO_PARTY)).toBe(true);
    expect(isNullParty(`0X${"0".repeat(40)}`)).toBe(true);
    expect(isNullParty(` ${ZERO_PARTY} `)).toBe(true);
  });

  it("accepts ordinary identities", () => {
    expect(isNullParty("alice")).toBe(false);
    expect(isNullParty("0x0000000000000000000000000000000000000001")).toBe(false);
  });
});
