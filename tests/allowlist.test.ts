import { describe, it, expect } from "vitest";
import { asChainSelector } from "../src/types/brands";
import { ADMIN, REMOTE_UNIT, STRANGER } from "./helpers/addresses";
import { codeOf, eventsOfType } from "./helpers/expect";
import { createFixture, PEER } from "./helpers/fixture";

describe("Allowlist Store", () => {
  it("denies everything by default", () => {
    const { unit } = createFixture();
    expect(unit.allowlist.isDestinationAllowed(asChainSelector(7))).toBe(false);
    expect(unit.allowlist.isSourceAllowed(asChainSelector(7))).toBe(false);
    expect(unit.allowlist.isSenderAllowed(PEER, REMOTE_UNIT)).toBe(false);
  });

  it("keeps the three sets independent", () => {
    const { unit } = createFixture();
    unit.allowlistDestinationChain(ADMIN, asChainSelector(7), true);
    expect(unit.allowlist.isDestinationAllowed(asChainSelector(7))).toBe(true);
    expect(unit.allowlist.isSourceAllowed(asChainSelector(7))).toBe(false);

    unit.allowlistSourceChain(ADMIN, asChainSelector(9), true);
    expect(unit.allowlist.isSourceAllowed(asChainSelector(9))).toBe(true);
    expect(unit.allowlist.isDestinationAllowed(asChainSelector(9))).toBe(false);

    unit.allowlistSender(ADMIN, PEER, REMOTE_UNIT, true);
    expect(unit.allowlist.isSenderAllowed(PEER, REMOTE_UNIT)).toBe(true);
    expect(unit.allowlist.isSenderAllowed(PEER, STRANGER)).toBe(false);
  });

  it("scopes senders to the domain they are allowed from", () => {
    const { unit, chain } = createFixture();
    unit.allowlistSender(ADMIN, PEER, REMOTE_UNIT, true);
    expect(unit.allowlist.isSenderAllowed(asChainSelector(9), REMOTE_UNIT)).toBe(false);
    const [update] = eventsOfType(chain, unit.address, "AllowlistUpdated");
    expect(update).toMatchObject({ list: "sender", key: `7:${REMOTE_UNIT}`, allowed: true });
  });

  it("can revoke an entry", () => {
    const { unit } = createFixture();
    unit.allowlistSender(ADMIN, PEER, REMOTE_UNIT, true);
    unit.allowlistSender(ADMIN, PEER, REMOTE_UNIT, false);
    expect(unit.allowlist.isSenderAllowed(PEER, REMOTE_UNIT)).toBe(false);
  });

  it("treats a repeated set as a no-op", () => {
    const { unit, chain } = createFixture();
    unit.allowlistDestinationChain(ADMIN, asChainSelector(7), true);
    unit.allowlistDestinationChain(ADMIN, asChainSelector(7), true);
    expect(unit.allowlist.isDestinationAllowed(asChainSelector(7))).toBe(true);
    const updates = eventsOfType(chain, unit.address, "AllowlistUpdated");
    expect(updates).toHaveLength(1);
    expect(updates[0]).toMatchObject({ list: "destination", key: "7", allowed: true });
  });

  it("rejects non-admin setters without changing state", () => {
    const { unit, chain } = createFixture();
    const before = chain.eventsOf(unit.address).length;
    expect(codeOf(() => unit.allowlistDestinationChain(STRANGER, asChainSelector(7), true))).toBe("Unauthorized");
    expect(codeOf(() => unit.allowlistSourceChain(STRANGER, asChainSelector(7), true))).toBe("Unauthorized");
    expect(codeOf(() => unit.allowlistSender(STRANGER, PEER, REMOTE_UNIT, true))).toBe("Unauthorized");
    expect(unit.allowlist.isDestinationAllowed(asChainSelector(7))).toBe(false);
    expect(unit.allowlist.isSourceAllowed(asChainSelector(7))).toBe(false);
    expect(unit.allowlist.isSenderAllowed(PEER, REMOTE_UNIT)).toBe(false);
    expect(chain.eventsOf(unit.address)).toHaveLength(before);
  });
});
