import { roleId } from "../crypto/hash";
import type { Address, Hex } from "../types/brands";
import { CrossChainError } from "./errors";
import { JournaledMap, type Journal } from "./journal";
import type { UnitEvent } from "./types";

export const DEFAULT_ADMIN_ROLE: Hex = `0x${"00".repeat(32)}`;
export const MINTER_ROLE: Hex = roleId("MINTER_ROLE");

const key = (role: Hex, account: Address) => `${role}:${account}`;

/**
 * Role registry consumed by the messaging core: `hasRole` plus the
 * admin-gated grant/revoke surface. Every role is administered by
 * DEFAULT_ADMIN_ROLE.
 */
export class AccessControl {
  private readonly members: JournaledMap<string, true>;

  constructor(
    journal: Journal,
    private readonly emit: (e: UnitEvent) => void,
  ) {
    this.members = new JournaledMap(journal);
  }

  hasRole(role: Hex, account: Address): boolean {
    return this.members.has(key(role, account));
  }

  requireRole(role: Hex, account: Address): void {
    if (!this.hasRole(role, account))
      throw new CrossChainError("Unauthorized", `access denied: ${account} lacks role ${role}`, {
        role,
        account,
      });
  }

  grantRole(sender: Address, role: Hex, account: Address): void {
    this.requireRole(DEFAULT_ADMIN_ROLE, sender);
    this.setupRole(role, account, sender);
  }

  revokeRole(sender: Address, role: Hex, account: Address): void {
    this.requireRole(DEFAULT_ADMIN_ROLE, sender);
    this.drop(role, account, sender);
  }

  renounceRole(sender: Address, role: Hex): void {
    this.drop(role, sender, sender);
  }

  /** Ungated grant used once by `init`. */
  setupRole(role: Hex, account: Address, sender: Address): void {
    if (this.hasRole(role, account)) return;
    this.members.set(key(role, account), true);
    this.emit({ type: "RoleGranted", role, account, sender });
  }

  private drop(role: Hex, account: Address, sender: Address): void {
    if (!this.members.delete(key(role, account))) return;
    this.emit({ type: "RoleRevoked", role, account, sender });
  }
}
