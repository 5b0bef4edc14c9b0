import type { Address, ChainSelector, Hex } from "../types/brands";
import type { AccessControl } from "./access";
import { DEFAULT_ADMIN_ROLE } from "./access";
import { JournaledMap, type Journal } from "./journal";
import type { UnitEvent } from "./types";

const senderKey = (domain: ChainSelector, participant: Address) => `${domain}:${participant}`;

/**
 * Three independent deny-by-default sets consulted before any cross-chain
 * operation. Senders are scoped to the source domain they are allowed from.
 * Reads never fail; setters require the admin role and are idempotent.
 */
export class AllowlistStore {
  private readonly destinations: JournaledMap<ChainSelector, boolean>;
  private readonly sources: JournaledMap<ChainSelector, boolean>;
  private readonly senders: JournaledMap<string, boolean>;

  constructor(
    journal: Journal,
    private readonly access: AccessControl,
    private readonly emit: (e: UnitEvent) => void,
    private readonly adminRole: Hex = DEFAULT_ADMIN_ROLE,
  ) {
    this.destinations = new JournaledMap(journal);
    this.sources = new JournaledMap(journal);
    this.senders = new JournaledMap(journal);
  }

  isDestinationAllowed(domain: ChainSelector): boolean {
    return this.destinations.get(domain) ?? false;
  }

  isSourceAllowed(domain: ChainSelector): boolean {
    return this.sources.get(domain) ?? false;
  }

  isSenderAllowed(domain: ChainSelector, participant: Address): boolean {
    return this.senders.get(senderKey(domain, participant)) ?? false;
  }

  allowlistDestinationChain(caller: Address, domain: ChainSelector, allowed: boolean): void {
    this.access.requireRole(this.adminRole, caller);
    if (this.isDestinationAllowed(domain) === allowed) return;
    this.destinations.set(domain, allowed);
    this.emit({ type: "AllowlistUpdated", list: "destination", key: domain.toString(), allowed });
  }

  allowlistSourceChain(caller: Address, domain: ChainSelector, allowed: boolean): void {
    this.access.requireRole(this.adminRole, caller);
    if (this.isSourceAllowed(domain) === allowed) return;
    this.sources.set(domain, allowed);
    this.emit({ type: "AllowlistUpdated", list: "source", key: domain.toString(), allowed });
  }

  allowlistSender(caller: Address, domain: ChainSelector, participant: Address, allowed: boolean): void {
    this.access.requireRole(this.adminRole, caller);
    if (this.isSenderAllowed(domain, participant) === allowed) return;
    const key = senderKey(domain, participant);
    this.senders.set(key, allowed);
    this.emit({ type: "AllowlistUpdated", list: "sender", key, allowed });
  }
}
