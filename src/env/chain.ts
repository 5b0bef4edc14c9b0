import { CrossChainError } from "../core/errors";
import { Journal, JournaledLog, JournaledMap } from "../core/journal";
import type { EmittedEvent, MessageReceiver, Relay, UnitEvent } from "../core/types";
import { loggable, makeLogger, type ILogger } from "../logging";
import type { Address, ChainSelector } from "../types/brands";
import { Erc20 } from "./erc20";

/**
 * One isolated execution domain: native balances, tokens, deployed
 * relays/receivers and the event log, all behind a single journal.
 * Every external invocation should go through `transact`.
 */
export class Chain {
  readonly journal = new Journal();
  readonly log: ILogger;
  private readonly native: JournaledMap<Address, bigint>;
  private readonly events: JournaledLog<EmittedEvent>;
  private readonly tokens = new Map<Address, Erc20>();
  private readonly relays = new Map<Address, Relay>();
  private readonly receivers = new Map<Address, MessageReceiver>();

  constructor(
    readonly selector: ChainSelector,
    readonly name: string,
    log: ILogger = makeLogger("silent"),
  ) {
    this.log = log.child({ chain: name });
    this.native = new JournaledMap(this.journal);
    this.events = new JournaledLog(this.journal);
  }

  transact<T>(fn: () => T): T {
    return this.journal.run(fn);
  }

  /* ── native asset ───────────────────────────────────────── */

  fund(account: Address, amount: bigint): void {
    this.native.set(account, this.nativeBalanceOf(account) + amount);
  }

  nativeBalanceOf(account: Address): bigint {
    return this.native.get(account) ?? 0n;
  }

  transferNative(from: Address, to: Address, amount: bigint): void {
    const balance = this.nativeBalanceOf(from);
    if (balance < amount)
      throw new CrossChainError("InsufficientBalance", `native balance ${balance} below ${amount}`, {
        account: from,
        balance,
        amount,
      });
    this.native.set(from, balance - amount);
    this.native.set(to, this.nativeBalanceOf(to) + amount);
  }

  /* ── tokens ─────────────────────────────────────────────── */

  deployToken(address: Address, symbol: string): Erc20 {
    if (this.tokens.has(address))
      throw new CrossChainError("InvalidArgument", `token already deployed at ${address}`);
    const token = new Erc20(this.journal, address, symbol);
    this.tokens.set(address, token);
    return token;
  }

  hasToken(address: Address): boolean {
    return this.tokens.has(address);
  }

  token(address: Address): Erc20 {
    const token = this.tokens.get(address);
    if (!token) throw new CrossChainError("UnknownToken", `no token at ${address} on ${this.name}`);
    return token;
  }

  /* ── deployed collaborators ─────────────────────────────── */

  registerRelay(relay: Relay): void {
    this.relays.set(relay.address, relay);
  }

  relayAt(address: Address): Relay | undefined {
    return this.relays.get(address);
  }

  registerReceiver(receiver: MessageReceiver): void {
    this.receivers.set(receiver.address, receiver);
  }

  receiverAt(address: Address): MessageReceiver | undefined {
    return this.receivers.get(address);
  }

  /* ── events ─────────────────────────────────────────────── */

  emit(emitter: Address, event: UnitEvent): void {
    this.events.push({ ...event, emitter });
    const level = event.type === "MessageFailed" ? "warn" : "info";
    this.log[level]({ emitter, event: loggable(event) }, event.type);
  }

  eventsOf(emitter?: Address): EmittedEvent[] {
    return this.events.toArray().filter((e) => emitter === undefined || e.emitter === emitter);
  }
}
