import { nonEmpty, object, pipe, safeParse, string } from "valibot";
import { DEFAULT_GAS_LIMIT } from "../codec/rlp";
import type { Chain } from "../env/chain";
import type { ILogger } from "../logging";
import {
  asAddress,
  ZERO_ADDRESS,
  type Address,
  type ChainSelector,
  type Hex,
  type MessageId,
  type Selector,
} from "../types/brands";
import { AccessControl, DEFAULT_ADMIN_ROLE } from "./access";
import { AllowlistStore } from "./allowlist";
import { DispatchTable, type Facet } from "./dispatch";
import { CrossChainError } from "./errors";
import { JournaledCell } from "./journal";
import { FailureLedger } from "./ledger";
import { CrossChainMessenger } from "./messenger";
import type {
  ApplyResult,
  ErrorState,
  FailedMessage,
  FailureRecord,
  MessageReceiver,
  UnitEvent,
} from "./types";

export type UnitParams = {
  name: string;
  symbol: string;
  baseUri: string;
  router: Address;
  feeToken: Address;
};

/** One upgrade step: facets to drop by name, then facets to add. */
export type FacetCut = {
  remove?: readonly string[];
  add?: readonly Facet[];
};

export type UnitOptions = {
  log?: ILogger;
  gasLimit?: bigint;
};

const paramsSchema = object({
  name: pipe(string(), nonEmpty("name is required")),
  symbol: pipe(string(), nonEmpty("symbol is required")),
  baseUri: string(),
  router: string(),
  feeToken: string(),
});

type Settings = UnitParams & { initialized: boolean };

const UNSET: Settings = {
  name: "",
  symbol: "",
  baseUri: "",
  router: ZERO_ADDRESS,
  feeToken: ZERO_ADDRESS,
  initialized: false,
};

/**
 * The upgradeable unit: one address, one dispatch table of facets, and the
 * cross-chain messaging core. Each public method is one transaction on the
 * unit's chain.
 */
export class Unit implements MessageReceiver {
  readonly access: AccessControl;
  readonly allowlist: AllowlistStore;
  readonly ledger: FailureLedger;
  readonly messenger: CrossChainMessenger;
  readonly gasLimit: bigint;
  private readonly dispatch: DispatchTable;
  private readonly settings: JournaledCell<Settings>;
  private readonly log: ILogger;

  constructor(
    readonly chain: Chain,
    readonly address: Address,
    opts: UnitOptions = {},
  ) {
    this.log = (opts.log ?? chain.log).child({ unit: address });
    this.gasLimit = opts.gasLimit ?? DEFAULT_GAS_LIMIT;
    this.settings = new JournaledCell(chain.journal, UNSET);
    this.dispatch = new DispatchTable(chain.journal);
    const emit = (e: UnitEvent) => chain.emit(address, e);
    this.access = new AccessControl(chain.journal, emit);
    this.allowlist = new AllowlistStore(chain.journal, this.access, emit);
    this.ledger = new FailureLedger(chain.journal);
    this.messenger = new CrossChainMessenger(
      {
        address,
        chain,
        gasLimit: this.gasLimit,
        router: () => this.settings.get().router,
        selfCall: (calldata) => this.dispatch.dispatch({ sender: address }, calldata),
        emit,
      },
      this.allowlist,
      this.ledger,
      this.access,
      this.log,
    );
  }

  /* ── provisioning ───────────────────────────────────────── */

  init(caller: Address, params: UnitParams): void {
    this.chain.transact(() => {
      if (this.settings.get().initialized)
        throw new CrossChainError("AlreadyInitialized", `unit ${this.address} is already initialized`);
      const parsed = safeParse(paramsSchema, params);
      if (!parsed.success)
        throw new CrossChainError("InvalidArgument", parsed.issues[0].message);
      this.settings.set({
        ...parsed.output,
        router: asAddress(parsed.output.router),
        feeToken: asAddress(parsed.output.feeToken),
        initialized: true,
      });
      this.access.setupRole(DEFAULT_ADMIN_ROLE, caller, caller);
      this.chain.emit(this.address, { type: "Initialized", name: params.name, symbol: params.symbol });
    });
  }

  get name(): string {
    return this.settings.get().name;
  }

  get symbol(): string {
    return this.settings.get().symbol;
  }

  get baseUri(): string {
    return this.settings.get().baseUri;
  }

  get router(): Address {
    return this.settings.get().router;
  }

  get feeToken(): Address {
    return this.settings.get().feeToken;
  }

  setRouter(caller: Address, next: Address): void {
    this.tx(() => {
      this.access.requireRole(DEFAULT_ADMIN_ROLE, caller);
      const previous = this.router;
      this.settings.set({ ...this.settings.get(), router: next });
      this.chain.emit(this.address, { type: "RouterUpdated", previous, next });
    });
  }

  setFeeToken(caller: Address, next: Address): void {
    this.tx(() => {
      this.access.requireRole(DEFAULT_ADMIN_ROLE, caller);
      const previous = this.feeToken;
      this.settings.set({ ...this.settings.get(), feeToken: next });
      this.chain.emit(this.address, { type: "FeeTokenUpdated", previous, next });
    });
  }

  /* ── access control ─────────────────────────────────────── */

  hasRole(role: Hex, account: Address): boolean {
    return this.access.hasRole(role, account);
  }

  grantRole(caller: Address, role: Hex, account: Address): void {
    this.tx(() => this.access.grantRole(caller, role, account));
  }

  revokeRole(caller: Address, role: Hex, account: Address): void {
    this.tx(() => this.access.revokeRole(caller, role, account));
  }

  renounceRole(caller: Address, role: Hex): void {
    this.tx(() => this.access.renounceRole(caller, role));
  }

  /* ── allowlists ─────────────────────────────────────────── */

  allowlistDestinationChain(caller: Address, domain: ChainSelector, allowed: boolean): void {
    this.tx(() => this.allowlist.allowlistDestinationChain(caller, domain, allowed));
  }

  allowlistSourceChain(caller: Address, domain: ChainSelector, allowed: boolean): void {
    this.tx(() => this.allowlist.allowlistSourceChain(caller, domain, allowed));
  }

  allowlistSender(caller: Address, domain: ChainSelector, participant: Address, allowed: boolean): void {
    this.tx(() => this.allowlist.allowlistSender(caller, domain, participant, allowed));
  }

  /* ── facets ─────────────────────────────────────────────── */

  /** Admin-gated facet upgrade; the whole cut applies or none of it does. */
  diamondCut(caller: Address, cut: FacetCut): void {
    this.tx(() => {
      this.access.requireRole(DEFAULT_ADMIN_ROLE, caller);
      for (const name of cut.remove ?? []) {
        const selectors = this.dispatch.removeFacet(name);
        if (selectors.length === 0)
          throw new CrossChainError("InvalidArgument", `no facet named ${name}`);
        this.chain.emit(this.address, { type: "FacetCut", facet: name, action: "remove", selectors });
      }
      for (const facet of cut.add ?? []) {
        const selectors = this.dispatch.addFacet(facet);
        this.chain.emit(this.address, { type: "FacetCut", facet: facet.name, action: "add", selectors });
      }
    });
  }

  facetOf(selector: Selector): string | undefined {
    return this.dispatch.facetOf(selector);
  }

  selectors(): Selector[] {
    return this.dispatch.selectors();
  }

  /** External call routed through the dispatch table. */
  call(sender: Address, calldata: Uint8Array): Uint8Array {
    return this.tx(() => this.dispatch.dispatch({ sender }, calldata));
  }

  /* ── messaging ──────────────────────────────────────────── */

  /** `payload` bytes go out as given; a string is sent as its UTF-8 text. */
  send(
    destination: ChainSelector,
    receiver: Address,
    payload: Uint8Array | string,
    token: Address,
    amount: bigint,
    feeToken: Address,
  ): MessageId {
    return this.tx(() => this.messenger.send(destination, receiver, payload, token, amount, feeToken));
  }

  ccipReceive(caller: Address, raw: Uint8Array): void {
    this.tx(() => this.messenger.receive(caller, raw));
  }

  retryFailedMessage(caller: Address, id: MessageId, payload?: Uint8Array): ApplyResult {
    return this.tx(() => this.messenger.retryFailedMessage(caller, id, payload));
  }

  getFailedMessages(offset = 0, limit?: number): FailedMessage[] {
    return this.ledger.list(offset, limit);
  }

  getFailedMessage(id: MessageId): FailureRecord | undefined {
    return this.ledger.get(id);
  }

  errorStateOf(id: MessageId): ErrorState {
    return this.ledger.errorStateOf(id);
  }

  private tx<T>(fn: () => T): T {
    if (!this.settings.get().initialized)
      throw new CrossChainError("NotInitialized", `unit ${this.address} is not initialized`);
    return this.chain.transact(fn);
  }
}
