import type { Address, ChainSelector, Hex, MessageId, Selector } from "../types/brands";

export type Big = bigint;

/* ── token amounts ───────────────────────────────────────── */
export type TokenAmount = {
  token: Address;
  amount: Big; // 0n marks a payload-only message
};

/* ── outbound wire message (unit → relay) ────────────────── */
export type ExtraArgs = {
  gasLimit: Big; // execution ceiling requested for the destination
};

export type OutboundMessage = {
  receiver: Address;
  data: Uint8Array;
  tokenAmounts: TokenAmount[];
  feeToken: Address; // ZERO_ADDRESS = native asset
  extraArgs: Uint8Array;
};

/* ── inbound wire message (relay → unit) ─────────────────── */
export type InboundMessage = {
  messageId: MessageId;
  sourceChainSelector: ChainSelector;
  sender: Address;
  data: Uint8Array;
  destTokenAmounts: TokenAmount[];
};

/* ── failure ledger ──────────────────────────────────────── */
export enum ErrorState {
  RESOLVED = 0,
  BASIC = 1,
}

export type FailureRecord = {
  messageId: MessageId;
  reason: Uint8Array;
  message: InboundMessage;
};

export type FailedMessage = {
  messageId: MessageId;
  errorCode: ErrorState;
};

/* ── dispatch outcome (captured, never thrown across the boundary) ── */
export type Applied = { ok: true };
export type Failed = { ok: false; reason: Uint8Array };
export type ApplyResult = Applied | Failed;

/* ── emitted records ─────────────────────────────────────── */
export type UnitEvent =
  | {
      type: "MessageSent";
      id: MessageId;
      destinationDomain: ChainSelector;
      receiver: Address;
      token: Address;
      amount: Big;
      feeToken: Address;
      fee: Big;
    }
  | {
      type: "MessageReceived";
      id: MessageId;
      sourceDomain: ChainSelector;
      sender: Address;
      selector: Hex;
      token: Address;
      amount: Big;
    }
  | { type: "MessageFailed"; id: MessageId; reason: Uint8Array }
  | { type: "MessageRecovered"; id: MessageId }
  | {
      type: "AllowlistUpdated";
      list: "destination" | "source" | "sender";
      key: string;
      allowed: boolean;
    }
  | { type: "RouterUpdated"; previous: Address; next: Address }
  | { type: "FeeTokenUpdated"; previous: Address; next: Address }
  | { type: "RoleGranted"; role: Hex; account: Address; sender: Address }
  | { type: "RoleRevoked"; role: Hex; account: Address; sender: Address }
  | { type: "Initialized"; name: string; symbol: string }
  | { type: "FacetCut"; facet: string; action: "add" | "remove"; selectors: Selector[] };

export type EmittedEvent = UnitEvent & { emitter: Address };

/* ── external collaborators ──────────────────────────────── */

/** Transport relay as seen from the sending unit. */
export interface Relay {
  readonly address: Address;
  isChainSupported(destination: ChainSelector): boolean;
  getFee(destination: ChainSelector, message: OutboundMessage): Big;
  send(
    sender: Address,
    destination: ChainSelector,
    message: OutboundMessage,
    value: Big,
  ): MessageId;
}

/** Anything a relay may hand inbound wire bytes to. */
export interface MessageReceiver {
  readonly address: Address;
  ccipReceive(caller: Address, raw: Uint8Array): void;
}
