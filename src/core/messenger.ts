import { buildOutboundMessage, decodeInbound } from "../codec/rlp";
import type { Chain } from "../env/chain";
import type { ILogger } from "../logging";
import { ZERO_ADDRESS, type Address, type ChainSelector, type MessageId } from "../types/brands";
import { bytesToHex, fromUtf8, utf8 } from "../utils/bytes";
import { DEFAULT_ADMIN_ROLE, type AccessControl } from "./access";
import type { AllowlistStore } from "./allowlist";
import { CrossChainError, reasonOf } from "./errors";
import type { FailureLedger } from "./ledger";
import type { ApplyResult, Relay, UnitEvent } from "./types";

/** What the messenger needs from the unit that hosts it. */
export interface MessengerHost {
  readonly address: Address;
  readonly chain: Chain;
  readonly gasLimit: bigint;
  router(): Address;
  selfCall(calldata: Uint8Array): Uint8Array;
  emit(e: UnitEvent): void;
}

/**
 * Allowlisted send/receive over the registered relay, plus the failure
 * ledger recovery path. Methods here run inside the caller's transaction;
 * the hosting unit opens one per external invocation.
 */
export class CrossChainMessenger {
  constructor(
    private readonly host: MessengerHost,
    private readonly allowlist: AllowlistStore,
    private readonly ledger: FailureLedger,
    private readonly access: AccessControl,
    private readonly log: ILogger,
  ) {}

  /* ── outbound ───────────────────────────────────────────── */

  send(
    destination: ChainSelector,
    receiver: Address,
    payload: Uint8Array | string,
    token: Address,
    amount: bigint,
    feeToken: Address,
  ): MessageId {
    if (!this.allowlist.isDestinationAllowed(destination))
      throw new CrossChainError(
        "DestinationChainNotAllowlisted",
        `destination chain ${destination} is not allowlisted`,
        { destination },
      );

    const { chain, address: self } = this.host;
    const relay = this.relay();
    const message = buildOutboundMessage(receiver, payload, token, amount, feeToken, this.host.gasLimit);
    const fee = relay.getFee(destination, message);

    // fee first, then the token leg; one allowance per asset
    const approvals = new Map<Address, bigint>();
    let value = 0n;
    if (feeToken === ZERO_ADDRESS) {
      const balance = chain.nativeBalanceOf(self);
      if (balance < fee)
        throw new CrossChainError("InsufficientBalance", `native balance ${balance} below fee ${fee}`, {
          balance,
          fee,
        });
      value = fee;
    } else {
      const balance = chain.token(feeToken).balanceOf(self);
      if (balance < fee)
        throw new CrossChainError("InsufficientBalance", `fee token balance ${balance} below fee ${fee}`, {
          balance,
          fee,
          feeToken,
        });
      approvals.set(feeToken, fee);
    }
    if (amount > 0n) approvals.set(token, (approvals.get(token) ?? 0n) + amount);
    for (const [asset, allowance] of approvals) chain.token(asset).approve(self, relay.address, allowance);

    const id = relay.send(self, destination, message, value);
    this.host.emit({
      type: "MessageSent",
      id,
      destinationDomain: destination,
      receiver,
      token,
      amount,
      feeToken,
      fee,
    });
    return id;
  }

  /* ── inbound ────────────────────────────────────────────── */

  receive(caller: Address, raw: Uint8Array): ApplyResult {
    const router = this.host.router();
    if (router === ZERO_ADDRESS || caller !== router)
      throw new CrossChainError("InvalidRouter", `caller ${caller} is not the registered router`, { caller });

    const message = decodeInbound(raw);
    if (!this.allowlist.isSourceAllowed(message.sourceChainSelector))
      throw new CrossChainError(
        "SourceChainNotAllowed",
        `source chain ${message.sourceChainSelector} is not allowlisted`,
        { source: message.sourceChainSelector },
      );
    if (!this.allowlist.isSenderAllowed(message.sourceChainSelector, message.sender))
      throw new CrossChainError(
        "SenderNotAllowed",
        `sender ${message.sender} is not allowlisted on chain ${message.sourceChainSelector}`,
        { source: message.sourceChainSelector, sender: message.sender },
      );

    // all checks are done; only now re-enter the dispatch table
    const result = this.apply(message.data);
    if (result.ok) {
      const [head] = message.destTokenAmounts;
      this.host.emit({
        type: "MessageReceived",
        id: message.messageId,
        sourceDomain: message.sourceChainSelector,
        sender: message.sender,
        selector: bytesToHex(message.data.subarray(0, 4)),
        token: head?.token ?? ZERO_ADDRESS,
        amount: head?.amount ?? 0n,
      });
    } else {
      this.ledger.record(message, result.reason);
      this.host.emit({ type: "MessageFailed", id: message.messageId, reason: result.reason });
    }
    return result;
  }

  /* ── recovery ───────────────────────────────────────────── */

  retryFailedMessage(caller: Address, id: MessageId, payload?: Uint8Array): ApplyResult {
    this.access.requireRole(DEFAULT_ADMIN_ROLE, caller);
    const record = this.ledger.get(id);
    if (!record)
      throw new CrossChainError("MessageNotFailed", `message ${id} has no failure record`, { id });

    const result = this.apply(payload ?? record.message.data);
    if (result.ok) {
      this.ledger.clear(id);
      this.host.emit({ type: "MessageRecovered", id });
    } else {
      this.ledger.updateReason(id, result.reason);
      this.log.warn({ id, reason: fromUtf8(result.reason) }, "retry failed");
    }
    return result;
  }

  /* ── helpers ────────────────────────────────────────────── */

  private relay(): Relay {
    const router = this.host.router();
    const relay = router === ZERO_ADDRESS ? undefined : this.host.chain.relayAt(router);
    if (!relay)
      throw new CrossChainError("InvalidRouter", `no relay registered at ${router}`, { router });
    return relay;
  }

  // Nested checkpoint: a failing payload leaves no partial effects behind.
  private apply(data: Uint8Array): ApplyResult {
    try {
      this.host.chain.journal.run(() => this.host.selfCall(data));
      return { ok: true };
    } catch (e) {
      this.log.debug({ err: reasonOf(e) }, "payload application failed");
      return { ok: false, reason: utf8(reasonOf(e)) };
    }
  }
}
