import { decodeExtraArgs, encodeInbound, encodeOutbound } from "../codec/rlp";
import { CrossChainError, reasonOf } from "../core/errors";
import { JournaledCell, JournaledMap } from "../core/journal";
import type { OutboundMessage, Relay, TokenAmount } from "../core/types";
import type { Chain } from "../env/chain";
import type { ILogger } from "../logging";
import { computeMessageId } from "../crypto/hash";
import { ZERO_ADDRESS, type Address, type ChainSelector, type MessageId } from "../types/brands";

export type FeeSchedule = {
  baseFee: bigint;
  bytePrice: bigint;
  tokenTransferFee: bigint;
};

export interface OutMsg {
  readonly id: MessageId;
  readonly from: Address;
  readonly seq: bigint;
  readonly destination: ChainSelector;
  readonly receiver: Address;
  readonly data: Uint8Array;
  readonly tokenAmounts: readonly TokenAmount[];
}

export type DeliveryReport =
  | { id: MessageId; status: "success" }
  | { id: MessageId; status: "failed"; reason: string };

export type RouterOptions = {
  fees: ReadonlyMap<Address, FeeSchedule>; // keyed by fee token, ZERO_ADDRESS = native
  maxGasLimit?: bigint;
  log?: ILogger;
};

/**
 * In-process transport between two chains. Collects fees and locks tokens
 * on `send`; `deliver` hands queued messages to the peer chain, one
 * destination transaction each.
 */
export class LocalRouter implements Relay {
  private readonly queue: JournaledMap<MessageId, OutMsg>;
  private readonly sequence: JournaledCell<bigint>;
  private readonly failed = new Map<MessageId, OutMsg>();
  private readonly peers = new Map<ChainSelector, LocalRouter>();
  private readonly fees: ReadonlyMap<Address, FeeSchedule>;
  private readonly maxGasLimit: bigint;
  private readonly log: ILogger;

  constructor(
    readonly chain: Chain,
    readonly address: Address,
    opts: RouterOptions,
  ) {
    this.queue = new JournaledMap(chain.journal);
    this.sequence = new JournaledCell(chain.journal, 0n);
    this.fees = opts.fees;
    this.maxGasLimit = opts.maxGasLimit ?? 3_000_000n;
    this.log = (opts.log ?? chain.log).child({ router: address });
    chain.registerRelay(this);
  }

  /** Opens a lane in both directions. */
  connect(peer: LocalRouter): void {
    this.peers.set(peer.chain.selector, peer);
    peer.peers.set(this.chain.selector, this);
  }

  isChainSupported(destination: ChainSelector): boolean {
    return this.peers.has(destination);
  }

  getFee(destination: ChainSelector, message: OutboundMessage): bigint {
    if (!this.isChainSupported(destination))
      throw new CrossChainError("UnsupportedChain", `no lane to chain ${destination}`, { destination });
    const schedule = this.fees.get(message.feeToken);
    if (!schedule)
      throw new CrossChainError("InvalidArgument", `fee token ${message.feeToken} not accepted`);
    const { gasLimit } = decodeExtraArgs(message.extraArgs);
    if (gasLimit > this.maxGasLimit)
      throw new CrossChainError("InvalidArgument", `gas limit ${gasLimit} above lane maximum ${this.maxGasLimit}`);
    const carriesTokens = message.tokenAmounts.some((t) => t.amount > 0n);
    return (
      schedule.baseFee +
      schedule.bytePrice * BigInt(encodeOutbound(message).length) +
      (carriesTokens ? schedule.tokenTransferFee : 0n)
    );
  }

  send(sender: Address, destination: ChainSelector, message: OutboundMessage, value: bigint): MessageId {
    const fee = this.getFee(destination, message);
    if (message.feeToken === ZERO_ADDRESS) {
      if (value < fee)
        throw new CrossChainError("InsufficientBalance", `call value ${value} below fee ${fee}`, { value, fee });
      this.chain.transferNative(sender, this.address, value);
    } else {
      this.chain.token(message.feeToken).transferFrom(this.address, sender, this.address, fee);
    }
    for (const t of message.tokenAmounts)
      if (t.amount > 0n) this.chain.token(t.token).transferFrom(this.address, sender, this.address, t.amount);

    const seq = this.sequence.get() + 1n;
    this.sequence.set(seq);
    const id = computeMessageId(this.chain.selector, destination, seq, sender, encodeOutbound(message));
    this.queue.set(id, {
      id,
      from: sender,
      seq,
      destination,
      receiver: message.receiver,
      data: message.data,
      tokenAmounts: message.tokenAmounts,
    });
    this.log.debug({ id, seq, destination: destination.toString(), fee: fee.toString() }, "message queued");
    return id;
  }

  pending(): OutMsg[] {
    return [...this.queue.entries()].map(([, m]) => m).sort(bySenderSeq);
  }

  failedDeliveries(): MessageId[] {
    return [...this.failed.keys()];
  }

  /**
   * Routes every queued message to its peer in (sender, seq) order.
   * Messages whose receiver is not deployed yet stay queued.
   */
  deliver(): DeliveryReport[] {
    const reports: DeliveryReport[] = [];
    for (const m of this.pending()) {
      const peer = this.peers.get(m.destination);
      if (!peer || !peer.chain.receiverAt(m.receiver)) continue;
      this.queue.delete(m.id);
      reports.push(this.attempt(peer, m));
    }
    return reports;
  }

  /** Manual re-execution of a delivery the receiver rejected. */
  retryDelivery(id: MessageId): DeliveryReport {
    const m = this.failed.get(id);
    const peer = m && this.peers.get(m.destination);
    if (!m || !peer)
      throw new CrossChainError("MessageNotFailed", `no failed delivery ${id}`, { id });
    this.failed.delete(id);
    return this.attempt(peer, m);
  }

  private attempt(peer: LocalRouter, m: OutMsg): DeliveryReport {
    try {
      peer.execute(this.chain.selector, m);
      return { id: m.id, status: "success" };
    } catch (e) {
      this.failed.set(m.id, m);
      const reason = reasonOf(e);
      this.log.warn({ id: m.id, reason }, "delivery rejected by receiver");
      return { id: m.id, status: "failed", reason };
    }
  }

  // Destination side: release tokens and call the receiver atomically. A leg
  // whose token is missing here fails the whole delivery with UnknownToken.
  private execute(source: ChainSelector, m: OutMsg): void {
    const receiver = this.chain.receiverAt(m.receiver);
    if (!receiver) throw new CrossChainError("InvalidArgument", `no receiver at ${m.receiver}`);
    this.chain.transact(() => {
      const destTokenAmounts = m.tokenAmounts.filter((t) => t.amount > 0n);
      for (const t of destTokenAmounts) this.chain.token(t.token).mint(m.receiver, t.amount);
      receiver.ccipReceive(
        this.address,
        encodeInbound({
          messageId: m.id,
          sourceChainSelector: source,
          sender: m.from,
          data: m.data,
          destTokenAmounts,
        }),
      );
    });
  }
}

const bySenderSeq = (a: OutMsg, b: OutMsg) =>
  a.from === b.from ? (a.seq < b.seq ? -1 : a.seq > b.seq ? 1 : 0) : a.from < b.from ? -1 : 1;
