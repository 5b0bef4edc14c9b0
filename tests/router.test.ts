import { describe, it, expect } from "vitest";
import { buildOutboundMessage, decodeInbound, encodeOutbound } from "../src/codec/rlp";
import type { InboundMessage, MessageReceiver } from "../src/core/types";
import { Chain } from "../src/env/chain";
import { LocalRouter, type FeeSchedule } from "../src/relay/localRouter";
import { asChainSelector, asMessageId, ZERO_ADDRESS, type Address } from "../src/types/brands";
import { fromUtf8 } from "../src/utils/bytes";
import { ADMIN, LINK, PEER_ROUTER, RECEIVER, ROUTER, STRANGER, TKN } from "./helpers/addresses";
import { codeOf } from "./helpers/expect";
import { HOME, LINK_FEES, NATIVE_FEES, PEER } from "./helpers/fixture";

const fees = new Map<Address, FeeSchedule>([
  [ZERO_ADDRESS, NATIVE_FEES],
  [LINK, LINK_FEES],
]);

/** Receiver stub that keeps every decoded delivery and can be told to reject. */
const stubReceiver = () => {
  const got: { caller: Address; message: InboundMessage }[] = [];
  const state = { reject: false };
  const receiver: MessageReceiver = {
    address: RECEIVER,
    ccipReceive: (caller, raw) => {
      if (state.reject) throw new Error("receiver offline");
      got.push({ caller, message: decodeInbound(raw) });
    },
  };
  return { receiver, got, state };
};

const lane = () => {
  const chain = new Chain(HOME, "home");
  const peerChain = new Chain(PEER, "peer");
  const router = new LocalRouter(chain, ROUTER, { fees });
  const peerRouter = new LocalRouter(peerChain, PEER_ROUTER, { fees });
  router.connect(peerRouter);
  chain.fund(STRANGER, 1_000_000n);
  chain.fund(ADMIN, 1_000_000n);
  return { chain, peerChain, router, peerRouter };
};

const hello = buildOutboundMessage(RECEIVER, "hi", TKN, 0n, ZERO_ADDRESS);

describe("LocalRouter fees", () => {
  it("prices by base fee, encoded size and token leg", () => {
    const { router } = lane();
    const size = BigInt(encodeOutbound(hello).length);
    expect(router.getFee(PEER, hello)).toBe(1_000n + 10n * size);

    const withTokens = buildOutboundMessage(RECEIVER, "hi", TKN, 5n, ZERO_ADDRESS);
    expect(router.getFee(PEER, withTokens)).toBe(
      1_000n + 10n * BigInt(encodeOutbound(withTokens).length) + 500n,
    );

    const inLink = buildOutboundMessage(RECEIVER, "hi", TKN, 0n, LINK);
    expect(router.getFee(PEER, inLink)).toBe(100n + BigInt(encodeOutbound(inLink).length));
  });

  it("rejects unknown lanes, fee tokens and oversized gas limits", () => {
    const { router } = lane();
    expect(router.isChainSupported(PEER)).toBe(true);
    expect(router.isChainSupported(asChainSelector(99))).toBe(false);
    expect(codeOf(() => router.getFee(asChainSelector(99), hello))).toBe("UnsupportedChain");
    expect(codeOf(() => router.getFee(PEER, buildOutboundMessage(RECEIVER, "hi", TKN, 0n, TKN)))).toBe(
      "InvalidArgument",
    );
    expect(
      codeOf(() => router.getFee(PEER, buildOutboundMessage(RECEIVER, "hi", TKN, 0n, ZERO_ADDRESS, 3_000_001n))),
    ).toBe("InvalidArgument");
  });
});

describe("LocalRouter send", () => {
  it("collects the call value and queues the message", () => {
    const { chain, router } = lane();
    const fee = router.getFee(PEER, hello);
    const id = router.send(STRANGER, PEER, hello, fee);

    expect(chain.nativeBalanceOf(STRANGER)).toBe(1_000_000n - fee);
    expect(chain.nativeBalanceOf(ROUTER)).toBe(fee);
    expect(router.pending()).toMatchObject([{ id, from: STRANGER, seq: 1n, destination: PEER, receiver: RECEIVER }]);
  });

  it("refuses a call value below the fee", () => {
    const { chain, router } = lane();
    const fee = router.getFee(PEER, hello);
    expect(codeOf(() => router.send(STRANGER, PEER, hello, fee - 1n))).toBe("InsufficientBalance");
    expect(chain.nativeBalanceOf(STRANGER)).toBe(1_000_000n);
    expect(router.pending()).toEqual([]);
  });

  it("pulls a fee token and the transferred amount through allowances", () => {
    const { chain, router } = lane();
    const link = chain.deployToken(LINK, "LINK");
    const tkn = chain.deployToken(TKN, "TKN");
    const message = buildOutboundMessage(RECEIVER, "hi", TKN, 5n, LINK);
    const fee = router.getFee(PEER, message);
    link.mint(STRANGER, fee);
    link.approve(STRANGER, ROUTER, fee);
    tkn.mint(STRANGER, 5n);
    tkn.approve(STRANGER, ROUTER, 5n);

    router.send(STRANGER, PEER, message, 0n);

    expect(link.balanceOf(ROUTER)).toBe(fee);
    expect(tkn.balanceOf(ROUTER)).toBe(5n);
    expect(tkn.allowance(STRANGER, ROUTER)).toBe(0n);
  });

  it("assigns distinct ids to identical messages", () => {
    const { router } = lane();
    const fee = router.getFee(PEER, hello);
    const a = router.send(STRANGER, PEER, hello, fee);
    const b = router.send(STRANGER, PEER, hello, fee);
    expect(a).not.toBe(b);
    expect(router.pending().map((m) => m.seq)).toEqual([1n, 2n]);
  });
});

describe("LocalRouter delivery", () => {
  it("holds messages until the receiver exists, then delivers in sender order", () => {
    const { router, peerChain } = lane();
    const fee = router.getFee(PEER, hello);
    const fromStranger = router.send(STRANGER, PEER, hello, fee);
    const fromAdmin = router.send(ADMIN, PEER, hello, fee);

    expect(router.deliver()).toEqual([]);
    expect(router.pending()).toHaveLength(2);

    const stub = stubReceiver();
    peerChain.registerReceiver(stub.receiver);
    expect(router.deliver()).toEqual([
      { id: fromAdmin, status: "success" },
      { id: fromStranger, status: "success" },
    ]);
    expect(router.pending()).toEqual([]);

    const [first] = stub.got;
    expect(first.caller).toBe(PEER_ROUTER);
    expect(first.message.messageId).toBe(fromAdmin);
    expect(first.message.sourceChainSelector).toBe(HOME);
    expect(first.message.sender).toBe(ADMIN);
    expect(fromUtf8(first.message.data)).toBe("hi");
    expect(first.message.destTokenAmounts).toEqual([]);
  });

  it("mints transferred tokens to the receiver on the destination", () => {
    const { chain, peerChain, router } = lane();
    const tkn = chain.deployToken(TKN, "TKN");
    const remoteTkn = peerChain.deployToken(TKN, "TKN");
    const message = buildOutboundMessage(RECEIVER, "hi", TKN, 5n, ZERO_ADDRESS);
    tkn.mint(STRANGER, 5n);
    tkn.approve(STRANGER, ROUTER, 5n);
    router.send(STRANGER, PEER, message, router.getFee(PEER, message));

    const stub = stubReceiver();
    peerChain.registerReceiver(stub.receiver);
    router.deliver();

    expect(remoteTkn.balanceOf(RECEIVER)).toBe(5n);
    expect(stub.got[0].message.destTokenAmounts).toEqual([{ token: TKN, amount: 5n }]);
  });

  it("reports a rejected delivery, rolls it back and retries on demand", () => {
    const { chain, peerChain, router } = lane();
    const tkn = chain.deployToken(TKN, "TKN");
    const remoteTkn = peerChain.deployToken(TKN, "TKN");
    const message = buildOutboundMessage(RECEIVER, "hi", TKN, 5n, ZERO_ADDRESS);
    tkn.mint(STRANGER, 5n);
    tkn.approve(STRANGER, ROUTER, 5n);
    const id = router.send(STRANGER, PEER, message, router.getFee(PEER, message));

    const stub = stubReceiver();
    stub.state.reject = true;
    peerChain.registerReceiver(stub.receiver);

    expect(router.deliver()).toEqual([{ id, status: "failed", reason: "Error: receiver offline" }]);
    expect(router.failedDeliveries()).toEqual([id]);
    expect(remoteTkn.balanceOf(RECEIVER)).toBe(0n);

    stub.state.reject = false;
    expect(router.retryDelivery(id)).toEqual({ id, status: "success" });
    expect(router.failedDeliveries()).toEqual([]);
    expect(remoteTkn.balanceOf(RECEIVER)).toBe(5n);
    expect(stub.got).toHaveLength(1);
  });

  it("fails a delivery whose token is missing on the destination", () => {
    const { chain, peerChain, router } = lane();
    const tkn = chain.deployToken(TKN, "TKN");
    const message = buildOutboundMessage(RECEIVER, "hi", TKN, 5n, ZERO_ADDRESS);
    tkn.mint(STRANGER, 5n);
    tkn.approve(STRANGER, ROUTER, 5n);
    const id = router.send(STRANGER, PEER, message, router.getFee(PEER, message));

    const stub = stubReceiver();
    peerChain.registerReceiver(stub.receiver);
    expect(router.deliver()).toEqual([
      { id, status: "failed", reason: `UnknownToken: no token at ${TKN} on peer` },
    ]);
    expect(router.failedDeliveries()).toEqual([id]);
    expect(stub.got).toEqual([]);

    const remoteTkn = peerChain.deployToken(TKN, "TKN");
    expect(router.retryDelivery(id)).toEqual({ id, status: "success" });
    expect(remoteTkn.balanceOf(RECEIVER)).toBe(5n);
  });

  it("refuses to retry a delivery that never failed", () => {
    const { router } = lane();
    expect(codeOf(() => router.retryDelivery(asMessageId("0x" + "ab".repeat(32))))).toBe("MessageNotFailed");
  });
});
