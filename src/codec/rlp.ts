// RLP wire codecs for the relay boundary.

import * as rlp from "rlp";
import {
  array,
  check,
  instance,
  length,
  maxLength,
  pipe,
  safeParse,
  strictTuple,
} from "valibot";
import { CrossChainError } from "../core/errors";
import type {
  ExtraArgs,
  InboundMessage,
  OutboundMessage,
  TokenAmount,
} from "../core/types";
import {
  asAddress,
  asChainSelector,
  asMessageId,
  type Address,
  type Hex,
} from "../types/brands";
import { bytesToBigint, bytesToHex, toPayloadBytes } from "../utils/bytes";

export type Item = Uint8Array | rlp.NestedUint8Array;

/* — constants — */
export const EXTRA_ARGS_V1_TAG: Hex = "0x97a657c9";
export const DEFAULT_GAS_LIMIT = 200_000n;
export const MAX_UINT256 = 2n ** 256n - 1n;

/* — layout schemas — */
const bytes = instance(Uint8Array);
const fixed = (n: number) => pipe(instance(Uint8Array), length(n));
const uint = (maxBytes: number) =>
  pipe(
    instance(Uint8Array),
    maxLength(maxBytes),
    check((b) => b.length === 0 || b[0] !== 0, "non-canonical integer"),
  );

const tokenAmountLayout = strictTuple([fixed(20), uint(32)]);

// [messageId, sourceChainSelector, sender, data, destTokenAmounts]
const inboundLayout = strictTuple([
  fixed(32),
  uint(8),
  fixed(20),
  bytes,
  array(tokenAmountLayout),
]);

// [tag, gasLimit]
const extraArgsLayout = strictTuple([fixed(4), uint(32)]);

/* — helpers — */
const decodeRaw = (raw: Uint8Array, what: string): Item => {
  try {
    return rlp.decode(raw);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new CrossChainError("MalformedPayload", `${what}: ${detail}`);
  }
};

const encTokenAmounts = (ts: readonly TokenAmount[]) =>
  ts.map((t) => [t.token, t.amount]);

const decTokenAmounts = (ts: [Uint8Array, Uint8Array][]): TokenAmount[] =>
  ts.map(([token, amount]) => ({
    token: asAddress(bytesToHex(token)),
    amount: bytesToBigint(amount),
  }));

/* — extra args — */
export const encodeExtraArgs = (a: ExtraArgs): Uint8Array =>
  rlp.encode([EXTRA_ARGS_V1_TAG, a.gasLimit]);

export const decodeExtraArgs = (raw: Uint8Array): ExtraArgs => {
  const parsed = safeParse(extraArgsLayout, decodeRaw(raw, "extra args"));
  if (!parsed.success)
    throw new CrossChainError("MalformedPayload", "extra args layout mismatch", {
      issues: parsed.issues.map((i) => i.message),
    });
  const [tag, gasLimit] = parsed.output;
  if (bytesToHex(tag) !== EXTRA_ARGS_V1_TAG)
    throw new CrossChainError("MalformedPayload", `unknown extra args tag ${bytesToHex(tag)}`);
  return { gasLimit: bytesToBigint(gasLimit) };
};

/* — outbound — */

/**
 * Builds the message handed to the relay. Always carries exactly one token
 * amount entry; a zero amount marks a payload-only message.
 */
export const buildOutboundMessage = (
  receiver: Address,
  payload: Uint8Array | string,
  token: Address,
  amount: bigint,
  feeToken: Address,
  gasLimit: bigint = DEFAULT_GAS_LIMIT,
): OutboundMessage => {
  if (amount < 0n)
    throw new CrossChainError("InvalidArgument", "token amount must not be negative");
  if (amount > MAX_UINT256)
    throw new CrossChainError("InvalidArgument", "token amount exceeds 256 bits");
  return {
    receiver,
    data: toPayloadBytes(payload),
    tokenAmounts: [{ token, amount }],
    feeToken,
    extraArgs: encodeExtraArgs({ gasLimit }),
  };
};

export const encodeOutbound = (m: OutboundMessage): Uint8Array =>
  rlp.encode([
    m.receiver,
    m.data,
    encTokenAmounts(m.tokenAmounts),
    m.feeToken,
    m.extraArgs,
  ]);

/* — inbound — */
export const encodeInbound = (m: InboundMessage): Uint8Array =>
  rlp.encode([
    m.messageId,
    m.sourceChainSelector,
    m.sender,
    m.data,
    encTokenAmounts(m.destTokenAmounts),
  ]);

export const decodeInbound = (raw: Uint8Array): InboundMessage => {
  const parsed = safeParse(inboundLayout, decodeRaw(raw, "inbound message"));
  if (!parsed.success)
    throw new CrossChainError("MalformedPayload", "inbound message layout mismatch", {
      issues: parsed.issues.map((i) => i.message),
    });
  const [id, source, sender, data, amounts] = parsed.output;
  return {
    messageId: asMessageId(bytesToHex(id)),
    sourceChainSelector: asChainSelector(bytesToBigint(source)),
    sender: asAddress(bytesToHex(sender)),
    data,
    destTokenAmounts: decTokenAmounts(amounts),
  };
};

/* — call arguments — */
const scalar = (item: Item | undefined, what: string): Uint8Array => {
  if (item instanceof Uint8Array) return item;
  throw new CrossChainError("MalformedPayload", `expected ${what} argument`);
};

export const readAddress = (item: Item | undefined): Address => {
  const b = scalar(item, "address");
  if (b.length !== 20)
    throw new CrossChainError("MalformedPayload", "address argument must be 20 bytes");
  return asAddress(bytesToHex(b));
};

export const readUint = (item: Item | undefined): bigint => {
  const b = scalar(item, "uint");
  if (b.length > 32)
    throw new CrossChainError("MalformedPayload", "uint argument wider than 256 bits");
  return bytesToBigint(b);
};

export const readBytes = (item: Item | undefined): Uint8Array => scalar(item, "bytes");
