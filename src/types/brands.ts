import { CrossChainError } from "../core/errors";

// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;
export type Address = Brand<Hex, "Address">;
export type ChainSelector = Brand<bigint, "ChainSelector">;
export type MessageId = Brand<Hex, "MessageId">;
export type Selector = Brand<Hex, "Selector">;

const MAX_U64 = 2n ** 64n - 1n;
const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const WORD_RE = /^0x[0-9a-fA-F]{64}$/;
const SELECTOR_RE = /^0x[0-9a-fA-F]{8}$/;

export const asAddress = (s: string): Address => {
  if (!ADDRESS_RE.test(s))
    throw new CrossChainError("InvalidArgument", `not an address: ${s}`);
  return s.toLowerCase() as Address;
};

export const asChainSelector = (n: bigint | number): ChainSelector => {
  const v = BigInt(n);
  if (v < 0n || v > MAX_U64)
    throw new CrossChainError("InvalidArgument", `chain selector out of range: ${v}`);
  return v as ChainSelector;
};

export const asMessageId = (s: string): MessageId => {
  if (!WORD_RE.test(s))
    throw new CrossChainError("InvalidArgument", `not a message id: ${s}`);
  return s.toLowerCase() as MessageId;
};

export const asSelector = (s: string): Selector => {
  if (!SELECTOR_RE.test(s))
    throw new CrossChainError("InvalidArgument", `not a selector: ${s}`);
  return s.toLowerCase() as Selector;
};

export const ZERO_ADDRESS = asAddress("0x" + "00".repeat(20));
