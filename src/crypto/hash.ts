import { keccak_256 } from "@noble/hashes/sha3";
import * as rlp from "rlp";
import { asMessageId, asSelector } from "../types/brands";
import type { Address, ChainSelector, MessageId, Selector } from "../types/brands";
import { bytesToHex, utf8 } from "../utils/bytes";

export const keccak = (msg: Uint8Array): Uint8Array => keccak_256(msg);

/** 4-byte function selector, e.g. `mint(address,uint256)`. */
export const selectorOf = (signature: string): Selector =>
  asSelector(bytesToHex(keccak(utf8(signature)).slice(0, 4)));

/** 32-byte role id, keccak of the role name. */
export const roleId = (name: string) => bytesToHex(keccak(utf8(name)));

export const computeMessageId = (
  source: ChainSelector,
  destination: ChainSelector,
  sequence: bigint,
  sender: Address,
  encodedMessage: Uint8Array,
): MessageId =>
  asMessageId(
    bytesToHex(
      keccak(rlp.encode([source, destination, sequence, sender, encodedMessage])),
    ),
  );
