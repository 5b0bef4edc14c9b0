import * as rlp from "rlp";
import { readAddress, readUint } from "../codec/rlp";
import { MINTER_ROLE } from "../core/access";
import { encodeCall, type Facet } from "../core/dispatch";
import { CrossChainError } from "../core/errors";
import { JournaledMap } from "../core/journal";
import type { Unit } from "../core/unit";
import { asChainSelector, ZERO_ADDRESS, type Address } from "../types/brands";
import { utf8 } from "../utils/bytes";

export const NFT = {
  name: "name()",
  symbol: "symbol()",
  tokenURI: "tokenURI(uint256)",
  mint: "mint(address,uint256)",
  burn: "burn(uint256)",
  ownerOf: "ownerOf(uint256)",
  balanceOf: "balanceOf(address)",
  approve: "approve(address,uint256)",
  getApproved: "getApproved(uint256)",
  setApprovalForAll: "setApprovalForAll(address,bool)",
  isApprovedForAll: "isApprovedForAll(address,address)",
  transferFrom: "transferFrom(address,address,uint256)",
  crossChainTransfer: "crossChainTransfer(uint64,address,address,uint256)",
} as const;

const flag = (b: boolean) => (b ? 1n : 0n);

/**
 * Burn-and-mint collectible. Mints arrive either from a minter or, for
 * relayed payloads, from the unit itself. Bools travel as 0/1 uints.
 */
export const createNftFacet = (unit: Unit): Facet => {
  const owners = new JournaledMap<bigint, Address>(unit.chain.journal);
  const balances = new JournaledMap<Address, bigint>(unit.chain.journal);
  const approvals = new JournaledMap<bigint, Address>(unit.chain.journal);
  const operators = new JournaledMap<string, true>(unit.chain.journal);

  const ownerOf = (tokenId: bigint): Address => {
    const owner = owners.get(tokenId);
    if (!owner) throw new CrossChainError("InvalidArgument", `token ${tokenId} does not exist`);
    return owner;
  };

  const operatorKey = (owner: Address, operator: Address) => `${owner}:${operator}`;
  const isOperator = (owner: Address, operator: Address) => operators.has(operatorKey(owner, operator));

  const credit = (to: Address, tokenId: bigint) => {
    owners.set(tokenId, to);
    balances.set(to, (balances.get(to) ?? 0n) + 1n);
  };

  const debit = (owner: Address, tokenId: bigint) => {
    owners.delete(tokenId);
    approvals.delete(tokenId);
    balances.set(owner, (balances.get(owner) ?? 1n) - 1n);
  };

  const mint = (to: Address, tokenId: bigint) => {
    if (to === ZERO_ADDRESS) throw new CrossChainError("InvalidArgument", "mint to the zero address");
    if (owners.has(tokenId)) throw new CrossChainError("InvalidArgument", `token ${tokenId} already minted`);
    credit(to, tokenId);
  };

  const burn = (sender: Address, tokenId: bigint) => {
    const owner = ownerOf(tokenId);
    if (owner !== sender)
      throw new CrossChainError("TokenNotOwned", `${sender} does not own token ${tokenId}`, { tokenId });
    debit(owner, tokenId);
  };

  return {
    name: "nft",
    functions: {
      [NFT.name]: () => rlp.encode(utf8(unit.name)),

      [NFT.symbol]: () => rlp.encode(utf8(unit.symbol)),

      [NFT.tokenURI]: (_ctx, [tokenId]) => {
        const id = readUint(tokenId);
        ownerOf(id);
        return rlp.encode(utf8(`${unit.baseUri}${id}`));
      },

      [NFT.mint]: ({ sender }, [to, tokenId]) => {
        if (sender !== unit.address && !unit.access.hasRole(MINTER_ROLE, sender))
          throw new CrossChainError("Unauthorized", `access denied: ${sender} may not mint`);
        mint(readAddress(to), readUint(tokenId));
      },

      [NFT.burn]: ({ sender }, [tokenId]) => burn(sender, readUint(tokenId)),

      [NFT.ownerOf]: (_ctx, [tokenId]) => rlp.encode(ownerOf(readUint(tokenId))),

      [NFT.balanceOf]: (_ctx, [owner]) => rlp.encode(balances.get(readAddress(owner)) ?? 0n),

      [NFT.approve]: ({ sender }, [spender, tokenId]) => {
        const id = readUint(tokenId);
        const owner = ownerOf(id);
        if (sender !== owner && !isOperator(owner, sender))
          throw new CrossChainError("TokenNotOwned", `${sender} may not approve token ${id}`, { tokenId: id });
        const to = readAddress(spender);
        if (to === ZERO_ADDRESS) approvals.delete(id);
        else approvals.set(id, to);
      },

      [NFT.getApproved]: (_ctx, [tokenId]) => {
        const id = readUint(tokenId);
        ownerOf(id);
        return rlp.encode(approvals.get(id) ?? ZERO_ADDRESS);
      },

      [NFT.setApprovalForAll]: ({ sender }, [operator, approved]) => {
        const key = operatorKey(sender, readAddress(operator));
        if (readUint(approved) !== 0n) operators.set(key, true);
        else operators.delete(key);
      },

      [NFT.isApprovedForAll]: (_ctx, [owner, operator]) =>
        rlp.encode(flag(isOperator(readAddress(owner), readAddress(operator)))),

      [NFT.transferFrom]: ({ sender }, [from, to, tokenId]) => {
        const id = readUint(tokenId);
        const owner = ownerOf(id);
        const source = readAddress(from);
        const recipient = readAddress(to);
        if (source !== owner)
          throw new CrossChainError("TokenNotOwned", `${source} does not own token ${id}`, { tokenId: id });
        if (sender !== owner && approvals.get(id) !== sender && !isOperator(owner, sender))
          throw new CrossChainError("Unauthorized", `access denied: ${sender} may not move token ${id}`);
        if (recipient === ZERO_ADDRESS)
          throw new CrossChainError("InvalidArgument", "transfer to the zero address");
        debit(owner, id);
        credit(recipient, id);
      },

      // burns here, mints `to` on the remote unit; the fee comes from this unit
      [NFT.crossChainTransfer]: ({ sender }, [destination, remoteUnit, to, tokenId]) => {
        const id = readUint(tokenId);
        const recipient = readAddress(to);
        burn(sender, id);
        const messageId = unit.messenger.send(
          asChainSelector(readUint(destination)),
          readAddress(remoteUnit),
          encodeCall(NFT.mint, [recipient, id]),
          ZERO_ADDRESS,
          0n,
          unit.feeToken,
        );
        return rlp.encode(messageId);
      },
    },
  };
};
