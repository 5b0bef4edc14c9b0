import { CrossChainError } from "../core/errors";
import { JournaledCell, JournaledMap, type Journal } from "../core/journal";
import type { Address } from "../types/brands";

/** Fungible token ledger living on one chain. */
export class Erc20 {
  private readonly balances: JournaledMap<Address, bigint>;
  private readonly allowances: JournaledMap<string, bigint>;
  private readonly supply: JournaledCell<bigint>;

  constructor(
    journal: Journal,
    readonly address: Address,
    readonly symbol: string,
  ) {
    this.balances = new JournaledMap(journal);
    this.allowances = new JournaledMap(journal);
    this.supply = new JournaledCell(journal, 0n);
  }

  get totalSupply(): bigint {
    return this.supply.get();
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(`${owner}:${spender}`) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(`${owner}:${spender}`, amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount)
      throw new CrossChainError("InsufficientBalance", `${this.symbol}: balance ${balance} below ${amount}`, {
        account: from,
        balance,
        amount,
      });
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    const allowed = this.allowance(from, spender);
    if (allowed < amount)
      throw new CrossChainError("InsufficientAllowance", `${this.symbol}: allowance ${allowed} below ${amount}`, {
        owner: from,
        spender,
        allowed,
        amount,
      });
    this.transfer(from, to, amount);
    this.allowances.set(`${from}:${spender}`, allowed - amount);
  }

  mint(to: Address, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply.set(this.supply.get() + amount);
  }

  burn(from: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount)
      throw new CrossChainError("InsufficientBalance", `${this.symbol}: cannot burn ${amount}`, {
        account: from,
        balance,
        amount,
      });
    this.balances.set(from, balance - amount);
    this.supply.set(this.supply.get() - amount);
  }
}
