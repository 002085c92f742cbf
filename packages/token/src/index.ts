import { z } from 'zod';
import {
  AddressSchema,
  TransferFailedError,
  UintSchema,
  type Address,
} from '@semdrop/core';

/**
 * Moves `amount` of `token` from `from` to `to`. Rejects with
 * TransferFailedError and leaves balances untouched when it cannot.
 */
export interface TokenTransferAdapter {
  transferFrom(token: Address, from: Address, to: Address, amount: bigint): Promise<void>;
}

export const TokenBankSnapshotSchema = z.object({
  balances: z.array(
    z.object({ token: AddressSchema, owner: AddressSchema, amount: z.string() })
  ),
  allowances: z.array(
    z.object({
      token: AddressSchema,
      owner: AddressSchema,
      spender: AddressSchema,
      amount: z.string(),
    })
  ),
});

export type TokenBankSnapshot = z.input<typeof TokenBankSnapshotSchema>;

function key(...parts: Address[]): string {
  return parts.map((part) => part.toLowerCase()).join(':');
}

interface BalanceEntry {
  token: Address;
  owner: Address;
  amount: bigint;
}

interface AllowanceEntry extends BalanceEntry {
  spender: Address;
}

/**
 * Fungible-token balances and allowances held in process. Good enough to run
 * claims end to end without a chain.
 */
export class InMemoryTokenBank {
  private balances: Map<string, BalanceEntry> = new Map();
  private allowances: Map<string, AllowanceEntry> = new Map();

  mint(token: Address, to: Address, amount: bigint): void {
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(key(token, owner, spender), { token, owner, spender, amount });
  }

  balanceOf(token: Address, owner: Address): bigint {
    return this.balances.get(key(token, owner))?.amount ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(key(token, owner, spender))?.amount ?? 0n;
  }

  /**
   * Transfer adapter that spends allowances granted to `spender`.
   */
  adapterFor(spender: Address): TokenTransferAdapter {
    return {
      transferFrom: async (token, from, to, amount) => {
        this.transferFrom(spender, token, from, to, amount);
      },
    };
  }

  snapshot(): TokenBankSnapshot {
    return {
      balances: Array.from(this.balances.values(), (entry) => ({
        token: entry.token,
        owner: entry.owner,
        amount: entry.amount.toString(),
      })),
      allowances: Array.from(this.allowances.values(), (entry) => ({
        token: entry.token,
        owner: entry.owner,
        spender: entry.spender,
        amount: entry.amount.toString(),
      })),
    };
  }

  static from(snapshot: TokenBankSnapshot): InMemoryTokenBank {
    const parsed = TokenBankSnapshotSchema.parse(snapshot);
    const bank = new InMemoryTokenBank();
    for (const entry of parsed.balances) {
      bank.setBalance(entry.token, entry.owner, UintSchema.parse(entry.amount));
    }
    for (const entry of parsed.allowances) {
      bank.approve(entry.token, entry.owner, entry.spender, UintSchema.parse(entry.amount));
    }
    return bank;
  }

  private transferFrom(spender: Address, token: Address, from: Address, to: Address, amount: bigint): void {
    const allowed = this.allowance(token, from, spender);
    if (allowed < amount) {
      throw new TransferFailedError(`Insufficient allowance: ${allowed} < ${amount}`);
    }
    const balance = this.balanceOf(token, from);
    if (balance < amount) {
      throw new TransferFailedError(`Insufficient balance: ${balance} < ${amount}`);
    }

    this.approve(token, from, spender, allowed - amount);
    this.setBalance(token, from, balance - amount);
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
  }

  private setBalance(token: Address, owner: Address, amount: bigint): void {
    this.balances.set(key(token, owner), { token, owner, amount });
  }
}
