import type { Address } from "@ethereumjs/util";
import type { Word } from "./word.js";

/** Per-address bundle of balance, code and persistent slots. */
export interface AccountRecord {
  balance: Word;
  readonly code: Uint8Array;
  readonly slots: Map<Word, Word>;
}

/** Plain-data view of one account, as returned by `Storage.dump`. */
export interface AccountSnapshot {
  balance: Word;
  code: Uint8Array;
  slots: Map<Word, Word>;
}

const EMPTY_CODE = new Uint8Array(0);

function key(address: Address): string {
  return address.toString();
}

/**
 * Account store. Unknown addresses and unset slots read as zero / empty code;
 * writing zero removes the slot.
 */
export class Storage {
  private readonly accountsByAddress = new Map<string, AccountRecord>();

  get(address: Address, slot: Word): Word {
    return this.accountsByAddress.get(key(address))?.slots.get(slot) ?? 0n;
  }

  set(address: Address, slot: Word, value: Word): void {
    const account = this.getOrCreate(address);
    if (value === 0n) {
      account.slots.delete(slot);
    } else {
      account.slots.set(slot, value);
    }
  }

  codeOf(address: Address): Uint8Array {
    return this.accountsByAddress.get(key(address))?.code ?? EMPTY_CODE;
  }

  /** Install code, keeping the account's balance and slots. */
  setCode(address: Address, code: Uint8Array): void {
    const existing = this.accountsByAddress.get(key(address));
    this.accountsByAddress.set(key(address), {
      balance: existing?.balance ?? 0n,
      code: code.slice(),
      slots: existing?.slots ?? new Map<Word, Word>(),
    });
  }

  balanceOf(address: Address): Word {
    return this.accountsByAddress.get(key(address))?.balance ?? 0n;
  }

  setBalance(address: Address, balance: Word): void {
    this.getOrCreate(address).balance = balance;
  }

  has(address: Address): boolean {
    return this.accountsByAddress.has(key(address));
  }

  clear(): void {
    this.accountsByAddress.clear();
  }

  /** Deep copy; writes to the copy never reach this store. */
  clone(): Storage {
    const copy = new Storage();
    for (const [address, account] of this.accountsByAddress) {
      copy.accountsByAddress.set(address, {
        balance: account.balance,
        code: account.code,
        slots: new Map(account.slots),
      });
    }
    return copy;
  }

  /** Snapshot keyed by lowercase 0x-prefixed address. */
  dump(): Map<string, AccountSnapshot> {
    const result = new Map<string, AccountSnapshot>();
    for (const [address, account] of this.accountsByAddress) {
      result.set(address, {
        balance: account.balance,
        code: account.code.slice(),
        slots: new Map(account.slots),
      });
    }
    return result;
  }

  private getOrCreate(address: Address): AccountRecord {
    let account = this.accountsByAddress.get(key(address));
    if (!account) {
      account = { balance: 0n, code: EMPTY_CODE, slots: new Map() };
      this.accountsByAddress.set(key(address), account);
    }
    return account;
  }
}
