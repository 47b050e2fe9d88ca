import type { Address, Checkpoint, Revertible, SettlementLedger } from '../contracts';

/** Native-value balances. Accounts marked as rejecting refuse every incoming transfer. */
export class InMemorySettlementLedger implements Revertible {
  private balances = new Map<Address, bigint>();
  private rejecting = new Set<Address>();

  balanceOf(account: Address): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  /** Faucet for paper runs and fixtures. */
  credit(account: Address, amount: bigint) {
    if (amount < 0n) throw new RangeError('credit amount must be >= 0');
    this.set(account, this.balanceOf(account) + amount);
  }

  setRejecting(account: Address, rejecting = true) {
    if (rejecting) this.rejecting.add(account.toLowerCase());
    else this.rejecting.delete(account.toLowerCase());
  }

  connect(caller: Address): SettlementLedger {
    return {
      balanceOf: async (account) => this.balanceOf(account),
      transfer: async (to, amount) => this.move(caller, to, amount),
      pull: async (from, amount) => this.move(from, caller, amount),
    };
  }

  checkpoint(): Checkpoint {
    const balances = new Map(this.balances);
    return { revert: () => { this.balances = balances; } };
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    if (amount < 0n || this.rejecting.has(to.toLowerCase())) return false;
    const have = this.balanceOf(from);
    if (have < amount) return false;
    this.set(from, have - amount);
    this.set(to, this.balanceOf(to) + amount);
    return true;
  }

  private set(account: Address, value: bigint) {
    this.balances.set(account.toLowerCase(), value);
  }
}
