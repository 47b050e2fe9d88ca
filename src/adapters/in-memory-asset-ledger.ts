import type { Address, AssetLedger, Checkpoint, Revertible } from '../contracts';
import { labelAddress } from '../utils/address';

export interface AssetMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

/**
 * Balance and allowance book for one issued asset.
 * Rejections come back as `false`, never as thrown errors.
 */
export class InMemoryAssetLedger implements Revertible {
  private balances = new Map<Address, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;

  constructor(readonly asset: Address, readonly meta: AssetMetadata) {}

  get totalSupply(): bigint { return this.supply; }

  balanceOf(account: Address): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  /** Issue new units; only the deployer wiring the ledger calls this. */
  mint(to: Address, amount: bigint) {
    if (amount < 0n) throw new RangeError('mint amount must be >= 0');
    this.setBalance(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  /** View of this ledger acting as `caller`. */
  connect(caller: Address): AssetLedger {
    return {
      asset: this.asset,
      transfer: async (to, amount) => this.move(caller, to, amount),
      transferFrom: async (from, to, amount) => {
        const allowed = this.allowance(from, caller);
        if (allowed < amount) return false;
        if (!this.move(from, to, amount)) return false;
        this.allowances.set(allowanceKey(from, caller), allowed - amount);
        return true;
      },
      approve: async (spender, amount) => {
        if (amount < 0n) return false;
        this.allowances.set(allowanceKey(caller, spender), amount);
        return true;
      },
      balanceOf: async (account) => this.balanceOf(account),
    };
  }

  checkpoint(): Checkpoint {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    const supply = this.supply;
    return {
      revert: () => {
        this.balances = balances;
        this.allowances = allowances;
        this.supply = supply;
      },
    };
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    if (amount < 0n) return false;
    const have = this.balanceOf(from);
    if (have < amount) return false;
    this.setBalance(from, have - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
    return true;
  }

  private setBalance(account: Address, value: bigint) {
    this.balances.set(account.toLowerCase(), value);
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner.toLowerCase()}:${spender.toLowerCase()}`;
}

/** Every asset ledger deployed in this process, addressable by asset. */
export class InMemoryAssetRegistry implements Revertible {
  private ledgers = new Map<Address, InMemoryAssetLedger>();

  /** Stub-deploy a ledger holding `supply` units in `holder`. */
  deploy(meta: Omit<AssetMetadata, 'decimals'> & { decimals?: number }, supply: bigint, holder: Address): InMemoryAssetLedger {
    const asset = labelAddress(`asset:${meta.symbol}:${this.ledgers.size}`);
    const ledger = new InMemoryAssetLedger(asset, { name: meta.name, symbol: meta.symbol, decimals: meta.decimals ?? 18 });
    ledger.mint(holder, supply);
    this.ledgers.set(asset.toLowerCase(), ledger);
    return ledger;
  }

  get(asset: Address): InMemoryAssetLedger | undefined {
    return this.ledgers.get(asset.toLowerCase());
  }

  ledgerFor(asset: Address, caller: Address): AssetLedger | undefined {
    return this.get(asset)?.connect(caller);
  }

  list(): InMemoryAssetLedger[] {
    return [...this.ledgers.values()];
  }

  checkpoint(): Checkpoint {
    const ledgers = new Map(this.ledgers);
    const inner = [...ledgers.values()].map(l => l.checkpoint());
    return {
      revert: () => {
        for (let i = inner.length - 1; i >= 0; i--) inner[i].revert();
        this.ledgers = ledgers;
      },
    };
  }
}
