import { describe, it, expect } from 'vitest';
import { InMemoryAssetRegistry } from '../../../src/adapters/in-memory-asset-ledger';
import { InMemorySettlementLedger } from '../../../src/adapters/in-memory-settlement-ledger';
import { InMemorySubstrate } from '../../../src/adapters/in-memory-substrate';
import { labelAddress } from '../../../src/utils/address';

const alice = labelAddress('alice');
const bob = labelAddress('bob');
const carol = labelAddress('carol');

describe('adapters/in-memory ledgers', () => {
  it('issues the whole supply to the holder', () => {
    const registry = new InMemoryAssetRegistry();
    const ledger = registry.deploy({ name: 'Demo', symbol: 'DMO' }, 1_000n, alice);
    expect(ledger.meta).toEqual({ name: 'Demo', symbol: 'DMO', decimals: 18 });
    expect(ledger.totalSupply).toBe(1_000n);
    expect(ledger.balanceOf(alice)).toBe(1_000n);
    expect(registry.get(ledger.asset.toUpperCase().replace('0X', '0x'))).toBe(ledger);
    expect(registry.list()).toEqual([ledger]);
  });

  it('moves units and reports rejections as false', async () => {
    const ledger = new InMemoryAssetRegistry().deploy({ name: 'Demo', symbol: 'DMO' }, 100n, alice);
    const asAlice = ledger.connect(alice);
    expect(await asAlice.transfer(bob, 40n)).toBe(true);
    expect(await asAlice.transfer(bob, 61n)).toBe(false);
    expect(await asAlice.transfer(bob, -1n)).toBe(false);
    expect(await asAlice.balanceOf(bob)).toBe(40n);
    expect(ledger.balanceOf(alice)).toBe(60n);
  });

  it('spends allowances on transferFrom', async () => {
    const ledger = new InMemoryAssetRegistry().deploy({ name: 'Demo', symbol: 'DMO' }, 100n, alice);
    const asBob = ledger.connect(bob);
    expect(await asBob.transferFrom(alice, carol, 10n)).toBe(false);
    expect(await ledger.connect(alice).approve(bob, 30n)).toBe(true);
    expect(await asBob.transferFrom(alice, carol, 25n)).toBe(true);
    expect(ledger.allowance(alice, bob)).toBe(5n);
    expect(ledger.balanceOf(carol)).toBe(25n);
    expect(await asBob.transferFrom(alice, carol, 6n)).toBe(false);
    expect(await ledger.connect(alice).approve(bob, -1n)).toBe(false);
  });

  it('reverts balances, allowances and newly deployed ledgers', async () => {
    const registry = new InMemoryAssetRegistry();
    const ledger = registry.deploy({ name: 'Demo', symbol: 'DMO' }, 100n, alice);
    const cp = registry.checkpoint();
    await ledger.connect(alice).transfer(bob, 50n);
    await ledger.connect(alice).approve(bob, 7n);
    const later = registry.deploy({ name: 'Later', symbol: 'LTR' }, 1n, bob);
    cp.revert();
    expect(ledger.balanceOf(alice)).toBe(100n);
    expect(ledger.allowance(alice, bob)).toBe(0n);
    expect(registry.get(later.asset)).toBeUndefined();
    expect(registry.ledgerFor(later.asset, bob)).toBeUndefined();
  });

  it('settlement ledger pulls, transfers and honours rejecting accounts', async () => {
    const settlement = new InMemorySettlementLedger();
    settlement.credit(alice, 10n);
    const asBob = settlement.connect(bob);
    expect(await asBob.pull(alice, 4n)).toBe(true);
    expect(await asBob.pull(alice, 7n)).toBe(false);
    settlement.setRejecting(carol);
    expect(await asBob.transfer(carol, 1n)).toBe(false);
    settlement.setRejecting(carol, false);
    expect(await asBob.transfer(carol, 1n)).toBe(true);
    expect([settlement.balanceOf(alice), settlement.balanceOf(bob), settlement.balanceOf(carol)]).toEqual([6n, 3n, 1n]);
    expect(() => settlement.credit(alice, -1n)).toThrow(RangeError);
  });

  it('substrate checkpoints every part it was given', async () => {
    const settlement = new InMemorySettlementLedger();
    const registry = new InMemoryAssetRegistry();
    const ledger = registry.deploy({ name: 'Demo', symbol: 'DMO' }, 5n, alice);
    const substrate = new InMemorySubstrate([settlement]).add(registry);
    const cp = substrate.checkpoint();
    settlement.credit(bob, 9n);
    await ledger.connect(alice).transfer(bob, 5n);
    cp.revert();
    expect(settlement.balanceOf(bob)).toBe(0n);
    expect(ledger.balanceOf(alice)).toBe(5n);
  });
});
