import { describe, it, expect } from 'vitest';
import { DexLiquiditySink } from '../../../src/adapters/dex-liquidity-sink';
import { InMemoryAssetRegistry } from '../../../src/adapters/in-memory-asset-ledger';
import { InMemorySettlementLedger } from '../../../src/adapters/in-memory-settlement-ledger';
import { MockVenue } from '../../../src/api/venue-mock';
import { labelAddress } from '../../../src/utils/address';

const engine = labelAddress('engine');
const collector = labelAddress('collector');

function setup() {
  const settlement = new InMemorySettlementLedger();
  const registry = new InMemoryAssetRegistry();
  const venue = new MockVenue();
  const address = labelAddress('sink');
  const sink = new DexLiquiditySink({
    address, venue, settlement: settlement.connect(address), ledgerFor: (a) => registry.ledgerFor(a, address),
  });
  const ledger = registry.deploy({ name: 'Demo', symbol: 'DMO' }, 1_000n, engine);
  return { settlement, registry, venue, sink, ledger };
}

describe('adapters/dex-liquidity-sink', () => {
  it('forwards approved units and attached settlement to the venue', async () => {
    const { settlement, venue, sink, ledger } = setup();
    await ledger.connect(engine).approve(sink.address, 200n);
    settlement.credit(sink.address, 5n);
    const r = await sink.deploy({ asset: ledger.asset, units: 200n, settlement: 5n, collector, from: engine });
    expect(r).toEqual({ ok: true, value: { asset: ledger.asset, units: 200n, settlement: 5n, poolId: 'pool-1' } });
    expect(ledger.balanceOf(venue.address)).toBe(200n);
    expect(settlement.balanceOf(venue.address)).toBe(5n);
    expect(sink.deposits).toEqual([{ asset: ledger.asset, units: 200n, settlement: 5n, poolId: 'pool-1', collector, from: engine }]);
  });

  it('returns an error result for an unknown asset', async () => {
    const { sink } = setup();
    const r = await sink.deploy({ asset: labelAddress('nope'), units: 1n, settlement: 0n, collector, from: engine });
    expect(r).toMatchObject({ ok: false, error: { code: 'UNKNOWN_ASSET' } });
  });

  it('returns an error result for an empty deposit', async () => {
    const { sink, ledger } = setup();
    const r = await sink.deploy({ asset: ledger.asset, units: 0n, settlement: 0n, collector, from: engine });
    expect(r).toMatchObject({ ok: false, error: { code: 'EMPTY_DEPOSIT' } });
  });

  it('requires the settlement to arrive before the call', async () => {
    const { sink, ledger } = setup();
    await ledger.connect(engine).approve(sink.address, 10n);
    const r = await sink.deploy({ asset: ledger.asset, units: 10n, settlement: 5n, collector, from: engine });
    expect(r).toMatchObject({ ok: false, error: { code: 'SETTLEMENT_MISSING', cause: { held: 0n, expected: 5n } } });
  });

  it('requires an allowance for the units', async () => {
    const { sink, ledger } = setup();
    const r = await sink.deploy({ asset: ledger.asset, units: 10n, settlement: 0n, collector, from: engine });
    expect(r).toMatchObject({ ok: false, error: { code: 'UNITS_NOT_APPROVED' } });
    expect(sink.deposits).toHaveLength(0);
  });

  it('maps a venue rejection to VENUE_REJECTED', async () => {
    const { venue, sink, ledger } = setup();
    venue.setFailure('pool exists');
    await ledger.connect(engine).approve(sink.address, 10n);
    const r = await sink.deploy({ asset: ledger.asset, units: 10n, settlement: 0n, collector, from: engine });
    expect(r).toMatchObject({ ok: false, error: { code: 'VENUE_REJECTED', message: 'pool exists' } });
    expect(venue.listPools()).toHaveLength(0);
  });

  it('drops deposit records on revert', async () => {
    const { sink, ledger } = setup();
    await ledger.connect(engine).approve(sink.address, 10n);
    const cp = sink.checkpoint();
    await sink.deploy({ asset: ledger.asset, units: 10n, settlement: 0n, collector, from: engine });
    expect(sink.deposits).toHaveLength(1);
    cp.revert();
    expect(sink.deposits).toHaveLength(0);
  });
});
