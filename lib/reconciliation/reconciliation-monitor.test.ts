import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ReconciliationAmbiguity } from '@/lib/errors';
import { TradingEventBus } from '@/lib/events/event-bus';
import { PositionLedger } from '@/lib/ledger/position-ledger';
import type { OpenPositionInput } from '@/lib/ledger/types';
import { createBotLogger } from '@/lib/logging/bot-logger';
import { FakeExchange } from '@/lib/testing/fake-exchange';
import type { MarketSnapshot } from './position-analysis';
import { ReconciliationMonitor, settlementPnl } from './reconciliation-monitor';

const logger = createBotLogger({ minLevel: 'error' });

function yesAt30(overrides: Partial<OpenPositionInput> = {}): OpenPositionInput {
    return {
        ticker: 'BTC-26MAR02-T1',
        side: 'YES',
        contracts: 5,
        entryPrice: 30,
        strategy: 'X',
        universe: 'real',
        ...overrides,
    };
}

describe('settlementPnl', () => {
    it('pays a YES position the settlement price', () => {
        expect(settlementPnl({ side: 'YES', entry_price: 30, contracts: 5 }, 100)).toEqual({ exit_price: 100, pnl: 3.5 });
    });

    it('pays a NO position the remainder', () => {
        expect(settlementPnl({ side: 'NO', entry_price: 60, contracts: 4 }, 0)).toEqual({ exit_price: 100, pnl: 1.6 });
        expect(settlementPnl({ side: 'NO', entry_price: 60, contracts: 4 }, 100)).toEqual({ exit_price: 0, pnl: -2.4 });
    });
});

describe('ReconciliationMonitor.syncWithExchange', () => {
    let dataDir: string;
    let exchange: FakeExchange;
    let ledger: PositionLedger;
    let events: TradingEventBus;
    let monitor: ReconciliationMonitor;

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reconcile-'));
        exchange = new FakeExchange();
        events = new TradingEventBus();
        ledger = new PositionLedger({ dataDir, logger, events });
        monitor = new ReconciliationMonitor({ ledger, exchange, logger, events });
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it('closes a settled position with its realised P&L', async () => {
        ledger.openPosition(yesAt30());
        exchange.settlements.set('BTC-26MAR02-T1', { state: 'settled', settlement_price: 100 });

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary).toMatchObject({ checked: 1, settled: 1, finalized: 0, unknown: 0, still_open: 0 });
        expect(ledger.getPosition('BTC-26MAR02-T1', 'real')).toMatchObject({ status: 'closed', exit_price: 100, pnl: 3.5 });
    });

    it('leaves a vanished position with no settlement open and flags it', async () => {
        ledger.openPosition(yesAt30());
        const flagged: unknown[] = [];
        events.on('ReconciliationUnknown', (e) => flagged.push(e.ticker));

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary).toMatchObject({ checked: 1, settled: 0, unknown: 1, still_open: 1 });
        expect(summary.ambiguities[0]).toBeInstanceOf(ReconciliationAmbiguity);
        expect(summary.ambiguities[0].ticker).toBe('BTC-26MAR02-T1');
        expect(ledger.getPosition('BTC-26MAR02-T1', 'real')?.status).toBe('open');
        expect(flagged).toEqual(['BTC-26MAR02-T1']);
    });

    it('does not close a market marked settled without a result', async () => {
        ledger.openPosition(yesAt30());
        exchange.addMarket({ ticker: 'BTC-26MAR02-T1', status: 'settled' });

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary.unknown).toBe(1);
        expect(ledger.hasOpenPosition('BTC-26MAR02-T1', 'real')).toBe(true);
    });

    it('skips tickers the exchange still reports', async () => {
        ledger.openPosition(yesAt30());
        exchange.positions = [{ ticker: 'BTC-26MAR02-T1', position: 5 }];

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary).toMatchObject({ checked: 0, still_open: 1 });
    });

    it('keeps a finalized position open for the next pass', async () => {
        ledger.openPosition(yesAt30());
        exchange.addMarket({ ticker: 'BTC-26MAR02-T1', status: 'closed' });

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary).toMatchObject({ checked: 1, finalized: 1, unknown: 0, still_open: 1 });
    });

    it('treats a failed settlement lookup as unknown', async () => {
        ledger.openPosition(yesAt30());
        exchange.brokenLookups.add('BTC-26MAR02-T1');

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary.unknown).toBe(1);
        expect(summary.ambiguities[0].message).toBe('BTC-26MAR02-T1: settlement lookup failed: lookup failed for BTC-26MAR02-T1');
    });

    it('skips the pass when exchange positions cannot be fetched', async () => {
        ledger.openPosition(yesAt30());
        exchange.getPositions = async () => {
            throw new Error('503');
        };

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary).toMatchObject({ checked: 0, settled: 0, unknown: 0, still_open: 1 });
    });

    it('checks every open simulated position against its market', async () => {
        ledger.openPosition(yesAt30({ universe: 'simulated' }));
        ledger.openPosition(yesAt30({ universe: 'simulated', ticker: 'ETH-1', side: 'NO', entryPrice: 45, contracts: 2 }));
        exchange.addMarket({ ticker: 'BTC-26MAR02-T1', status: 'active' });
        exchange.addMarket({ ticker: 'ETH-1', status: 'settled', result: 'no' });

        const summary = await monitor.syncWithExchange('X', 'simulated');

        expect(summary).toMatchObject({ checked: 2, settled: 1, unknown: 0, still_open: 1 });
        expect(ledger.getPosition('ETH-1', 'simulated')).toMatchObject({ status: 'closed', exit_price: 100, pnl: 1.1 });
    });

    it('only looks at the named strategy', async () => {
        ledger.openPosition(yesAt30({ strategy: 'Y' }));
        exchange.settlements.set('BTC-26MAR02-T1', { state: 'settled', settlement_price: 100 });

        const summary = await monitor.syncWithExchange('X', 'real');

        expect(summary.checked).toBe(0);
        expect(ledger.hasOpenPosition('BTC-26MAR02-T1', 'real')).toBe(true);
    });
});

describe('ReconciliationMonitor position analysis', () => {
    let dataDir: string;
    let ledger: PositionLedger;
    let monitor: ReconciliationMonitor;

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'analysis-'));
        ledger = new PositionLedger({ dataDir, logger });
        monitor = new ReconciliationMonitor({ ledger, exchange: new FakeExchange(), logger });
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it('analyzes each open position and suggests hedges', async () => {
        ledger.openPosition({ ticker: 'A', side: 'YES', contracts: 5, entryPrice: 50, strategy: 'S', universe: 'simulated' });
        ledger.openPosition({ ticker: 'B', side: 'NO', contracts: 5, entryPrice: 50, strategy: 'S', universe: 'simulated' });
        ledger.openPosition({ ticker: 'C', side: 'YES', contracts: 5, entryPrice: 50, strategy: 'S', universe: 'simulated' });
        const data: Record<string, MarketSnapshot> = {
            A: { price: 60, edge: 0.02 },
            B: { price: 40, edge: 0.1 },
        };

        const states = await monitor.checkAllPositions({ name: 'S', dryRun: true }, async (ticker) => data[ticker] ?? null);

        expect(states.map((s) => [s.ticker, s.recommendation])).toEqual([
            ['A', 'HEDGE'],
            ['B', 'WATCH'],
        ]);
        expect(monitor.generateHedgeRecommendations(states)).toEqual([
            {
                ticker: 'A',
                original_side: 'YES',
                hedge_side: 'NO',
                hedge_size: 2,
                reason: 'Edge dropped to 2.0%, P&L at +20.0%',
            },
        ]);
    });

    it('returns no state when market data throws', async () => {
        const position = ledger.openPosition({ ticker: 'A', side: 'YES', contracts: 1, entryPrice: 50, strategy: 'S', universe: 'real' });
        expect(position).not.toBeNull();
        if (!position) return;

        const state = await monitor.analyzePosition(position, async () => {
            throw new Error('feed down');
        });

        expect(state).toBeNull();
    });

    it('summarises open positions', () => {
        ledger.openPosition({ ticker: 'A', side: 'YES', contracts: 1, entryPrice: 40, strategy: 'S', universe: 'real' });
        ledger.openPosition({ ticker: 'B', side: 'NO', contracts: 1, entryPrice: 60, strategy: 'S', universe: 'real' });

        expect(monitor.getPositionSummary('S', 'real')).toEqual({
            count: 2,
            total_pnl: 0,
            avg_entry_price: 50,
            positions: ['A', 'B'],
        });
        expect(monitor.getPositionSummary('S', 'simulated')).toEqual({ count: 0, total_pnl: 0, avg_entry_price: 0, positions: [] });
    });
});
