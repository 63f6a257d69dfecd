import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '@/lib/config';
import { ConfigError } from '@/lib/errors';
import { createBotLogger } from '@/lib/logging/bot-logger';
import type { SignalSource, TradeSignal } from '@/lib/signals/types';
import { FakeExchange } from '@/lib/testing/fake-exchange';
import { createTradingAgent } from './agent';

const logger = createBotLogger({ minLevel: 'error' });

function sourceOf(...batches: TradeSignal[][]): SignalSource {
    return { fetchSignals: async () => batches.shift() ?? [] };
}

describe('createTradingAgent', () => {
    let dataDir: string;
    let exchange: FakeExchange;

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-'));
        exchange = new FakeExchange();
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it('trades a signal in dry run, then settles it and frees exposure', async () => {
        const agent = createTradingAgent(loadConfig({ DATA_DIR: dataDir }), {
            exchange,
            logger,
            signalSource: sourceOf([{ id: '1', source: 'feed', ticker: 'A', side: 'YES', price_cents: 40, win_probability: 0.6 }]),
        });

        // moderate profile at $100: 3% → $3.00 → 7 contracts at 40c
        const results = await agent.scheduler.runAllOnce();
        expect(results['signal-follower']).toMatchObject({ opportunities_found: 1, trades_executed: 1 });
        expect(agent.ledger.getPosition('A', 'simulated')).toMatchObject({ contracts: 7, entry_price: 40, status: 'open' });
        expect(agent.exposure.current).toBeCloseTo(2.8, 9);
        expect(exchange.orders).toEqual([]);

        exchange.settlements.set('A', { state: 'settled', settlement_price: 100 });
        await agent.scheduler.housekeep();

        expect(agent.ledger.getPosition('A', 'simulated')).toMatchObject({ status: 'closed', exit_price: 100 });
        expect(agent.exposure.current).toBe(0);
        expect(agent.sizer.consecutiveWins).toBe(1);
        expect(await agent.bankroll()).toBeCloseTo(104.2, 9);
        agent.dispose();
    });

    it('reads the live bankroll from the exchange balance', async () => {
        exchange.balanceCents = 25_050;
        const agent = createTradingAgent(
            loadConfig({ DATA_DIR: dataDir, DRY_RUN: 'false', EXCHANGE_API_BASE_URL: 'https://exchange.test', EXCHANGE_API_KEY: 'test-secret' }),
            { exchange, logger, signalSource: sourceOf() },
        );

        expect(agent.universe).toBe('real');
        expect(await agent.bankroll()).toBe(250.5);
        agent.dispose();
    });

    it('starts exposure from open positions already in the ledger', () => {
        const first = createTradingAgent(loadConfig({ DATA_DIR: dataDir }), { exchange, logger, signalSource: sourceOf() });
        first.ledger.openPosition({ ticker: 'B', side: 'NO', contracts: 5, entryPrice: 30, strategy: 'signal-follower', universe: 'simulated' });
        first.dispose();

        const second = createTradingAgent(loadConfig({ DATA_DIR: dataDir }), { exchange, logger, signalSource: sourceOf() });
        expect(second.exposure.current).toBeCloseTo(1.5, 9);
        second.dispose();
    });

    it('needs a signal feed when none is passed in', () => {
        expect(() => createTradingAgent(loadConfig({ DATA_DIR: dataDir }), { exchange, logger })).toThrow(ConfigError);
    });
});
