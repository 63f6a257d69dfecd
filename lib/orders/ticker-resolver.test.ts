import { describe, expect, it } from 'vitest';
import { FakeExchange } from '@/lib/testing/fake-exchange';
import { createTickerResolver } from './ticker-resolver';

describe('createTickerResolver', () => {
    it('keeps a ticker whose market is still tradable', async () => {
        const exchange = new FakeExchange();
        exchange.addMarket({ ticker: 'BTC-26MAR02-T1', status: 'open' });

        expect(await createTickerResolver(exchange)('BTC-26MAR02-T1')).toBe('BTC-26MAR02-T1');
    });

    it('returns null for a ticker whose market has closed', async () => {
        const exchange = new FakeExchange();
        exchange.addMarket({ ticker: 'BTC-26MAR02-T1', status: 'closed' });

        expect(await createTickerResolver(exchange)('BTC-26MAR02-T1')).toBeNull();
    });

    it('resolves a series to its soonest-closing tradable market', async () => {
        const exchange = new FakeExchange();
        exchange.addMarket({ ticker: 'BTC-T3', series_ticker: 'BTC', status: 'active', close_time: '2026-03-02T17:00:00Z' });
        exchange.addMarket({ ticker: 'BTC-T2', series_ticker: 'BTC', status: 'active', close_time: '2026-03-02T16:00:00Z' });
        exchange.addMarket({ ticker: 'BTC-T1', series_ticker: 'BTC', status: 'closed', close_time: '2026-03-02T15:00:00Z' });
        exchange.addMarket({ ticker: 'ETH-T1', series_ticker: 'ETH', status: 'active', close_time: '2026-03-02T14:00:00Z' });

        expect(await createTickerResolver(exchange)('BTC')).toBe('BTC-T2');
        expect(await createTickerResolver(exchange)('SOL')).toBeNull();
    });
});
