import type { AxiosAdapter } from 'axios';
import { describe, expect, it } from 'vitest';
import { HttpSignalFeed } from './http-signal-feed';

function feedReturning(...bodies: unknown[]): HttpSignalFeed {
    const adapter: AxiosAdapter = async (config) => ({
        data: bodies.shift() ?? [],
        status: 200,
        statusText: 'OK',
        headers: {},
        config,
    });
    return new HttpSignalFeed({ url: 'https://signals.test/feed', source: 'whales', adapter });
}

describe('HttpSignalFeed', () => {
    it('parses signals and fills in the feed name as source', async () => {
        const feed = feedReturning({
            signals: [
                { id: 'a1', ticker: 'BTC-1', side: 'yes', price_cents: 42, series_ticker: 'BTC', title: 'BTC above 90k' },
                { id: 7, ticker: 'ETH-1', side: 'NO', price: '61', win_probability: 0.7, source: 'model' },
            ],
        });

        expect(await feed.fetchSignals()).toEqual([
            { id: 'a1', source: 'whales', ticker: 'BTC-1', side: 'YES', price_cents: 42, selector: 'BTC', market_title: 'BTC above 90k' },
            { id: '7', source: 'model', ticker: 'ETH-1', side: 'NO', price_cents: 61, win_probability: 0.7 },
        ]);
    });

    it('skips malformed rows', async () => {
        const feed = feedReturning([
            { id: 'x', ticker: 'A', side: 'maybe', price_cents: 40 },
            { id: 'y', ticker: 'A', side: 'YES', price_cents: 100 },
            { ticker: 'A', side: 'YES', price_cents: 40 },
            'garbage',
        ]);

        expect(await feed.fetchSignals()).toEqual([]);
    });

    it('returns each signal id once', async () => {
        const row = { id: 'a1', ticker: 'BTC-1', side: 'YES', price_cents: 42 };
        const feed = feedReturning([row], [row, { ...row, id: 'a2' }]);

        expect((await feed.fetchSignals()).map((s) => s.id)).toEqual(['a1']);
        expect((await feed.fetchSignals()).map((s) => s.id)).toEqual(['a2']);
    });
});
