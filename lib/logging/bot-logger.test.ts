import { afterEach, describe, expect, it, vi } from 'vitest';
import { BotLogger, isLogLevel } from './bot-logger';

describe('BotLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('drops lines below the minimum level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const logger = new BotLogger('run-1', { minLevel: 'info' });

        logger.debug('SCAN', 'hidden');
        logger.info('SCAN', 'shown');

        expect(log).toHaveBeenCalledTimes(1);
        expect(log.mock.calls[0]?.[0]).toMatch(/\[SCAN\] shown$/);
    });

    it('tags lines with strategy and ticker and redacts payload secrets', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const logger = new BotLogger('run-1').forStrategy('s1').withTicker('BTC-1');

        logger.warn('ORDER_PLACE', 'rejected', { n: 2, api_key: 'test-secret' });

        expect(warn.mock.calls[0]?.[0]).toMatch(/\[ORDER_PLACE\] \[s1 BTC-1\] rejected \{"api_key":"\[REDACTED\]","n":2\}$/);
    });

    it('keeps the run id across children and starts a new trace per strategy', () => {
        const root = new BotLogger('run-1');
        const strategy = root.forStrategy('s1');
        const trade = strategy.withTicker('A');

        expect(strategy.runId).toBe('run-1');
        expect(strategy.traceId).not.toBe(root.traceId);
        expect(trade.traceId).toBe(strategy.traceId);
    });

    it('recognises log levels', () => {
        expect(isLogLevel('warn')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
    });
});
