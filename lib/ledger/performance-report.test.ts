import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createBotLogger } from '@/lib/logging/bot-logger';
import { buildPerformanceReport } from './performance-report';
import { PositionLedger } from './position-ledger';

const NOW = new Date('2026-03-02T12:00:00Z');

describe('buildPerformanceReport', () => {
    let dataDir: string;
    let ledger: PositionLedger;

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'report-'));
        ledger = new PositionLedger({ dataDir, logger: createBotLogger({ minLevel: 'error' }), now: () => NOW });
        ledger.openPosition({ ticker: 'A', side: 'YES', contracts: 2, entryPrice: 50, strategy: 's1', universe: 'simulated' });
        ledger.closePosition('A', 100, 1, 'simulated');
        ledger.openPosition({ ticker: 'B', side: 'NO', contracts: 3, entryPrice: 20, strategy: 's2', universe: 'real' });
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it('reports the day and every strategy in both universes', () => {
        expect(buildPerformanceReport(ledger, { date: NOW })).toEqual([
            '[real] 2026-03-02 (all): 1 trades on 1 markets, 0 closed, pnl +$0.00',
            '  tickers: B',
            '[simulated] 2026-03-02 (all): 1 trades on 1 markets, 1 closed, pnl +$1.00',
            '  tickers: A',
            '',
            's1: 1 closed trades, combined pnl +$1.00',
            '  real       trades=0 open=0 win_rate=0.0% pnl=+$0.00',
            '  simulated  trades=1 open=0 win_rate=100.0% pnl=+$1.00',
            's2: 0 closed trades, combined pnl +$0.00',
            '  real       trades=0 open=1 win_rate=0.0% pnl=+$0.00',
            '  simulated  trades=0 open=0 win_rate=0.0% pnl=+$0.00',
        ]);
    });

    it('narrows to one strategy', () => {
        const lines = buildPerformanceReport(ledger, { date: NOW, strategy: 's2' });

        expect(lines[2]).toBe('[simulated] 2026-03-02 (s2): 0 trades on 0 markets, 0 closed, pnl +$0.00');
        expect(lines.slice(4)).toEqual([
            's2: 0 closed trades, combined pnl +$0.00',
            '  real       trades=0 open=1 win_rate=0.0% pnl=+$0.00',
            '  simulated  trades=0 open=0 win_rate=0.0% pnl=+$0.00',
        ]);
    });

    it('says so when the ledger is empty', () => {
        ledger.clearSimulated({ backup: false });
        const empty = buildPerformanceReport(ledger, { date: NOW, strategy: 'none' });

        expect(empty[empty.length - 1]).toBe('No positions recorded.');
    });
});
