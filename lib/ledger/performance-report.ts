// Plain-text performance report over both ledger universes.

import type { PositionLedger } from './position-ledger';
import type { LedgerPerformance, Universe } from './types';

export interface ReportOptions {
    date?: Date;
    strategy?: string;
}

const UNIVERSES: Universe[] = ['real', 'simulated'];

function money(value: number): string {
    return `${value < 0 ? '-' : '+'}$${Math.abs(value).toFixed(2)}`;
}

function perfLine(label: string, perf: LedgerPerformance): string {
    return `  ${label.padEnd(10)} trades=${perf.trades} open=${perf.open_count} ` +
        `win_rate=${(perf.win_rate * 100).toFixed(1)}% pnl=${money(perf.total_pnl)}`;
}

export function buildPerformanceReport(ledger: PositionLedger, options: ReportOptions = {}): string[] {
    const lines: string[] = [];

    for (const universe of UNIVERSES) {
        const daily = ledger.getDailyPerformance({ universe, strategy: options.strategy, date: options.date });
        lines.push(
            `[${universe}] ${daily.date} (${daily.strategy}): ${daily.total_trades} trades on ${daily.unique_markets} markets, ` +
            `${daily.closed_trades} closed, pnl ${money(daily.total_pnl)}`,
        );
        if (daily.tickers.length > 0) {
            lines.push(`  tickers: ${daily.tickers.join(', ')}`);
        }
    }

    const all = Object.entries(ledger.getAllPerformance())
        .filter(([name]) => !options.strategy || name === options.strategy)
        .sort(([a], [b]) => a.localeCompare(b));

    lines.push('');
    if (all.length === 0) {
        lines.push('No positions recorded.');
        return lines;
    }
    for (const [name, perf] of all) {
        lines.push(`${name}: ${perf.combined_trades} closed trades, combined pnl ${money(perf.combined_pnl)}`);
        lines.push(perfLine('real', perf.real));
        lines.push(perfLine('simulated', perf.simulated));
    }
    return lines;
}
