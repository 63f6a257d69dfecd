/**
 * Position Ledger: durable record of every position, real and simulated.
 *
 * One ticker-keyed map per universe, each persisted to its own JSON file
 * after every mutation. Mutations are synchronous: the duplicate check and
 * the write happen in the same tick, so two strategies sharing the event
 * loop can never both open the same ticker.
 *
 * The duplicate check is ticker-scoped, not strategy-scoped: while one
 * strategy holds an open position on a ticker, no other strategy can open
 * one in the same universe.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CorruptStateError, errorMessage } from '@/lib/errors';
import type { BotLogger } from '@/lib/logging/bot-logger';
import type { TradingEventBus } from '@/lib/events/event-bus';
import { isRecord } from '@/lib/logging/sanitize';
import {
    atomicWriteJson,
    compactDate,
    quarantineFile,
    readJsonDocument,
} from './file-store';
import type {
    DailyPerformance,
    LedgerPerformance,
    OpenPositionInput,
    Position,
    PositionSide,
    PositionStatus,
    StrategyLedgerPerformance,
    Universe,
} from './types';

const FILE_NAMES: Record<Universe, string> = {
    real: 'positions.json',
    simulated: 'simulated_positions.json',
};

export interface PositionLedgerOptions {
    dataDir: string;
    logger: BotLogger;
    events?: TradingEventBus;
    now?: () => Date;
}

export class PositionLedger {
    private readonly dataDir: string;
    private readonly logger: BotLogger;
    private readonly events?: TradingEventBus;
    private readonly now: () => Date;
    private books: Record<Universe, Map<string, Position>>;
    // Tickers with an order in flight. Memory only.
    private readonly claims: Record<Universe, Set<string>> = { real: new Set(), simulated: new Set() };

    constructor(options: PositionLedgerOptions) {
        this.dataDir = options.dataDir;
        this.logger = options.logger;
        this.events = options.events;
        this.now = options.now ?? (() => new Date());

        fs.mkdirSync(this.dataDir, { recursive: true });
        this.books = {
            real: this.load('real'),
            simulated: this.load('simulated'),
        };
    }

    filePath(universe: Universe): string {
        return path.join(this.dataDir, FILE_NAMES[universe]);
    }

    // ──────────────────────────────────────────────────────────────────
    // Reads
    // ──────────────────────────────────────────────────────────────────

    hasOpenPosition(ticker: string, universe: Universe): boolean {
        return this.books[universe].get(ticker)?.status === 'open';
    }

    isClaimed(ticker: string, universe: Universe): boolean {
        return this.claims[universe].has(ticker);
    }

    getPosition(ticker: string, universe: Universe): Position | null {
        const position = this.books[universe].get(ticker);
        return position ? { ...position } : null;
    }

    getOpenPositions(strategy: string | undefined, universe: Universe): Position[] {
        return this.rows(universe).filter(
            (p) => p.status === 'open' && (!strategy || p.strategy === strategy),
        );
    }

    getPerformance(strategy: string | undefined, universe: Universe): LedgerPerformance {
        const positions = this.rows(universe).filter((p) => !strategy || p.strategy === strategy);
        const closed = positions.filter((p) => p.status === 'closed' && p.pnl !== undefined);
        const trades = closed.length;
        const winning = closed.filter((p) => (p.pnl ?? 0) > 0).length;
        const totalPnl = closed.reduce((sum, p) => sum + (p.pnl ?? 0), 0);

        return {
            trades,
            winning_trades: winning,
            win_rate: trades > 0 ? winning / trades : 0,
            total_pnl: totalPnl,
            open_count: positions.filter((p) => p.status === 'open').length,
            avg_pnl_per_trade: trades > 0 ? totalPnl / trades : 0,
        };
    }

    /** Positions entered on one UTC date (default today). */
    getDailyPerformance(options: { strategy?: string; universe: Universe; date?: Date }): DailyPerformance {
        const dateKey = (options.date ?? this.now()).toISOString().slice(0, 10);
        const daily = this.rows(options.universe).filter(
            (p) => p.entry_time.slice(0, 10) === dateKey && (!options.strategy || p.strategy === options.strategy),
        );
        const tickers = [...new Set(daily.map((p) => p.ticker))];
        const closed = daily.filter((p) => p.status === 'closed' && p.pnl !== undefined);

        return {
            date: dateKey,
            strategy: options.strategy ?? 'all',
            total_trades: daily.length,
            unique_markets: tickers.length,
            closed_trades: closed.length,
            total_pnl: closed.reduce((sum, p) => sum + (p.pnl ?? 0), 0),
            tickers: tickers.slice(0, 10),
        };
    }

    getAllPerformance(): Record<string, StrategyLedgerPerformance> {
        const strategies = new Set([...this.rows('real'), ...this.rows('simulated')].map((p) => p.strategy));
        const result: Record<string, StrategyLedgerPerformance> = {};
        for (const strategy of strategies) {
            const real = this.getPerformance(strategy, 'real');
            const simulated = this.getPerformance(strategy, 'simulated');
            result[strategy] = {
                real,
                simulated,
                combined_trades: real.trades + simulated.trades,
                combined_pnl: real.total_pnl + simulated.total_pnl,
            };
        }
        return result;
    }

    // ──────────────────────────────────────────────────────────────────
    // Claims
    // ──────────────────────────────────────────────────────────────────

    /** Hold a ticker while an order for it is in flight. False when it is open or already claimed. */
    claimTicker(ticker: string, universe: Universe): boolean {
        if (this.hasOpenPosition(ticker, universe) || this.claims[universe].has(ticker)) return false;
        this.claims[universe].add(ticker);
        return true;
    }

    releaseTicker(ticker: string, universe: Universe): void {
        this.claims[universe].delete(ticker);
    }

    // ──────────────────────────────────────────────────────────────────
    // Mutations
    // ──────────────────────────────────────────────────────────────────

    /**
     * Record a new position.
     * Returns null, without error, when dedupe is on and the ticker already
     * has an open position in this universe.
     */
    openPosition(input: OpenPositionInput): Position | null {
        const { ticker, universe } = input;
        const dedupe = input.dedupe ?? true;

        if (!Number.isInteger(input.contracts) || input.contracts <= 0) {
            throw new RangeError(`contracts must be a positive integer, got ${input.contracts}`);
        }
        if (!Number.isInteger(input.entryPrice) || input.entryPrice < 1 || input.entryPrice > 99) {
            throw new RangeError(`entry price must be 1-99 cents, got ${input.entryPrice}`);
        }

        if (dedupe && this.hasOpenPosition(ticker, universe)) {
            this.logger.debug('LEDGER', `Skipping ${ticker}: already have open position`, { universe });
            return null;
        }

        const position: Position = {
            ticker,
            side: input.side,
            contracts: input.contracts,
            entry_price: input.entryPrice,
            entry_time: this.now().toISOString(),
            strategy: input.strategy,
            simulated: universe === 'simulated',
            market_title: input.marketTitle ?? '',
            status: 'open',
        };
        if (input.expectedSettlement) {
            position.expected_settlement = input.expectedSettlement;
        }

        this.commit(universe, ticker, position);

        this.logger.info('LEDGER', `[${label(universe)}] Opened ${ticker} ${position.side} x${position.contracts} @ ${position.entry_price}c`, {
            strategy: position.strategy,
        });
        this.events?.emit('PositionOpened', { strategy: position.strategy, ticker, universe, contracts: position.contracts });
        return { ...position };
    }

    /** Close an open position; null when the ticker is unknown or not open. */
    closePosition(ticker: string, exitPrice: number, pnl: number, universe: Universe): Position | null {
        const existing = this.books[universe].get(ticker);
        if (!existing) {
            this.logger.warn('LEDGER', `Cannot close ${ticker}: position not found`, { universe });
            return null;
        }
        if (existing.status !== 'open') {
            this.logger.warn('LEDGER', `Cannot close ${ticker}: position is ${existing.status}`, { universe });
            return null;
        }

        const closed: Position = {
            ...existing,
            status: 'closed',
            exit_price: exitPrice,
            exit_time: this.now().toISOString(),
            pnl,
        };
        this.commit(universe, ticker, closed);

        const sign = pnl >= 0 ? '+' : '-';
        this.logger.info('LEDGER', `[${label(universe)}] Closed ${ticker} @ ${exitPrice}c, P&L: ${sign}$${Math.abs(pnl).toFixed(2)}`, {
            strategy: closed.strategy,
        });
        this.events?.emit('PositionClosed', { strategy: closed.strategy, ticker, universe, pnl });
        return { ...closed };
    }

    /** Mark an open position as never filled. */
    cancelPosition(ticker: string, universe: Universe): Position | null {
        const existing = this.books[universe].get(ticker);
        if (!existing || existing.status !== 'open') return null;

        const cancelled: Position = { ...existing, status: 'cancelled' };
        this.commit(universe, ticker, cancelled);

        this.logger.info('LEDGER', `[${label(universe)}] Cancelled ${ticker}`, { strategy: cancelled.strategy });
        this.events?.emit('PositionCancelled', { strategy: cancelled.strategy, ticker, universe });
        return { ...cancelled };
    }

    /** Weekly reset of the simulated universe, backing it up first. */
    clearSimulated(options: { backup?: boolean } = {}): number {
        const book = this.books.simulated;
        if ((options.backup ?? true) && book.size > 0) {
            const backupFile = path.join(this.dataDir, `simulated_positions.backup.${compactDate(this.now())}.json`);
            atomicWriteJson(backupFile, Object.fromEntries(book));
            this.logger.info('LEDGER', `Backed up ${book.size} simulated positions to ${backupFile}`);
        }

        const count = book.size;
        atomicWriteJson(this.filePath('simulated'), {});
        this.books.simulated = new Map();
        this.logger.info('LEDGER', `Cleared ${count} simulated positions`);
        return count;
    }

    // ──────────────────────────────────────────────────────────────────
    // Persistence
    // ──────────────────────────────────────────────────────────────────

    /** Write the next state first; swap it in only once it is on disk. */
    private commit(universe: Universe, ticker: string, position: Position): void {
        const next = new Map(this.books[universe]);
        next.set(ticker, position);
        atomicWriteJson(this.filePath(universe), Object.fromEntries(next));
        this.books[universe] = next;
    }

    private load(universe: Universe): Map<string, Position> {
        const filePath = this.filePath(universe);
        try {
            const raw = readJsonDocument(filePath);
            if (raw === undefined) return new Map();
            const book = parseBook(raw, filePath);
            this.logger.info('LEDGER', `Loaded ${book.size} ${universe} positions`);
            return book;
        } catch (err) {
            if (!(err instanceof CorruptStateError)) throw err;
            const quarantined = quarantineFile(filePath, this.now());
            this.logger.error('LEDGER', `Corrupt ${universe} ledger moved to ${quarantined}; starting empty`, {
                error: errorMessage(err),
            });
            return new Map();
        }
    }

    private rows(universe: Universe): Position[] {
        return [...this.books[universe].values()].map((p) => ({ ...p }));
    }
}

function label(universe: Universe): string {
    return universe === 'simulated' ? 'SIMULATED' : 'REAL';
}

// ──────────────────────────────────────────────────────────────────────
// Deserialization
// ──────────────────────────────────────────────────────────────────────

const SIDES: readonly PositionSide[] = ['YES', 'NO'];
const STATUSES: readonly PositionStatus[] = ['open', 'closed', 'cancelled'];

function parseBook(raw: unknown, filePath: string): Map<string, Position> {
    if (!isRecord(raw)) {
        throw new CorruptStateError(`${filePath}: expected an object keyed by ticker`, filePath);
    }
    const book = new Map<string, Position>();
    for (const [ticker, row] of Object.entries(raw)) {
        book.set(ticker, parsePositionRow(ticker, row, filePath));
    }
    return book;
}

export function parsePositionRow(ticker: string, row: unknown, filePath: string): Position {
    const fail = (field: string): never => {
        throw new CorruptStateError(`${filePath}: invalid ${field} for ${ticker}`, filePath);
    };
    if (!isRecord(row)) return fail('row');

    const side = SIDES.find((s) => s === row.side) ?? fail('side');
    const status = STATUSES.find((s) => s === row.status) ?? fail('status');
    const position: Position = {
        ticker: typeof row.ticker === 'string' ? row.ticker : fail('ticker'),
        side,
        contracts: typeof row.contracts === 'number' ? row.contracts : fail('contracts'),
        entry_price: typeof row.entry_price === 'number' ? row.entry_price : fail('entry_price'),
        entry_time: typeof row.entry_time === 'string' ? row.entry_time : fail('entry_time'),
        strategy: typeof row.strategy === 'string' ? row.strategy : fail('strategy'),
        simulated: typeof row.simulated === 'boolean' ? row.simulated : fail('simulated'),
        market_title: typeof row.market_title === 'string' ? row.market_title : fail('market_title'),
        status,
    };

    if (typeof row.expected_settlement === 'string') position.expected_settlement = row.expected_settlement;
    if (typeof row.exit_price === 'number') position.exit_price = row.exit_price;
    if (typeof row.exit_time === 'string') position.exit_time = row.exit_time;
    if (typeof row.pnl === 'number') position.pnl = row.pnl;

    return position;
}
