/**
 * Strategy Scheduler: runs every registered strategy concurrently.
 *
 * One loop per strategy plus one housekeeping loop, all on the event loop:
 *
 *   cyclic      scan → execute → record result → sleep(interval) → …
 *   continuous  strategy.continuousTradeLoop(signal); restarted after one
 *               interval if it throws
 *   housekeeping every reconcileIntervalSeconds: reconcile each strategy,
 *               then rebalance allocations once optimizeEveryCycles
 *               cycles have completed since the last rebalance
 *
 * A throw inside one strategy is logged with its name, recorded as an
 * errored result, and that loop carries on after its interval. Only
 * stop() ends run(). The abort signal is checked at the top of every
 * iteration and after every sleep; in-flight calls are left to finish.
 */

import { errorMessage, sanitizeError } from '@/lib/errors';
import type { TradingEventBus } from '@/lib/events/event-bus';
import type { Universe } from '@/lib/ledger/types';
import type { BotLogger } from '@/lib/logging/bot-logger';
import type { ReconciliationMonitor } from '@/lib/reconciliation/reconciliation-monitor';
import { sleep } from '@/lib/utils/sleep';
import { optimizeAllocations } from './allocation';
import type { Strategy, StrategyResult } from './types';

// ──────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────

export type Reconciler = Pick<ReconciliationMonitor, 'syncWithExchange'>;

export interface SchedulerOptions {
    logger: BotLogger;
    monitor?: Reconciler;
    events?: TradingEventBus;
    defaultIntervalSeconds?: number;
    reconcileIntervalSeconds?: number;
    optimizeEveryCycles?: number;
    /** Results kept per strategy. */
    historyLimit?: number;
}

export interface ExportedResults {
    allocations: Record<string, number>;
    performance_history: Record<string, Array<{
        timestamp: string;
        opportunities: number;
        trades: number;
        pnl: number;
        win_rate: number;
        errors: string[];
    }>>;
    best_strategy: string | null;
}

// ──────────────────────────────────────────────────────────────────────
// Scheduler
// ──────────────────────────────────────────────────────────────────────

export class StrategyScheduler {
    private readonly logger: BotLogger;
    private readonly monitor?: Reconciler;
    private readonly events?: TradingEventBus;
    private readonly defaultIntervalMs: number;
    private readonly reconcileIntervalMs: number;
    private readonly optimizeEveryCycles: number;
    private readonly historyLimit: number;

    private readonly strategies = new Map<string, Strategy>();
    private readonly history = new Map<string, StrategyResult[]>();
    private allocations: Record<string, number> = {};
    private cyclesSinceOptimize = 0;
    private controller: AbortController | null = null;

    constructor(options: SchedulerOptions) {
        this.logger = options.logger;
        this.monitor = options.monitor;
        this.events = options.events;
        this.defaultIntervalMs = (options.defaultIntervalSeconds ?? 300) * 1000;
        this.reconcileIntervalMs = (options.reconcileIntervalSeconds ?? 300) * 1000;
        this.optimizeEveryCycles = options.optimizeEveryCycles ?? 12;
        this.historyLimit = options.historyLimit ?? 500;
    }

    register(strategy: Strategy, initialAllocation = 0.5): void {
        if (this.strategies.has(strategy.name)) {
            throw new Error(`Strategy ${strategy.name} is already registered`);
        }
        if (strategy.mode === 'continuous' && !strategy.continuousTradeLoop) {
            throw new TypeError(`Strategy ${strategy.name} is continuous but has no continuousTradeLoop`);
        }
        if (!(initialAllocation >= 0 && initialAllocation <= 1)) {
            throw new RangeError(`Allocation must be in [0, 1], got ${initialAllocation}`);
        }

        this.strategies.set(strategy.name, strategy);
        this.history.set(strategy.name, []);
        this.allocations[strategy.name] = initialAllocation;
        this.logger.info('AGENT_START', `Registered strategy: ${strategy.name} (allocation: ${(initialAllocation * 100).toFixed(0)}%)`, {
            mode: strategy.mode,
            dry_run: strategy.dryRun,
        });
    }

    get isRunning(): boolean {
        return this.controller !== null && !this.controller.signal.aborted;
    }

    /** Resolves after stop() once every loop has returned. */
    async run(): Promise<void> {
        if (this.controller) {
            throw new Error('Scheduler is already running');
        }
        const controller = new AbortController();
        this.controller = controller;
        const { signal } = controller;

        this.logger.info('AGENT_START', `Running ${this.strategies.size} strategies`);
        try {
            await Promise.all([
                ...[...this.strategies.values()].map((strategy) => this.runStrategy(strategy, signal)),
                this.housekeepingLoop(signal),
            ]);
        } finally {
            this.controller = null;
            this.logger.info('AGENT_STOP', 'All strategy loops stopped');
        }
    }

    stop(): void {
        if (this.controller && !this.controller.signal.aborted) {
            this.logger.info('AGENT_STOP', 'Stop requested');
            this.controller.abort();
        }
    }

    /** One scan → execute cycle of one strategy, recorded in its history. */
    async runOnce(name: string): Promise<StrategyResult> {
        const strategy = this.strategies.get(name);
        if (!strategy) throw new Error(`Unknown strategy ${name}`);
        return this.runCycle(strategy, this.logger.forStrategy(name));
    }

    /** Every strategy once, in registration order. */
    async runAllOnce(): Promise<Record<string, StrategyResult>> {
        const results: Record<string, StrategyResult> = {};
        for (const name of this.strategies.keys()) {
            results[name] = await this.runOnce(name);
        }
        return results;
    }

    /** Reconcile every strategy, then rebalance if enough cycles have run. */
    async housekeep(): Promise<void> {
        if (this.monitor) {
            for (const strategy of this.strategies.values()) {
                const universe: Universe = strategy.dryRun ? 'simulated' : 'real';
                try {
                    await this.monitor.syncWithExchange(strategy.name, universe);
                } catch (err) {
                    this.logger.error('RECONCILE', `Reconciliation failed for ${strategy.name}`, { error: sanitizeError(err) });
                }
            }
        }
        if (this.cyclesSinceOptimize >= this.optimizeEveryCycles) {
            this.optimizeAllocations();
        }
    }

    optimizeAllocations(): Record<string, number> {
        const histories = Object.fromEntries(this.history);
        this.allocations = optimizeAllocations(this.allocations, histories);
        this.cyclesSinceOptimize = 0;

        this.logger.info('ALLOCATION', 'Optimized allocations', {
            allocations: Object.fromEntries(
                Object.entries(this.allocations).map(([name, value]) => [name, `${(value * 100).toFixed(1)}%`]),
            ),
        });
        this.events?.emit('AllocationsUpdated', { allocations: { ...this.allocations } });
        return this.getAllocations();
    }

    getAllocations(): Record<string, number> {
        return { ...this.allocations };
    }

    getHistory(name: string): StrategyResult[] {
        return [...(this.history.get(name) ?? [])];
    }

    /** Highest summed profit_loss across recorded results. */
    getBestStrategy(): string | null {
        let best: string | null = null;
        let bestPnl = -Infinity;
        for (const [name, results] of this.history) {
            if (results.length === 0) continue;
            const pnl = results.reduce((sum, r) => sum + r.profit_loss, 0);
            if (pnl > bestPnl) {
                best = name;
                bestPnl = pnl;
            }
        }
        return best;
    }

    exportResults(): ExportedResults {
        const performance_history: ExportedResults['performance_history'] = {};
        for (const [name, results] of this.history) {
            performance_history[name] = results.map((r) => ({
                timestamp: r.timestamp,
                opportunities: r.opportunities_found,
                trades: r.trades_executed,
                pnl: r.profit_loss,
                win_rate: r.win_rate,
                errors: [...r.errors],
            }));
        }
        return {
            allocations: this.getAllocations(),
            performance_history,
            best_strategy: this.getBestStrategy(),
        };
    }

    // ──────────────────────────────────────────────────────────────────
    // Loops
    // ──────────────────────────────────────────────────────────────────

    private intervalMs(strategy: Strategy): number {
        return strategy.intervalSeconds !== undefined ? strategy.intervalSeconds * 1000 : this.defaultIntervalMs;
    }

    private async runStrategy(strategy: Strategy, signal: AbortSignal): Promise<void> {
        const log = this.logger.forStrategy(strategy.name);
        log.info('STRATEGY_START', `Starting ${strategy.mode} loop`);

        while (!signal.aborted) {
            if (strategy.mode === 'continuous') {
                await this.runContinuous(strategy, signal, log);
            } else {
                await this.runCycle(strategy, log);
            }
            if (signal.aborted) break;
            await sleep(this.intervalMs(strategy), signal);
        }

        log.info('STRATEGY_END', 'Loop stopped');
    }

    private async runContinuous(strategy: Strategy, signal: AbortSignal, log: BotLogger): Promise<void> {
        const started = Date.now();
        try {
            await strategy.continuousTradeLoop?.(signal);
        } catch (err) {
            log.error('ERROR', `Continuous loop crashed; restarting after ${this.intervalMs(strategy) / 1000}s`, {
                error: sanitizeError(err),
            });
            this.record(strategy.name, this.erroredResult(strategy.name, started, err));
        }
    }

    private async runCycle(strategy: Strategy, log: BotLogger): Promise<StrategyResult> {
        const started = Date.now();
        let result: StrategyResult;
        try {
            const opportunities = await strategy.scan();
            log.debug('SCAN', `Found ${opportunities.length} opportunities`);
            const executed = await strategy.execute(opportunities);
            const perf = strategy.getPerformance();
            result = {
                name: strategy.name,
                opportunities_found: opportunities.length,
                trades_executed: executed,
                profit_loss: perf.total_pnl,
                win_rate: perf.win_rate,
                runtime_seconds: (Date.now() - started) / 1000,
                errors: [],
                timestamp: new Date().toISOString(),
            };
            log.info('STRATEGY_END', `Cycle done: ${opportunities.length} opportunities, ${executed} trades, P&L $${perf.total_pnl.toFixed(2)}`);
        } catch (err) {
            log.error('ERROR', 'Cycle failed', { error: sanitizeError(err) });
            result = this.erroredResult(strategy.name, started, err);
        }

        this.record(strategy.name, result);
        this.cyclesSinceOptimize++;
        return result;
    }

    private async housekeepingLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            await sleep(this.reconcileIntervalMs, signal);
            if (signal.aborted) break;
            await this.housekeep();
        }
    }

    private record(name: string, result: StrategyResult): void {
        const results = this.history.get(name);
        if (!results) return;
        results.push(result);
        if (results.length > this.historyLimit) {
            results.splice(0, results.length - this.historyLimit);
        }
    }

    private erroredResult(name: string, started: number, err: unknown): StrategyResult {
        return {
            name,
            opportunities_found: 0,
            trades_executed: 0,
            profit_loss: 0,
            win_rate: 0,
            runtime_seconds: (Date.now() - started) / 1000,
            errors: [errorMessage(err)],
            timestamp: new Date().toISOString(),
        };
    }
}
