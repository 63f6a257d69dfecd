/**
 * Capital allocation across strategies.
 *
 *   score  = 0.7 × avg(profit_loss) + 0.3 × avg(win_rate) × 100   (last 10 results)
 *   weight = (score + |min score|) / Σ
 *   new    = 0.7 × old + 0.3 × weight, clamped to [0.1, 0.9]
 *
 * then every allocation is rescaled to sum to 1 while staying in bounds.
 * Strategies with fewer than 3 results keep their old allocation going
 * into the rescale; with none scored, only the rescale happens.
 */

import type { StrategyResult } from './types';

export const MIN_ALLOCATION = 0.1;
export const MAX_ALLOCATION = 0.9;
const MIN_HISTORY = 3;
const RECENT_WINDOW = 10;
const SMOOTHING = 0.7;

export function strategyScore(history: readonly StrategyResult[]): number | null {
    if (history.length < MIN_HISTORY) return null;
    const recent = history.slice(-RECENT_WINDOW);
    const avgPnl = recent.reduce((sum, r) => sum + r.profit_loss, 0) / recent.length;
    const avgWinRate = recent.reduce((sum, r) => sum + r.win_rate, 0) / recent.length;
    return avgPnl * 0.7 + avgWinRate * 100 * 0.3;
}

export function optimizeAllocations(
    allocations: Readonly<Record<string, number>>,
    history: Readonly<Record<string, readonly StrategyResult[]>>,
): Record<string, number> {
    const scores = new Map<string, number>();
    for (const name of Object.keys(allocations)) {
        const score = strategyScore(history[name] ?? []);
        if (score !== null) scores.set(name, score);
    }
    if (scores.size === 0) return normalizeWithinBounds(allocations, MIN_ALLOCATION, MAX_ALLOCATION);

    const shift = Math.abs(Math.min(...scores.values()));
    const shifted = new Map([...scores].map(([name, score]) => [name, score + shift]));
    const total = [...shifted.values()].reduce((sum, s) => sum + s, 0);

    const blended: Record<string, number> = { ...allocations };
    for (const [name, value] of shifted) {
        const weight = total > 0 ? value / total : 1 / shifted.size;
        const next = SMOOTHING * allocations[name] + (1 - SMOOTHING) * weight;
        blended[name] = clamp(next, MIN_ALLOCATION, MAX_ALLOCATION);
    }

    return normalizeWithinBounds(blended, MIN_ALLOCATION, MAX_ALLOCATION);
}

/**
 * Rescale to sum 1 with every value kept in [lo, hi]: finds λ such that
 * Σ clamp(λ·w) = 1. When the bounds cannot hold (one strategy, or more
 * than 1/lo of them) this is a plain proportional rescale.
 */
export function normalizeWithinBounds(
    weights: Readonly<Record<string, number>>,
    lo: number,
    hi: number,
): Record<string, number> {
    const names = Object.keys(weights);
    const n = names.length;
    if (n === 0) return {};

    const values = names.map((name) => Math.max(0, weights[name]));
    const sum = values.reduce((a, b) => a + b, 0);

    if (n * lo > 1 || n * hi < 1) {
        return Object.fromEntries(names.map((name, i) => [name, sum > 0 ? values[i] / sum : 1 / n]));
    }

    const positive = values.filter((v) => v > 0);
    if (positive.length === 0) {
        return Object.fromEntries(names.map((name) => [name, 1 / n]));
    }

    const massAt = (lambda: number) => values.reduce((acc, v) => acc + clamp(lambda * v, lo, hi), 0);
    let low = 0;
    let high = hi / Math.min(...positive);
    for (let i = 0; i < 200 && high - low > 1e-15 * high; i++) {
        const mid = (low + high) / 2;
        if (massAt(mid) < 1) low = mid;
        else high = mid;
    }

    const scaled = values.map((v) => clamp(high * v, lo, hi));
    const total = scaled.reduce((a, b) => a + b, 0);
    return Object.fromEntries(names.map((name, i) => [name, scaled[i] / total]));
}

function clamp(value: number, lo: number, hi: number): number {
    return Math.max(lo, Math.min(hi, value));
}
