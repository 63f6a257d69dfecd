/**
 * Risk Sizer: bankroll-tier risk profile and fractional-Kelly sizing.
 *
 * Tighten up when the bankroll is below its starting point, loosen when it
 * is above and the trailing win rate backs it up.
 *
 *   bankroll < 0.8x initial             → tight
 *   bankroll < 1.0x                     → conservative
 *   bankroll < 1.5x, win rate > 55%     → moderate-aggressive
 *   bankroll < 1.5x                     → moderate
 *   above, win rate > 60%               → aggressive
 *   above                               → moderate-aggressive
 *
 * Circuit breakers (checked before any sizing):
 *   1. Daily loss ≥ daily_loss_limit × initial bankroll
 *   2. Bankroll below 50% of initial
 */

import type { BotLogger } from '@/lib/logging/bot-logger';

// ──────────────────────────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────────────────────────

export type RiskLevel = 'tight' | 'conservative' | 'moderate' | 'moderate-aggressive' | 'aggressive';

export interface RiskProfile {
    level: RiskLevel;
    max_position_pct: number;   // max fraction of bankroll per trade
    min_ev_threshold: number;   // minimum expected value to trade
    kelly_multiplier: number;   // fraction of full Kelly to bet
}

export interface RiskSizerConfig {
    initialBankroll: number;
    dailyLossLimit: number;     // fraction of initial bankroll, e.g. 0.20
    minTradeUsd?: number;       // sizes below this resolve to 0
}

const PROFILES: Record<RiskLevel, RiskProfile> = {
    'tight': { level: 'tight', max_position_pct: 0.01, min_ev_threshold: 0.10, kelly_multiplier: 0.10 },
    'conservative': { level: 'conservative', max_position_pct: 0.02, min_ev_threshold: 0.07, kelly_multiplier: 0.15 },
    'moderate': { level: 'moderate', max_position_pct: 0.03, min_ev_threshold: 0.05, kelly_multiplier: 0.20 },
    'moderate-aggressive': { level: 'moderate-aggressive', max_position_pct: 0.04, min_ev_threshold: 0.05, kelly_multiplier: 0.25 },
    'aggressive': { level: 'aggressive', max_position_pct: 0.05, min_ev_threshold: 0.04, kelly_multiplier: 0.30 },
};

const DRAWDOWN_FLOOR = 0.5;

// ──────────────────────────────────────────────────────────────────────
// Risk Sizer
// ──────────────────────────────────────────────────────────────────────

export class RiskSizer {
    private readonly initialBankroll: number;
    private readonly dailyLossLimit: number;
    private readonly minTradeUsd: number;
    private readonly logger?: BotLogger;
    private readonly now: () => Date;

    private dailyLossUsd = 0;
    private dayKey: string;
    private wins = 0;
    private losses = 0;

    constructor(config: RiskSizerConfig, options: { logger?: BotLogger; now?: () => Date } = {}) {
        this.initialBankroll = config.initialBankroll;
        this.dailyLossLimit = config.dailyLossLimit;
        this.minTradeUsd = config.minTradeUsd ?? 1;
        this.logger = options.logger;
        this.now = options.now ?? (() => new Date());
        this.dayKey = this.currentDayKey();
    }

    getRiskProfile(bankroll: number, winRate: number): RiskProfile {
        const initial = this.initialBankroll;

        if (bankroll < initial * 0.8) return { ...PROFILES['tight'] };
        if (bankroll < initial) return { ...PROFILES['conservative'] };
        if (bankroll < initial * 1.5) {
            return winRate > 0.55 ? { ...PROFILES['moderate-aggressive'] } : { ...PROFILES['moderate'] };
        }
        if (winRate > 0.60) return { ...PROFILES['aggressive'] };
        return { ...PROFILES['moderate-aggressive'] };
    }

    /** EV per dollar staked at decimal odds. */
    calculateEv(winProbability: number, odds: number): number {
        return winProbability * (odds - 1) - (1 - winProbability);
    }

    meetsEvThreshold(ev: number, bankroll: number, winRate: number): boolean {
        return ev > this.getRiskProfile(bankroll, winRate).min_ev_threshold;
    }

    /**
     * Dollar size for a trade.
     *
     * Kelly % = (p × odds − (1 − p)) / odds, with p derived from EV,
     * scaled by the profile's Kelly multiplier and capped at
     * max_position_pct × bankroll.
     */
    calculatePositionSize(bankroll: number, winRate: number, ev: number, odds: number): number {
        if (bankroll <= 0 || odds <= 0) return 0;
        const profile = this.getRiskProfile(bankroll, winRate);

        const winProb = (ev + 1) / odds;
        const lossProb = 1 - winProb;
        const kellyPct = (winProb * odds - lossProb) / odds;

        const positionPct = Math.min(kellyPct * profile.kelly_multiplier, profile.max_position_pct);
        if (!(positionPct > 0)) return 0;

        const cap = bankroll * profile.max_position_pct;
        const size = bankroll * positionPct;
        if (size < this.minTradeUsd) return 0;

        const rounded = size < 5 ? roundWithinCap(size, 10, cap) : roundWithinCap(size, 1, cap);
        return rounded < this.minTradeUsd ? 0 : rounded;
    }

    canTrade(bankroll: number): boolean {
        this.rollDay();
        const initial = this.initialBankroll;

        if (this.dailyLossUsd >= initial * this.dailyLossLimit) {
            this.logger?.warn('RISK_CHECK', `Daily loss limit hit: lost $${this.dailyLossUsd.toFixed(2)} >= limit $${(initial * this.dailyLossLimit).toFixed(2)}`, {
                check: 'DAILY_LOSS_LIMIT',
            });
            return false;
        }

        if (bankroll < initial * DRAWDOWN_FLOOR) {
            this.logger?.warn('RISK_CHECK', `Drawdown circuit breaker: bankroll $${bankroll.toFixed(2)} below ${DRAWDOWN_FLOOR * 100}% of $${initial.toFixed(2)}`, {
                check: 'DRAWDOWN_BREAKER',
            });
            return false;
        }

        return true;
    }

    /** Record a realized result for streak and daily-loss tracking. */
    recordResult(profit: number): void {
        this.rollDay();
        if (profit > 0) {
            this.wins += 1;
            this.losses = 0;
        } else {
            this.losses += 1;
            this.wins = 0;
            this.dailyLossUsd += Math.abs(profit);
        }
    }

    resetDailyStats(): void {
        this.dailyLossUsd = 0;
        this.dayKey = this.currentDayKey();
    }

    get dailyLoss(): number {
        return this.dailyLossUsd;
    }

    get consecutiveWins(): number {
        return this.wins;
    }

    get consecutiveLosses(): number {
        return this.losses;
    }

    private rollDay(): void {
        const today = this.currentDayKey();
        if (today !== this.dayKey) {
            this.logger?.info('RISK_CHECK', `New trading day ${today}: daily loss reset`, { previous_loss: this.dailyLossUsd });
            this.resetDailyStats();
        }
    }

    private currentDayKey(): string {
        return this.now().toISOString().slice(0, 10);
    }
}

// Float noise in bankroll × pct (120 × 0.03 = 3.5999…) is not a cap breach.
const CAP_TOLERANCE = 1e-9;

/** Round to 1/steps, falling back to rounding down when rounding up would pass the cap. */
function roundWithinCap(size: number, steps: number, cap: number): number {
    const rounded = Math.round(size * steps) / steps;
    return rounded <= cap + CAP_TOLERANCE ? rounded : Math.floor(size * steps) / steps;
}
