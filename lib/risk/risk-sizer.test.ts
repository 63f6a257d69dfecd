import { describe, expect, it } from 'vitest';
import { RiskSizer } from './risk-sizer';

const config = { initialBankroll: 100, dailyLossLimit: 0.2 };

describe('RiskSizer.getRiskProfile', () => {
    const sizer = new RiskSizer(config);

    it('picks the tier from bankroll and win rate', () => {
        expect(sizer.getRiskProfile(79, 0.9).level).toBe('tight');
        expect(sizer.getRiskProfile(80, 0.9).level).toBe('conservative');
        expect(sizer.getRiskProfile(100, 0.5).level).toBe('moderate');
        expect(sizer.getRiskProfile(100, 0.56).level).toBe('moderate-aggressive');
        expect(sizer.getRiskProfile(150, 0.61).level).toBe('aggressive');
        expect(sizer.getRiskProfile(150, 0.6).level).toBe('moderate-aggressive');
    });

    it('tightens every limit as the bankroll shrinks', () => {
        const tight = sizer.getRiskProfile(40, 0.5);
        const conservative = sizer.getRiskProfile(90, 0.5);
        const moderate = sizer.getRiskProfile(110, 0.5);

        expect(tight).toEqual({ level: 'tight', max_position_pct: 0.01, min_ev_threshold: 0.1, kelly_multiplier: 0.1 });
        expect(tight.max_position_pct).toBeLessThan(conservative.max_position_pct);
        expect(conservative.max_position_pct).toBeLessThan(moderate.max_position_pct);
        expect(tight.kelly_multiplier).toBeLessThan(conservative.kelly_multiplier);
        expect(tight.min_ev_threshold).toBeGreaterThan(moderate.min_ev_threshold);
    });
});

describe('RiskSizer.calculatePositionSize', () => {
    it('returns zero for a tight-profile size under the trade floor', () => {
        const sizer = new RiskSizer(config);
        expect(sizer.getRiskProfile(40, 0.5).level).toBe('tight');
        expect(sizer.calculatePositionSize(40, 0.5, 0.1, 2.0)).toBe(0);
    });

    it('caps a tight-profile size at 1% of bankroll when the floor allows it', () => {
        const sizer = new RiskSizer({ ...config, minTradeUsd: 0.1 });
        expect(sizer.calculatePositionSize(40, 0.5, 0.1, 2.0)).toBe(0.4);
    });

    it('rounds small sizes to ten cents', () => {
        // moderate: kelly 0.2875 × 0.20 = 0.0575, capped at 0.03 → $3.60
        const sizer = new RiskSizer(config);
        expect(sizer.calculatePositionSize(120, 0.5, 0.05, 2.0)).toBe(3.6);
    });

    it('rounds larger sizes to whole dollars', () => {
        // aggressive: kelly 0.4 × 0.30 = 0.12, capped at 0.05 → $10
        const sizer = new RiskSizer(config);
        expect(sizer.calculatePositionSize(200, 0.7, 0.2, 2.0)).toBe(10);
    });

    it('uses the fractional Kelly size when it is under the cap', () => {
        // moderate-aggressive at 1.6x: p = 1.02 / 3 = 0.34, kelly = (1.02 - 0.66) / 3 = 0.12
        // 0.12 × 0.25 = 0.03 < 0.04 cap → 160 × 0.03 = $4.80
        const sizer = new RiskSizer(config);
        expect(sizer.calculatePositionSize(160, 0.5, 0.02, 3.0)).toBe(4.8);
    });

    it('returns zero when the Kelly fraction is not positive', () => {
        // p = 0.4 / 2 = 0.2, kelly = (0.4 - 0.8) / 2 < 0
        const sizer = new RiskSizer(config);
        expect(sizer.calculatePositionSize(100, 0.5, -0.6, 2.0)).toBe(0);
    });

    it('never exceeds max_position_pct of bankroll', () => {
        const sizer = new RiskSizer(config);
        for (const bankroll of [45, 79, 95, 100, 130, 149, 151, 300, 1000]) {
            for (const winRate of [0.3, 0.56, 0.65]) {
                for (const ev of [0.01, 0.05, 0.2, 0.8]) {
                    for (const odds of [1.2, 2, 5]) {
                        const cap = bankroll * sizer.getRiskProfile(bankroll, winRate).max_position_pct;
                        expect(sizer.calculatePositionSize(bankroll, winRate, ev, odds)).toBeLessThanOrEqual(cap + 1e-9);
                    }
                }
            }
        }
    });
});

describe('RiskSizer circuit breakers', () => {
    it('stops trading once the daily loss limit is reached', () => {
        const sizer = new RiskSizer(config);
        sizer.recordResult(-15);
        expect(sizer.canTrade(100)).toBe(true);
        sizer.recordResult(-5);
        expect(sizer.dailyLoss).toBe(20);
        expect(sizer.canTrade(100)).toBe(false);
    });

    it('stops trading below half the initial bankroll', () => {
        const sizer = new RiskSizer(config);
        expect(sizer.canTrade(50)).toBe(true);
        expect(sizer.canTrade(49.99)).toBe(false);
    });

    it('resets the daily loss on a new UTC day', () => {
        let now = new Date('2026-03-02T23:00:00Z');
        const sizer = new RiskSizer(config, { now: () => now });
        sizer.recordResult(-25);
        expect(sizer.canTrade(100)).toBe(false);

        now = new Date('2026-03-03T00:05:00Z');
        expect(sizer.canTrade(100)).toBe(true);
        expect(sizer.dailyLoss).toBe(0);
    });

    it('tracks win and loss streaks', () => {
        const sizer = new RiskSizer(config);
        sizer.recordResult(2);
        sizer.recordResult(1);
        expect(sizer.consecutiveWins).toBe(2);
        sizer.recordResult(-1);
        expect(sizer.consecutiveWins).toBe(0);
        expect(sizer.consecutiveLosses).toBe(1);
    });
});

describe('RiskSizer.calculateEv', () => {
    it('computes expected value per dollar staked', () => {
        const sizer = new RiskSizer(config);
        expect(sizer.calculateEv(0.55, 2)).toBeCloseTo(0.1, 10);
        expect(sizer.meetsEvThreshold(0.1, 100, 0.5)).toBe(true);
        expect(sizer.meetsEvThreshold(0.05, 100, 0.5)).toBe(false);
    });
});
