import { describe, test, expect } from '@jest/globals';
import { EvidenceAggregator, phaseForEntityCount } from '../Evidence.js';

describe('EvidenceAggregator', () => {
    test('empty evidence scores 0.0 and never meets the tier', () => {
        expect(EvidenceAggregator.score([], 'Genesis')).toEqual({ weightedScore: 0.0, minTierMet: false });
    });

    test('uses tier defaults when no override is given', () => {
        expect(EvidenceAggregator.score([{ tier: 1 }], 'Genesis').weightedScore).toBe(1.0);
        expect(EvidenceAggregator.score([{ tier: 2 }, { tier: 4 }], 'Genesis').weightedScore).toBeCloseTo(0.5);
    });

    test('weight override replaces the tier default', () => {
        const { weightedScore } = EvidenceAggregator.score([{ tier: 4, weightOverride: 0.9 }, { tier: 1 }], 'Genesis');
        expect(weightedScore).toBeCloseTo(0.95);
    });

    test('minimum tier tightens with the phase', () => {
        const tier3 = [{ tier: 3 as const }];
        expect(EvidenceAggregator.score(tier3, 'Genesis').minTierMet).toBe(true);
        expect(EvidenceAggregator.score(tier3, 'Adolescent').minTierMet).toBe(true);
        expect(EvidenceAggregator.score(tier3, 'Mature').minTierMet).toBe(false);
        expect(EvidenceAggregator.score(tier3, 'Systemic').minTierMet).toBe(false);
    });

    test('one strong item is enough to meet the tier', () => {
        const items = [{ tier: 4 as const }, { tier: 4 as const }, { tier: 1 as const }];
        expect(EvidenceAggregator.score(items, 'Systemic').minTierMet).toBe(true);
    });

    test('phase derives from entity count', () => {
        expect(phaseForEntityCount(0)).toBe('Genesis');
        expect(phaseForEntityCount(9)).toBe('Genesis');
        expect(phaseForEntityCount(10)).toBe('Adolescent');
        expect(phaseForEntityCount(999)).toBe('Mature');
        expect(phaseForEntityCount(1000)).toBe('Systemic');
    });
});
