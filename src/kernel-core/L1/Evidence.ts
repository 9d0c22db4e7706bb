import type { EvidenceItem, EvidenceTier, Phase } from '../L0/Ontology.js';

// Lower tier = stronger evidence
export const TIER_WEIGHTS: Readonly<Record<EvidenceTier, number>> = {
    1: 1.0,
    2: 0.7,
    3: 0.5,
    4: 0.3
};

// Weakest tier that still satisfies each phase
export const PHASE_MIN_TIER: Readonly<Record<Phase, EvidenceTier>> = {
    Genesis: 4,
    Adolescent: 3,
    Mature: 2,
    Systemic: 1
};

export interface EvidenceScore {
    weightedScore: number;
    minTierMet: boolean;
}

export class EvidenceAggregator {
    public static effectiveWeight(item: EvidenceItem): number {
        return item.weightOverride ?? TIER_WEIGHTS[item.tier];
    }

    /**
     * Mean effective weight across items. An empty set scores 0.0 and never meets the tier.
     */
    public static score(items: readonly EvidenceItem[], phase: Phase): EvidenceScore {
        if (items.length === 0) {
            return { weightedScore: 0.0, minTierMet: false };
        }

        const total = items.reduce((sum, item) => sum + EvidenceAggregator.effectiveWeight(item), 0);
        const threshold = PHASE_MIN_TIER[phase];

        return {
            weightedScore: total / items.length,
            minTierMet: items.some(item => item.tier <= threshold)
        };
    }
}

/**
 * Growth stage of the entity population.
 */
export function phaseForEntityCount(entityCount: number): Phase {
    if (entityCount < 10) return 'Genesis';
    if (entityCount < 100) return 'Adolescent';
    if (entityCount < 1000) return 'Mature';
    return 'Systemic';
}
