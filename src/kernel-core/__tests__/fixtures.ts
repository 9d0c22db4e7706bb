import { GIB } from '../Config.js';
import type { AuditRecord, IEventStore } from '../L5/Audit.js';
import type { Proposal } from '../L0/Ontology.js';

/**
 * A proposal that clears all six gates under the default configuration.
 * Costs 7 tokens: one per gate plus one per evidence item.
 */
export function makeProposal(overrides: Partial<Proposal> = {}): Proposal {
    return {
        proposalId: 'prop-1',
        eIndustrial: 100,
        eEcosystem: 0,
        eInteraction: 0,
        eInvested: 10,
        eProduction: 50,
        estimatedMemoryBytes: 1 * GIB,
        evidenceItems: [{ tier: 1 }],
        rAbsolute: 0.6,
        entityTrustScore: 0.9,
        energyBudgetTokens: 100,
        vsmFunction: 'A',
        phaseContext: 'Genesis',
        alternativeModels: ['model-b'],
        impactScore: 0.2,
        viabilityPowerClaim: 0,
        dependsOn: [],
        ...overrides
    };
}

// --- In-process Event Store ---
export class MemoryEventStore implements IEventStore {
    public records: AuditRecord[] = [];

    async append(record: AuditRecord): Promise<void> {
        this.records.push(record);
    }
    async getHistory(): Promise<AuditRecord[]> {
        return [...this.records];
    }
    async getLatest(): Promise<AuditRecord | null> {
        return this.records.length > 0 ? this.records[this.records.length - 1] ?? null : null;
    }
}
