import { z } from 'zod';
import { InvalidProposal } from '../Errors.js';
import { deepFreeze } from './Crypto.js';
import type { Proposal } from './Ontology.js';

const finite = () => z.number().finite();

export const EvidenceItemSchema = z.object({
    tier: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
    weightOverride: z.number().min(0).max(1).optional()
}).strict();

export const ProposalSchema = z.object({
    proposalId: z.string().min(1),
    eIndustrial: finite(),
    eEcosystem: finite(),
    eInteraction: finite(),
    eInvested: finite(),
    eProduction: finite(),
    estimatedMemoryBytes: z.number().int().nonnegative(),
    evidenceItems: z.array(EvidenceItemSchema),
    rAbsolute: finite(),
    entityTrustScore: z.number().min(0).max(1),
    energyBudgetTokens: z.number().int().positive(),
    vsmFunction: z.enum(['A', 'B', 'C', 'D', 'E']),
    phaseContext: z.enum(['Genesis', 'Adolescent', 'Mature', 'Systemic']),
    alternativeModels: z.array(z.string()).default([]),
    impactScore: z.number().min(0).max(1).default(0),
    viabilityPowerClaim: z.number().finite().nonnegative().default(0),
    dependsOn: z.array(z.string().min(1)).default([])
}).strict();

export type ProposalInput = z.input<typeof ProposalSchema>;

/**
 * Validates a structured document and returns a deep-frozen Proposal.
 * Malformed input fails fast with InvalidProposal.
 */
export function createProposal(input: unknown): Proposal {
    const parsed = ProposalSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
        throw new InvalidProposal(`Malformed proposal: ${issues[0] ?? 'unknown issue'}`, issues);
    }
    return deepFreeze(parsed.data);
}
