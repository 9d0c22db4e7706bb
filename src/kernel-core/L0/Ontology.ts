/**
 * KERNEL ONTOLOGY
 * The single source of truth for the primitives every gate evaluates.
 */

// --- 1. Classification ---
export type VsmFunction = 'A' | 'B' | 'C' | 'D' | 'E';
export type Phase = 'Genesis' | 'Adolescent' | 'Mature' | 'Systemic';
export type EvidenceTier = 1 | 2 | 3 | 4;

export const PHASES: readonly Phase[] = ['Genesis', 'Adolescent', 'Mature', 'Systemic'];

// --- 2. Evidence ---
export interface EvidenceItem {
    tier: EvidenceTier;
    weightOverride?: number;
}

// --- 3. Proposal (Thermodynamic Contract) ---
export interface Proposal {
    proposalId: string;

    // Energy terms: eNet = eIndustrial + eEcosystem + eInteraction
    eIndustrial: number;
    eEcosystem: number;
    eInteraction: number;
    eInvested: number;
    eProduction: number;

    estimatedMemoryBytes: number;
    evidenceItems: readonly EvidenceItem[];
    rAbsolute: number;
    entityTrustScore: number; // [0, 1]
    energyBudgetTokens: number;
    vsmFunction: VsmFunction;
    phaseContext: Phase;

    alternativeModels: readonly string[];
    impactScore: number; // [0, 1]
    viabilityPowerClaim: number;
    dependsOn: readonly string[];
}

export function netEnergy(p: Pick<Proposal, 'eIndustrial' | 'eEcosystem' | 'eInteraction'>): number {
    return p.eIndustrial + p.eEcosystem + p.eInteraction;
}

// --- 4. Gates ---
export type GateId = 1 | 2 | 3 | 4 | 5 | 6;
export type GateName =
    | 'THERMODYNAMIC_SOLVENCY'
    | 'COGNITIVE_VARIETY'
    | 'HARDWARE_VIABILITY'
    | 'EVIDENCE_SUFFICIENCY'
    | 'VIABILITY_POWER'
    | 'HUMAN_ESCALATION';

export const GATE_NAMES: Readonly<Record<GateId, GateName>> = {
    1: 'THERMODYNAMIC_SOLVENCY',
    2: 'COGNITIVE_VARIETY',
    3: 'HARDWARE_VIABILITY',
    4: 'EVIDENCE_SUFFICIENCY',
    5: 'VIABILITY_POWER',
    6: 'HUMAN_ESCALATION'
};

export type GateOutcome = 'PASS' | 'FAIL' | 'ESCALATE';

export interface GateResult {
    gateId: GateId;
    gate: GateName;
    outcome: GateOutcome;
    message: string;
    energySpent: number;
    viabilityPowerDelta?: number; // Gate 5 only
}

// --- 5. Decision ---
export type EnforcementMode = 'observe' | 'advise' | 'enforce';
export type Verdict = 'APPROVE' | 'REJECT' | 'ESCALATE_HUMAN';

export interface Decision {
    decisionId: string;
    proposalId: string;
    mode: EnforcementMode;
    results: readonly GateResult[];
    gatesPassed: number;
    gatesFailed: readonly GateName[];
    overall: Verdict;
    energyConsumed: number;
    viabilityPowerDelta: number;
    requiresSignOff: boolean;
    fatal: boolean;
    cancelled: boolean;
    note?: string;
    timestamp: string; // ISO-8601
}
