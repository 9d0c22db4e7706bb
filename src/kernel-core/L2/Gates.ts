// src/kernel-core/L2/Gates.ts
import type { KernelConfig } from '../Config.js';
import type { EnergyBudget } from '../L0/EnergyBudget.js';
import { GATE_NAMES, netEnergy } from '../L0/Ontology.js';
import type { EnforcementMode, GateId, GateName, GateOutcome, GateResult, Phase, Proposal } from '../L0/Ontology.js';
import { EvidenceAggregator } from '../L1/Evidence.js';

// --- Gate Pattern ---
export interface EvaluationContext {
    readonly config: KernelConfig;
    readonly phase: Phase;
    readonly mode: EnforcementMode;
    readonly budget: EnergyBudget;
}

export interface Gate {
    readonly id: GateId;
    readonly name: GateName;
    evaluate(proposal: Proposal, ctx: EvaluationContext): GateResult;
}

interface Verdict {
    outcome: GateOutcome;
    message: string;
    viabilityPowerDelta?: number;
}

const PASS = (message: string, viabilityPowerDelta?: number): Verdict => ({ outcome: 'PASS', message, viabilityPowerDelta });
const FAIL = (message: string, viabilityPowerDelta?: number): Verdict => ({ outcome: 'FAIL', message, viabilityPowerDelta });
const ESCALATE = (message: string): Verdict => ({ outcome: 'ESCALATE', message });

/**
 * Wraps a pure check so its energy cost is charged before it runs.
 * A BudgetExceeded thrown by the charge propagates to the pipeline.
 */
function metered(
    id: GateId,
    check: (proposal: Proposal, ctx: EvaluationContext) => Verdict,
    extraCost: (proposal: Proposal, ctx: EvaluationContext) => number = () => 0
): Gate {
    const name = GATE_NAMES[id];
    return Object.freeze({
        id,
        name,
        evaluate(proposal: Proposal, ctx: EvaluationContext): GateResult {
            const cost = ctx.config.gateCosts.base[id] + extraCost(proposal, ctx);
            ctx.budget.charge(cost);

            const verdict = check(proposal, ctx);
            const result: GateResult = {
                gateId: id,
                gate: name,
                outcome: verdict.outcome,
                message: verdict.message,
                energySpent: cost,
                ...(verdict.viabilityPowerDelta !== undefined ? { viabilityPowerDelta: verdict.viabilityPowerDelta } : {})
            };
            return Object.freeze(result);
        }
    });
}

// --- Constitutional Gates ---

// 1. Thermodynamic Solvency
export const ThermodynamicSolvencyGate = metered(1, (p) => {
    const eNet = netEnergy(p);
    if (eNet <= 0) {
        return FAIL(`thermodynamically insolvent: E_net ${eNet} <= 0`);
    }
    if (p.eInvested >= p.eProduction) {
        return FAIL(`thermodynamically insolvent: E_invested ${p.eInvested} >= E_production ${p.eProduction}`);
    }
    return PASS(`Solvent: E_net ${eNet}, E_invested ${p.eInvested} < E_production ${p.eProduction}`);
});

// 2. Cognitive Variety
export const CognitiveVarietyGate = metered(2, (p) => {
    const models = p.alternativeModels.filter(m => m.trim().length > 0);
    if (models.length === 0) {
        return FAIL('No dissenting or alternative model declared');
    }
    return PASS(`${models.length} alternative model(s) declared`);
});

// 3. Hardware Viability (hard resource limit)
export const HardwareViabilityGate = metered(3, (p, ctx) => {
    const limit = ctx.config.memoryLimitBytes;
    if (p.estimatedMemoryBytes >= limit) {
        return FAIL(`Hard resource limit: estimated memory ${p.estimatedMemoryBytes} bytes >= limit ${limit} bytes`);
    }
    return PASS(`Estimated memory ${p.estimatedMemoryBytes} bytes within limit ${limit} bytes`);
});

// 4. Evidence Sufficiency
export const EvidenceSufficiencyGate = metered(4, (p, ctx) => {
    const { weightedScore, minTierMet } = EvidenceAggregator.score(p.evidenceItems, ctx.phase);
    const threshold = ctx.config.evidenceScoreThreshold;
    const problems: string[] = [];

    if (weightedScore < threshold) problems.push(`weighted score ${weightedScore} < ${threshold}`);
    if (!minTierMet) problems.push(`no evidence meets the minimum tier for phase ${ctx.phase}`);

    if (problems.length > 0) {
        return FAIL(`Insufficient evidence: ${problems.join('; ')}`);
    }
    return PASS(`Evidence sufficient: weighted score ${weightedScore} >= ${threshold}`);
}, (p, ctx) => p.evidenceItems.length * ctx.config.gateCosts.perEvidenceItem);

// 5. Viability Power
export const ViabilityPowerGate = metered(5, (p, ctx) => {
    const threshold = ctx.config.rAbsoluteThreshold;
    if (p.rAbsolute >= threshold) {
        return PASS(`VP accrual permitted: R_absolute ${p.rAbsolute} >= ${threshold}`, p.viabilityPowerClaim);
    }
    if (p.viabilityPowerClaim > 0) {
        return FAIL(`VP accrual of ${p.viabilityPowerClaim} claimed with R_absolute ${p.rAbsolute} < ${threshold}`, 0);
    }
    return PASS(`VP delta zero: R_absolute ${p.rAbsolute} < ${threshold}`, 0);
});

// 6. Human Escalation
export const HumanEscalationGate = metered(6, (p, ctx) => {
    const threshold = ctx.config.escalationThreshold;
    if (p.impactScore > threshold) {
        return ESCALATE(`Impact ${p.impactScore} exceeds escalation threshold ${threshold}: human judgment required`);
    }
    return PASS(`Impact ${p.impactScore} within threshold ${threshold}`);
});

/**
 * The constitutional gate set, in evaluation order. Closed: not extensible at runtime.
 */
export const GATES: readonly Gate[] = Object.freeze([
    ThermodynamicSolvencyGate,
    CognitiveVarietyGate,
    HardwareViabilityGate,
    EvidenceSufficiencyGate,
    ViabilityPowerGate,
    HumanEscalationGate
]);

// Fatal in enforce mode: short-circuits the remaining gates
export const FATAL_GATES: ReadonlySet<GateId> = new Set<GateId>([3]);
