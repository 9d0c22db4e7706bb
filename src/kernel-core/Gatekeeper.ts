import type { KernelConfig } from './Config.js';
import { deepFreeze, hashCanonical, newDecisionId } from './L0/Crypto.js';
import { EnergyBudget } from './L0/EnergyBudget.js';
import type { Decision, EnforcementMode, GateName, Phase, Proposal, Verdict } from './L0/Ontology.js';
import { createProposal } from './L0/ProposalSchema.js';
import type { ProposalInput } from './L0/ProposalSchema.js';
import { phaseForEntityCount } from './L1/Evidence.js';
import { GatePipeline } from './L2/GatePipeline.js';
import type { PipelineRun } from './L2/GatePipeline.js';
import { AuditLog } from './L5/Audit.js';
import { EscalationLedger } from './L5/Escalation.js';
import type { Acknowledgment } from './L5/Escalation.js';
import { ConstraintViolation, ErrorCode, KernelError, SignOffRequired } from './Errors.js';
import { SystemClock } from './Ports.js';
import type { ISystemClock } from './Ports.js';

export interface CheckOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface KernelMetrics {
    evaluated: number;
    approved: number;
    rejected: number;
    escalated: number;
    cancelled: number;
    energyConsumed: number;
    gateFailures: Record<GateName, number>;
}

function emptyGateFailures(): Record<GateName, number> {
    return {
        THERMODYNAMIC_SOLVENCY: 0,
        COGNITIVE_VARIETY: 0,
        HARDWARE_VIABILITY: 0,
        EVIDENCE_SUFFICIENCY: 0,
        VIABILITY_POWER: 0,
        HUMAN_ESCALATION: 0
    };
}

export class Gatekeeper {
    private readonly pipeline = new GatePipeline();

    private stats: KernelMetrics = {
        evaluated: 0,
        approved: 0,
        rejected: 0,
        escalated: 0,
        cancelled: 0,
        energyConsumed: 0,
        gateFailures: emptyGateFailures()
    };

    private readonly PRESSURE_THRESHOLD = 5;

    public constructor(
        private readonly config: KernelConfig,
        private readonly audit: AuditLog = new AuditLog(),
        private readonly clock: ISystemClock = SystemClock,
        private readonly escalations: EscalationLedger = new EscalationLedger()
    ) { }

    public get Audit() { return this.audit; }
    public get Config() { return this.config; }

    /**
     * Counters over every audited evaluation, single or batched.
     */
    public metrics(): KernelMetrics {
        return { ...this.stats, gateFailures: { ...this.stats.gateFailures } };
    }

    /**
     * Evaluates one proposal through the six gates and appends exactly one
     * audit record. Only enforce mode turns a REJECT into a thrown error.
     */
    public async checkProposal(
        input: Proposal | ProposalInput,
        mode: EnforcementMode = this.config.mode,
        options: CheckOptions = {}
    ): Promise<Decision> {
        // Rejected before any gate runs; nothing is audited
        const proposal = createProposal(input);
        const phase = this.resolvePhase(proposal);
        const cancellation = this.linkCancellation(options);

        let outcome: { run: PipelineRun; spent: number };
        try {
            outcome = await EnergyBudget.scope(proposal.energyBudgetTokens, async (budget) => {
                const run = await this.pipeline.run(proposal, { config: this.config, phase, mode }, budget, cancellation.signal);
                return { run, spent: budget.spent };
            });
        } finally {
            cancellation.dispose();
        }

        const decision = this.aggregate(proposal, mode, outcome.run, outcome.spent);
        await this.audit.append(hashCanonical(proposal), decision);
        this.instrument(decision);

        if (mode === 'enforce' && decision.overall === 'REJECT') {
            console.warn(`[Gatekeeper] Enforce: proposal ${proposal.proposalId} rejected (${decision.gatesFailed.join(', ')})`);
            throw new ConstraintViolation(decision);
        }

        return decision;
    }

    /**
     * Records external sign-off for an escalated decision.
     */
    public async acknowledge(decisionId: string, approver: string, note?: string): Promise<Acknowledgment> {
        const record = await this.audit.findByDecisionId(decisionId);
        if (!record) {
            throw new KernelError(ErrorCode.DECISION_NOT_FOUND, `No audited decision ${decisionId}`, { decisionId });
        }
        if (record.decision.overall !== 'ESCALATE_HUMAN') {
            throw new KernelError(ErrorCode.NOT_ESCALATED, `Decision ${decisionId} is ${record.decision.overall}, not ESCALATE_HUMAN`, { decisionId });
        }
        console.log(`[Gatekeeper] Escalation ${decisionId} acknowledged by ${approver}`);
        return this.escalations.record(decisionId, approver, this.clock.now(), note);
    }

    public isCleared(decision: Decision): boolean {
        return this.escalations.isCleared(decision);
    }

    /**
     * Guard for side effects tied to a proposal.
     */
    public assertCleared(decision: Decision): void {
        if (!this.isCleared(decision)) throw new SignOffRequired(decision.decisionId);
    }

    private resolvePhase(proposal: Proposal): Phase {
        const source = this.config.phaseSource;
        return source.kind === 'entityCount' ? phaseForEntityCount(source.entityCount) : proposal.phaseContext;
    }

    private aggregate(proposal: Proposal, mode: EnforcementMode, run: PipelineRun, spent: number): Decision {
        const { results } = run;
        const gatesFailed = results.filter(r => r.outcome === 'FAIL').map(r => r.gate);
        const escalated = run.cancelledAt !== undefined || results.some(r => r.outcome === 'ESCALATE');

        let overall: Verdict = 'APPROVE';
        if (escalated) overall = 'ESCALATE_HUMAN';
        else if (gatesFailed.length > 0) overall = 'REJECT';

        let note: string | undefined;
        if (run.cancelledAt !== undefined) {
            note = `cancelled before ${run.cancelledAt}: ${run.cancelReason ?? 'evaluation cancelled'}`;
            console.warn(`[Gatekeeper] Proposal ${proposal.proposalId} ${note}`);
        } else if (run.budgetExhausted) {
            note = `energy budget exhausted at ${results[results.length - 1]?.gate ?? 'unknown gate'}`;
        } else if (run.fatal) {
            note = `fatal failure at ${results[results.length - 1]?.gate ?? 'unknown gate'}; remaining gates not evaluated`;
        }

        const vpResult = results.find(r => r.gate === 'VIABILITY_POWER');
        const decision: Decision = {
            decisionId: newDecisionId(),
            proposalId: proposal.proposalId,
            mode,
            results,
            gatesPassed: results.filter(r => r.outcome === 'PASS').length,
            gatesFailed,
            overall,
            energyConsumed: spent,
            viabilityPowerDelta: overall === 'APPROVE' ? (vpResult?.viabilityPowerDelta ?? 0) : 0,
            requiresSignOff: mode === 'enforce' && overall === 'ESCALATE_HUMAN',
            fatal: run.fatal,
            cancelled: run.cancelledAt !== undefined,
            ...(note !== undefined ? { note } : {}),
            timestamp: this.clock.now()
        };
        // Shared with the audit log: nothing reachable from it may change
        return deepFreeze(decision);
    }

    private instrument(decision: Decision) {
        this.stats.evaluated++;
        this.stats.energyConsumed += decision.energyConsumed;
        if (decision.overall === 'APPROVE') this.stats.approved++;
        if (decision.overall === 'REJECT') this.stats.rejected++;
        if (decision.overall === 'ESCALATE_HUMAN') this.stats.escalated++;
        if (decision.cancelled) this.stats.cancelled++;

        for (const gate of decision.gatesFailed) {
            // Pressure: repeated failures on one gate
            const pressure = ++this.stats.gateFailures[gate];
            if (pressure > this.PRESSURE_THRESHOLD) {
                console.warn(`[Gatekeeper] Pressure Alert: gate ${gate} has failed ${pressure} proposals`);
            }
        }
    }

    private linkCancellation(options: CheckOptions): { signal: AbortSignal; dispose: () => void } {
        const controller = new AbortController();
        const { signal } = options;
        const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;

        const onAbort = () => controller.abort(signal?.reason);
        if (signal?.aborted) controller.abort(signal.reason);
        else signal?.addEventListener('abort', onAbort, { once: true });

        const timer = timeoutMs !== undefined
            ? setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs)
            : undefined;

        return {
            signal: controller.signal,
            dispose: () => {
                if (timer !== undefined) clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
            }
        };
    }
}
