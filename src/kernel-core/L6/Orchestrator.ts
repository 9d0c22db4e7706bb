import type { KernelConfig } from '../Config.js';
import { ConstraintViolation, DependencyCycle, InvalidProposal } from '../Errors.js';
import { Gatekeeper } from '../Gatekeeper.js';
import type { KernelMetrics } from '../Gatekeeper.js';
import type { Decision, EnforcementMode, Proposal } from '../L0/Ontology.js';
import { createProposal } from '../L0/ProposalSchema.js';
import type { ProposalInput } from '../L0/ProposalSchema.js';

export interface CoordinateOptions {
    mode?: EnforcementMode;
    signal?: AbortSignal;
    timeoutMs?: number;
}

/**
 * Orders proposals so every in-batch dependency precedes its dependents.
 * Dependencies outside the batch are treated as already satisfied.
 */
export function dependencyOrder(proposals: readonly Proposal[]): Proposal[] {
    const byId = new Map<string, Proposal>();
    for (const p of proposals) {
        if (byId.has(p.proposalId)) {
            throw new InvalidProposal(`Duplicate proposalId ${p.proposalId} in batch`, [`proposalId: ${p.proposalId}`]);
        }
        byId.set(p.proposalId, p);
    }

    const state = new Map<string, 'visiting' | 'done'>();
    const ordered: Proposal[] = [];
    const path: string[] = [];

    const visit = (p: Proposal) => {
        const mark = state.get(p.proposalId);
        if (mark === 'done') return;
        if (mark === 'visiting') {
            const start = path.indexOf(p.proposalId);
            throw new DependencyCycle([...path.slice(start), p.proposalId]);
        }

        state.set(p.proposalId, 'visiting');
        path.push(p.proposalId);
        for (const depId of p.dependsOn) {
            const dep = byId.get(depId);
            if (dep) visit(dep);
        }
        path.pop();
        state.set(p.proposalId, 'done');
        ordered.push(p);
    };

    for (const p of proposals) visit(p);
    return ordered;
}

/**
 * Bounded worker pool: at most `size` tasks in flight.
 */
export class WorkerPool {
    private active = 0;
    private waiting: Array<() => void> = [];

    constructor(private readonly size: number) { }

    public async run<T>(task: () => Promise<T>): Promise<T> {
        if (this.active >= this.size) {
            // The finishing task hands its slot over directly
            await new Promise<void>(resolve => this.waiting.push(resolve));
        } else {
            this.active++;
        }
        try {
            return await task();
        } finally {
            const next = this.waiting.shift();
            if (next) next();
            else this.active--;
        }
    }

    public get inFlight() { return this.active; }
}

export class Orchestrator {
    constructor(
        private readonly config: KernelConfig,
        private readonly gatekeeper: Gatekeeper = new Gatekeeper(config)
    ) { }

    public get Gatekeeper() { return this.gatekeeper; }

    /**
     * Evaluates a batch concurrently, honouring declared dependencies.
     * Decisions are returned in input order.
     */
    public async coordinate(inputs: readonly (Proposal | ProposalInput)[], options: CoordinateOptions = {}): Promise<Decision[]> {
        const proposals = inputs.map(input => createProposal(input));
        const ordered = dependencyOrder(proposals);

        const pool = new WorkerPool(this.config.concurrency);
        const mode = options.mode ?? this.config.mode;
        const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
        const pending = new Map<string, Promise<Decision>>();

        // Tasks are created in dependency order, so every dependency's promise already exists
        for (const proposal of ordered) {
            const deps = proposal.dependsOn
                .map(id => pending.get(id))
                .filter((d): d is Promise<Decision> => d !== undefined);

            pending.set(proposal.proposalId, Promise.all(deps).then(() =>
                pool.run(() => this.evaluate(proposal, mode, { signal: options.signal, timeoutMs }))
            ));
        }

        const decisions = await Promise.all(proposals.map(p => {
            const decision = pending.get(p.proposalId);
            if (!decision) throw new InvalidProposal(`Proposal ${p.proposalId} was not scheduled`);
            return decision;
        }));

        const count = (verdict: Decision['overall']) => decisions.filter(d => d.overall === verdict).length;
        console.log(`[Orchestrator] Coordinated ${decisions.length} proposals: ${count('APPROVE')} approved, ${count('REJECT')} rejected, ${count('ESCALATE_HUMAN')} escalated`);
        return decisions;
    }

    public metrics(): KernelMetrics {
        return this.gatekeeper.metrics();
    }

    private async evaluate(proposal: Proposal, mode: EnforcementMode, options: { signal?: AbortSignal; timeoutMs?: number }): Promise<Decision> {
        let decision: Decision;
        try {
            decision = await this.gatekeeper.checkProposal(proposal, mode, options);
        } catch (e: unknown) {
            if (!(e instanceof ConstraintViolation)) throw e;
            decision = e.decision;
        }
        return decision;
    }
}
