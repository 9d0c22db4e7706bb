import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { EnergyBudget } from '../L0/EnergyBudget.js';
import type { GateName, GateResult, Proposal } from '../L0/Ontology.js';
import { BudgetExceeded } from '../Errors.js';
import { FATAL_GATES, GATES } from './Gates.js';
import type { EvaluationContext, Gate } from './Gates.js';

export type PipelineContext = Omit<EvaluationContext, 'budget'>;

export interface PipelineRun {
    results: readonly GateResult[];
    fatal: boolean;
    budgetExhausted: boolean;
    cancelledAt?: GateName;
    cancelReason?: string;
}

function describeAbort(signal: AbortSignal): string {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) return reason.message;
    if (typeof reason === 'string') return reason;
    return 'evaluation cancelled';
}

/**
 * Runs the constitutional gates in order 1 -> 6.
 * Gate failures never escape: they become FAIL results.
 */
export class GatePipeline {
    private readonly gates: readonly Gate[] = GATES;

    public async run(
        proposal: Proposal,
        context: PipelineContext,
        budget: EnergyBudget,
        signal?: AbortSignal
    ): Promise<PipelineRun> {
        const ctx: EvaluationContext = { ...context, budget };
        const results: GateResult[] = [];

        for (const gate of this.gates) {
            // Cooperative cancellation point: between gates, never mid-gate
            await yieldToEventLoop();
            if (signal?.aborted) {
                return { results, fatal: false, budgetExhausted: false, cancelledAt: gate.name, cancelReason: describeAbort(signal) };
            }

            let result: GateResult;
            try {
                result = gate.evaluate(proposal, ctx);
            } catch (e: unknown) {
                const exhausted = e instanceof BudgetExceeded;
                const message = e instanceof Error ? e.message : String(e);
                const failed: GateResult = {
                    gateId: gate.id,
                    gate: gate.name,
                    outcome: 'FAIL',
                    message: exhausted ? `energy budget exceeded: ${message}` : `gate error: ${message}`,
                    energySpent: 0
                };
                results.push(Object.freeze(failed));
                if (exhausted) {
                    return { results, fatal: false, budgetExhausted: true };
                }
                continue;
            }

            results.push(result);

            if (result.outcome === 'FAIL' && context.mode === 'enforce' && FATAL_GATES.has(gate.id)) {
                return { results, fatal: true, budgetExhausted: false };
            }
        }

        return { results, fatal: false, budgetExhausted: false };
    }
}
