import type { Decision } from '../L0/Ontology.js';

export interface Acknowledgment {
    decisionId: string;
    approver: string;
    note?: string;
    acknowledgedAt: string;
}

/**
 * External sign-off for ESCALATE_HUMAN decisions.
 * The kernel never blocks on a human; it only records that one has signed.
 */
export class EscalationLedger {
    private acknowledgments: Map<string, Acknowledgment> = new Map();

    public record(decisionId: string, approver: string, acknowledgedAt: string, note?: string): Acknowledgment {
        const existing = this.acknowledgments.get(decisionId);
        if (existing) return existing;

        const ack: Acknowledgment = Object.freeze({
            decisionId,
            approver,
            acknowledgedAt,
            ...(note ? { note } : {})
        });
        this.acknowledgments.set(decisionId, ack);
        return ack;
    }

    public get(decisionId: string): Acknowledgment | undefined {
        return this.acknowledgments.get(decisionId);
    }

    public isCleared(decision: Decision): boolean {
        if (decision.overall === 'APPROVE') return true;
        if (decision.overall === 'ESCALATE_HUMAN') return this.acknowledgments.has(decision.decisionId);
        return false;
    }
}
