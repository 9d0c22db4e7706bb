/**
 * Constitutional Kernel Error Taxonomy
 * Centralized error codes for formal rejections and terminal failures.
 */
import type { Decision } from './L0/Ontology.js';
import type { ChainVerification } from './L5/Audit.js';

export enum ErrorCode {
    // I. Input
    INVALID_PROPOSAL = 'INVALID_PROPOSAL',
    INVALID_CONFIG = 'INVALID_CONFIG',

    // II. Resource
    BUDGET_EXCEEDED = 'BUDGET_EXCEEDED',
    BUDGET_CLOSED = 'BUDGET_CLOSED',

    // III. Enforcement
    CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',
    SIGN_OFF_REQUIRED = 'SIGN_OFF_REQUIRED',
    DECISION_NOT_FOUND = 'DECISION_NOT_FOUND',
    NOT_ESCALATED = 'NOT_ESCALATED',

    // IV. Coordination
    DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE',

    // V. Integrity
    AUDIT_CHAIN_BROKEN = 'AUDIT_CHAIN_BROKEN',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Kernel:${code}] ${message}`);
        this.name = 'KernelError';
    }
}

/**
 * Malformed input, rejected before any gate runs. Never retried.
 */
export class InvalidProposal extends KernelError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(ErrorCode.INVALID_PROPOSAL, message, { issues });
        this.name = 'InvalidProposal';
    }
}

export class InvalidConfig extends KernelError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(ErrorCode.INVALID_CONFIG, message, { issues });
        this.name = 'InvalidConfig';
    }
}

export class BudgetExceeded extends KernelError {
    constructor(public readonly requested: number, public readonly remaining: number) {
        super(ErrorCode.BUDGET_EXCEEDED, `Energy budget exceeded: requested ${requested}, remaining ${remaining}`, { requested, remaining });
        this.name = 'BudgetExceeded';
    }
}

/**
 * Enforce-mode surfacing of a REJECT decision. Always carries the full Decision.
 */
export class ConstraintViolation extends KernelError {
    constructor(public readonly decision: Decision) {
        super(
            ErrorCode.CONSTRAINT_VIOLATION,
            `Proposal ${decision.proposalId} rejected by gates: ${decision.gatesFailed.join(', ') || 'none'}`,
            { decisionId: decision.decisionId, gatesFailed: [...decision.gatesFailed] }
        );
        this.name = 'ConstraintViolation';
    }
}

export class SignOffRequired extends KernelError {
    constructor(public readonly decisionId: string) {
        super(ErrorCode.SIGN_OFF_REQUIRED, `Decision ${decisionId} requires external sign-off`, { decisionId });
        this.name = 'SignOffRequired';
    }
}

export class DependencyCycle extends KernelError {
    constructor(public readonly cycle: string[]) {
        super(ErrorCode.DEPENDENCY_CYCLE, `Dependency cycle: ${cycle.join(' -> ')}`, { cycle });
        this.name = 'DependencyCycle';
    }
}

/**
 * Verification-time only. Trust in the log is halted until resolved.
 */
export class AuditChainBroken extends KernelError {
    constructor(public readonly verification: ChainVerification) {
        super(
            ErrorCode.AUDIT_CHAIN_BROKEN,
            `Audit chain broken at sequence ${verification.firstBrokenLink ?? '?'}: ${verification.reason}`,
            { firstBrokenLink: verification.firstBrokenLink }
        );
        this.name = 'AuditChainBroken';
    }
}
