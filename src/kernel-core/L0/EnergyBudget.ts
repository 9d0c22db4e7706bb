import { BudgetExceeded, ErrorCode, InvalidProposal, KernelError } from '../Errors.js';

/**
 * Scoped token accounting for exactly one evaluation run.
 * Charges are monotonic; there are no refunds.
 */
export class EnergyBudget {
    private consumed = 0;
    private closed = false;

    private constructor(public readonly maxTokens: number) { }

    public static open(maxTokens: number): EnergyBudget {
        if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
            throw new InvalidProposal(`Energy budget must be a positive integer, got ${maxTokens}`);
        }
        return new EnergyBudget(maxTokens);
    }

    /**
     * Opens a budget, runs `fn` against it, and finalizes it on every exit path.
     */
    public static async scope<T>(maxTokens: number, fn: (budget: EnergyBudget) => Promise<T>): Promise<T> {
        const budget = EnergyBudget.open(maxTokens);
        try {
            return await fn(budget);
        } finally {
            budget.close();
        }
    }

    public charge(amount: number): void {
        if (this.closed) throw new KernelError(ErrorCode.BUDGET_CLOSED, 'Cannot charge a closed energy budget');
        if (!Number.isFinite(amount) || amount < 0) {
            throw new KernelError(ErrorCode.BUDGET_EXCEEDED, `Charge must be a non-negative finite amount, got ${amount}`);
        }
        if (this.consumed + amount > this.maxTokens) {
            throw new BudgetExceeded(amount, this.remaining);
        }
        this.consumed += amount;
    }

    public get spent() { return this.consumed; }
    public get remaining() { return this.maxTokens - this.consumed; }
    public get isClosed() { return this.closed; }

    /**
     * Finalizes the scope. Idempotent; returns the total spent.
     */
    public close(): number {
        this.closed = true;
        return this.consumed;
    }
}
