/**
 * Environment Port: System Clock
 * Normalizes time for the kernel so evaluations can be replayed in tests.
 */
export interface ISystemClock {
    now(): string; // ISO-8601
}

export const SystemClock: ISystemClock = {
    now: () => new Date().toISOString()
};

/**
 * Deterministic clock: advances one millisecond per reading.
 */
export class FixedStepClock implements ISystemClock {
    private ticks = 0;

    constructor(private readonly start: number = Date.UTC(2026, 0, 1)) { }

    public now(): string {
        return new Date(this.start + this.ticks++).toISOString();
    }
}
