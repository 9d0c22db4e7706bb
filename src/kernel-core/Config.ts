import { z } from 'zod';
import { InvalidConfig } from './Errors.js';
import { deepFreeze } from './L0/Crypto.js';
import type { EnforcementMode, GateId } from './L0/Ontology.js';

export const GIB = 1024 ** 3;

const GateCostsSchema = z.object({
    base: z.object({
        1: z.number().int().nonnegative(),
        2: z.number().int().nonnegative(),
        3: z.number().int().nonnegative(),
        4: z.number().int().nonnegative(),
        5: z.number().int().nonnegative(),
        6: z.number().int().nonnegative()
    }),
    perEvidenceItem: z.number().int().nonnegative()
});

const PhaseSourceSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('proposal') }),
    z.object({ kind: z.literal('entityCount'), entityCount: z.number().int().nonnegative() })
]);

export const KernelConfigSchema = z.object({
    mode: z.enum(['observe', 'advise', 'enforce']),
    memoryLimitBytes: z.number().int().positive(),
    evidenceScoreThreshold: z.number().min(0).max(1),
    rAbsoluteThreshold: z.number().finite(),
    escalationThreshold: z.number().min(0).max(1),
    phaseSource: PhaseSourceSchema,
    gateCosts: GateCostsSchema,
    concurrency: z.number().int().positive(),
    timeoutMs: z.number().int().positive().optional()
});

export type PhaseSource = z.infer<typeof PhaseSourceSchema>;
export type GateCosts = z.infer<typeof GateCostsSchema>;

export interface KernelConfig {
    readonly mode: EnforcementMode;
    readonly memoryLimitBytes: number;
    readonly evidenceScoreThreshold: number;
    readonly rAbsoluteThreshold: number;
    readonly escalationThreshold: number;
    readonly phaseSource: Readonly<PhaseSource>;
    readonly gateCosts: {
        readonly base: Readonly<Record<GateId, number>>;
        readonly perEvidenceItem: number;
    };
    readonly concurrency: number;
    readonly timeoutMs?: number;
}

export const DEFAULT_CONFIG: KernelConfig = deepFreeze<KernelConfig>({
    mode: 'enforce',
    memoryLimitBytes: 3 * GIB,
    evidenceScoreThreshold: 0.7,
    rAbsoluteThreshold: 0.5,
    escalationThreshold: 0.8,
    phaseSource: { kind: 'proposal' },
    gateCosts: {
        base: { 1: 1, 2: 1, 3: 1, 4: 1, 5: 1, 6: 1 },
        perEvidenceItem: 1
    },
    concurrency: 4
});

export type ConfigOverrides = Partial<Omit<KernelConfig, 'gateCosts'>> & {
    gateCosts?: {
        base?: Partial<Record<GateId, number>>;
        perEvidenceItem?: number;
    };
};

/**
 * Builds an immutable configuration. Read-only after startup.
 */
export function createConfig(overrides: ConfigOverrides = {}): KernelConfig {
    const merged = {
        ...DEFAULT_CONFIG,
        ...overrides,
        gateCosts: {
            base: { ...DEFAULT_CONFIG.gateCosts.base, ...overrides.gateCosts?.base },
            perEvidenceItem: overrides.gateCosts?.perEvidenceItem ?? DEFAULT_CONFIG.gateCosts.perEvidenceItem
        }
    };

    const parsed = KernelConfigSchema.safeParse(merged);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new InvalidConfig('Invalid kernel configuration', issues);
    }
    return deepFreeze(parsed.data);
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const ENV_NUMBER = z.coerce.number();

function numberFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return undefined;
    const parsed = ENV_NUMBER.safeParse(raw);
    if (!parsed.success || !Number.isFinite(parsed.data)) {
        throw new InvalidConfig(`${key} must be a number`, [`${key}: ${raw}`]);
    }
    return parsed.data;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): KernelConfig {
    const overrides: Mutable<ConfigOverrides> = {};

    const mode = env['KERNEL_MODE'];
    if (mode !== undefined) {
        const parsed = KernelConfigSchema.shape.mode.safeParse(mode);
        if (!parsed.success) throw new InvalidConfig(`KERNEL_MODE must be observe, advise or enforce`, [`KERNEL_MODE: ${mode}`]);
        overrides.mode = parsed.data;
    }

    const memoryLimitBytes = numberFromEnv(env, 'KERNEL_MEMORY_LIMIT_BYTES');
    if (memoryLimitBytes !== undefined) overrides.memoryLimitBytes = memoryLimitBytes;
    const evidenceScoreThreshold = numberFromEnv(env, 'KERNEL_EVIDENCE_THRESHOLD');
    if (evidenceScoreThreshold !== undefined) overrides.evidenceScoreThreshold = evidenceScoreThreshold;
    const rAbsoluteThreshold = numberFromEnv(env, 'KERNEL_R_ABSOLUTE_THRESHOLD');
    if (rAbsoluteThreshold !== undefined) overrides.rAbsoluteThreshold = rAbsoluteThreshold;
    const escalationThreshold = numberFromEnv(env, 'KERNEL_ESCALATION_THRESHOLD');
    if (escalationThreshold !== undefined) overrides.escalationThreshold = escalationThreshold;
    const concurrency = numberFromEnv(env, 'KERNEL_CONCURRENCY');
    if (concurrency !== undefined) overrides.concurrency = concurrency;
    const timeoutMs = numberFromEnv(env, 'KERNEL_TIMEOUT_MS');
    if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs;

    return createConfig(overrides);
}
