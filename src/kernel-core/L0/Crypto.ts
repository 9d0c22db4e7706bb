// src/kernel-core/L0/Crypto.ts
import { createHash, randomUUID } from 'crypto';

export const GENESIS_HASH = '0'.repeat(64);

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical JSON: sorted keys, no undefined members
export function canonicalize(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value ?? null);
    }
    if (Array.isArray(value)) {
        return `[${value.map(v => canonicalize(v === undefined ? null : v)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

export function hashCanonical(value: unknown): string {
    return hash(canonicalize(value));
}

// 1.3 Identifiers
export function newDecisionId(): string {
    return `dec:${randomUUID()}`;
}

export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}
