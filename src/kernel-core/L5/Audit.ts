// src/kernel-core/L5/Audit.ts
import { canonicalize, GENESIS_HASH, hash } from '../L0/Crypto.js';
import type { Decision } from '../L0/Ontology.js';
import { AuditChainBroken } from '../Errors.js';

/**
 * Event Store Port. The store is the source of truth for history when present.
 */
export interface IEventStore {
    append(record: AuditRecord): Promise<void>;
    getHistory(): Promise<AuditRecord[]>;
    getLatest(): Promise<AuditRecord | null>;
}

// --- Audit Record (the institutional truth substrate) ---
export interface AuditRecord {
    sequenceNumber: number;
    proposalHash: string;
    prevHash: string;
    decisionSummary: string; // canonical JSON of `decision`
    recordHash: string;
    decision: Decision;
}

/**
 * Transport representation. Key order is part of the contract so
 * independent verifiers can recompute `record_hash`.
 */
export interface AuditRecordWire {
    sequence_number: number;
    proposal_hash: string;
    prev_hash: string;
    decision_summary: string;
    record_hash: string;
}

export interface ChainVerification {
    valid: boolean;
    firstBrokenLink: number | null;
    reason: string;
    checked: number;
}

export function computeRecordHash(sequenceNumber: number, proposalHash: string, prevHash: string, decisionSummary: string): string {
    const canonical: [number, string, string, string] = [sequenceNumber, proposalHash, prevHash, decisionSummary];
    return hash(canonicalize(canonical));
}

export function toWire(record: AuditRecord): AuditRecordWire {
    return {
        sequence_number: record.sequenceNumber,
        proposal_hash: record.proposalHash,
        prev_hash: record.prevHash,
        decision_summary: record.decisionSummary,
        record_hash: record.recordHash
    };
}

export function fromWire(wire: AuditRecordWire): AuditRecord {
    const decision: Decision = JSON.parse(wire.decision_summary);
    return Object.freeze({
        sequenceNumber: wire.sequence_number,
        proposalHash: wire.proposal_hash,
        prevHash: wire.prev_hash,
        decisionSummary: wire.decision_summary,
        recordHash: wire.record_hash,
        decision
    });
}

export class AuditLog {
    private localChain: AuditRecord[] = [];
    private tip: AuditRecord | null = null;
    private hydrated = false;
    private lock: Promise<void> = Promise.resolve();
    private breach: ChainVerification | null = null;

    constructor(private store?: IEventStore) { }

    /**
     * Single serialization point: appends never interleave, so sequence
     * numbers are strictly increasing and gap-free.
     */
    public append(proposalHash: string, decision: Decision): Promise<AuditRecord> {
        return this.exclusive(async () => {
            if (!this.hydrated) {
                this.tip = this.store ? await this.store.getLatest() : null;
                this.hydrated = true;
            }

            const sequenceNumber = (this.tip?.sequenceNumber ?? 0) + 1;
            const prevHash = this.tip?.recordHash ?? GENESIS_HASH;
            const decisionSummary = canonicalize(decision);

            const record: AuditRecord = Object.freeze({
                sequenceNumber,
                proposalHash,
                prevHash,
                decisionSummary,
                recordHash: computeRecordHash(sequenceNumber, proposalHash, prevHash, decisionSummary),
                decision
            });

            if (this.store) {
                await this.store.append(record);
            } else {
                this.localChain.push(record);
            }
            this.tip = record;
            return record;
        });
    }

    public async getHistory(): Promise<AuditRecord[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    /**
     * Read access to historical records. Does not take the append lock.
     */
    public async rangeQuery(fromSeq: number, toSeq: number = Number.MAX_SAFE_INTEGER): Promise<readonly AuditRecord[]> {
        const history = await this.getHistory();
        return history.filter(r => r.sequenceNumber >= fromSeq && r.sequenceNumber <= toSeq);
    }

    public async findByDecisionId(decisionId: string): Promise<AuditRecord | undefined> {
        const history = await this.getHistory();
        return history.find(r => r.decision.decisionId === decisionId);
    }

    /**
     * Recomputes the chain over [fromSeq, toSeq] and reports the first broken link.
     * A broken chain halts trust in the log until `resolveBreach` is called.
     */
    public async verify(fromSeq: number = 1, toSeq: number = Number.MAX_SAFE_INTEGER): Promise<ChainVerification> {
        const history = await this.getHistory();
        const result = this.verifyRecords(history, fromSeq, toSeq);
        if (!result.valid) {
            this.breach = result;
            console.warn(`[AuditLog] Chain broken at sequence ${result.firstBrokenLink}: ${result.reason}`);
        }
        return result;
    }

    public async assertIntact(fromSeq?: number, toSeq?: number): Promise<void> {
        const result = await this.verify(fromSeq, toSeq);
        if (!result.valid) throw new AuditChainBroken(result);
    }

    public get isTrusted() { return this.breach === null; }
    public get lastBreach() { return this.breach; }

    public resolveBreach(operator: string): void {
        if (this.breach) {
            console.log(`[AuditLog] Breach at sequence ${this.breach.firstBrokenLink} resolved by ${operator}`);
        }
        this.breach = null;
    }

    public async getTip(): Promise<AuditRecord | null> {
        if (this.hydrated) return this.tip;
        return this.store ? await this.store.getLatest() : null;
    }

    private verifyRecords(history: AuditRecord[], fromSeq: number, toSeq: number): ChainVerification {
        const broken = (seq: number, reason: string, checked: number): ChainVerification =>
            ({ valid: false, firstBrokenLink: seq, reason, checked });

        let expectedSeq = 1;
        let prev = GENESIS_HASH;
        let checked = 0;

        for (const entry of history) {
            if (entry.sequenceNumber > toSeq) break;
            const inRange = entry.sequenceNumber >= fromSeq;

            if (inRange) {
                // 1. Sequence continuity
                if (entry.sequenceNumber !== expectedSeq) {
                    return broken(expectedSeq, `expected sequence ${expectedSeq}, found ${entry.sequenceNumber}`, checked);
                }
                // 2. Linkage
                if (entry.prevHash !== prev) {
                    return broken(entry.sequenceNumber, 'previous hash does not match preceding record', checked);
                }
                // 3. Hash
                const h = computeRecordHash(entry.sequenceNumber, entry.proposalHash, entry.prevHash, entry.decisionSummary);
                if (h !== entry.recordHash) {
                    return broken(entry.sequenceNumber, 'record hash mismatch', checked);
                }
                // 4. Summary matches the decision it describes
                if (canonicalize(entry.decision) !== entry.decisionSummary) {
                    return broken(entry.sequenceNumber, 'decision summary does not match decision', checked);
                }
                checked++;
            }

            expectedSeq = entry.sequenceNumber + 1;
            prev = entry.recordHash;
        }

        return { valid: true, firstBrokenLink: null, reason: 'chain intact', checked };
    }

    private exclusive<T>(fn: () => Promise<T>): Promise<T> {
        const run = this.lock.then(fn);
        this.lock = run.then(() => undefined, () => undefined);
        return run;
    }
}
