import Database from 'better-sqlite3';
import { fromWire, toWire } from '../../kernel-core/L5/Audit.js';
import type { AuditRecord, AuditRecordWire, IEventStore } from '../../kernel-core/L5/Audit.js';

interface AuditRow {
    sequence_number: number;
    proposal_hash: string;
    prev_hash: string;
    decision_summary: string;
    record_hash: string;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'kernel-audit.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        // Column order mirrors the hash chain field order
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence_number INTEGER PRIMARY KEY,
                proposal_hash TEXT NOT NULL,
                prev_hash TEXT NOT NULL,
                decision_summary TEXT NOT NULL,
                record_hash TEXT UNIQUE NOT NULL
            )
        `);
    }

    async append(record: AuditRecord): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                sequence_number, proposal_hash, prev_hash, decision_summary, record_hash
            ) VALUES (
                @sequence_number, @proposal_hash, @prev_hash, @decision_summary, @record_hash
            )
        `);
        const wire: AuditRecordWire = toWire(record);
        stmt.run(wire);
    }

    async getHistory(): Promise<AuditRecord[]> {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence_number ASC');
        return stmt.all().map(row => this.mapRowToRecord(row));
    }

    async getLatest(): Promise<AuditRecord | null> {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence_number DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToRecord(row);
    }

    /**
     * Raw export in chain field order, for independent verifiers.
     */
    public exportWire(): AuditRecordWire[] {
        return this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence_number ASC').all();
    }

    private mapRowToRecord(row: AuditRow): AuditRecord {
        return fromWire({
            sequence_number: row.sequence_number,
            proposal_hash: row.proposal_hash,
            prev_hash: row.prev_hash,
            decision_summary: row.decision_summary,
            record_hash: row.record_hash
        });
    }

    public close() {
        this.db.close();
    }
}
