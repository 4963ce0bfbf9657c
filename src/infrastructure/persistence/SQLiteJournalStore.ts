import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { z } from 'zod';
import type { IJournalStore } from '../../Ports.js';
import { JOURNAL_EVENTS } from '../../L5/Journal.js';
import type { JournalEntry } from '../../L5/Journal.js';

export interface SQLiteJournalStoreOptions {
    /** Existing database file contents, as produced by `export()`. */
    data?: Uint8Array;
    /** Pre-loaded sql.js module. */
    sqlJs?: SqlJsStatic;
}

const rowSchema = z.object({
    sequence: z.number().int().nonnegative(),
    entryId: z.string(),
    previousEntryId: z.string(),
    chainId: z.number().int(),
    event: z.enum(JOURNAL_EVENTS),
    promiseId: z.string(),
    actor: z.string(),
    detail: z.string().nullable()
});

const detailSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

let loading: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
    if (!loading) loading = initSqlJs();
    return loading;
}

/**
 * Journal store on sql.js (SQLite compiled to WebAssembly). Loading the
 * module is asynchronous; once open, every call is synchronous.
 */
export class SQLiteJournalStore implements IJournalStore {
    private constructor(private db: Database) {
        this.initialize();
    }

    static async open(options: SQLiteJournalStoreOptions = {}): Promise<SQLiteJournalStore> {
        const SQL = options.sqlJs ?? await loadSqlJs();
        return new SQLiteJournalStore(new SQL.Database(options.data));
    }

    private initialize() {
        this.db.run(`
            CREATE TABLE IF NOT EXISTS promise_journal (
                sequence INTEGER PRIMARY KEY,
                entryId TEXT UNIQUE NOT NULL,
                previousEntryId TEXT NOT NULL,
                chainId INTEGER NOT NULL,
                event TEXT NOT NULL,
                promiseId TEXT NOT NULL,
                actor TEXT NOT NULL,
                detail TEXT
            )
        `);
    }

    append(entry: JournalEntry): void {
        this.db.run(`
            INSERT INTO promise_journal (
                sequence, entryId, previousEntryId, chainId, event, promiseId, actor, detail
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?
            )
        `, [
            entry.sequence,
            entry.entryId,
            entry.previousEntryId,
            entry.chainId,
            entry.event,
            entry.promiseId,
            entry.actor,
            entry.detail ? JSON.stringify(entry.detail) : null
        ]);
    }

    getHistory(): JournalEntry[] {
        return this.query('SELECT * FROM promise_journal ORDER BY sequence ASC');
    }

    getLatest(): JournalEntry | null {
        return this.query('SELECT * FROM promise_journal ORDER BY sequence DESC LIMIT 1')[0] ?? null;
    }

    /**
     * The whole database as an SQLite file image.
     */
    public export(): Uint8Array {
        return this.db.export();
    }

    public close() {
        this.db.close();
    }

    private query(sql: string): JournalEntry[] {
        const stmt = this.db.prepare(sql);
        const entries: JournalEntry[] = [];
        try {
            while (stmt.step()) {
                entries.push(this.mapRowToEntry(rowSchema.parse(stmt.getAsObject())));
            }
        } finally {
            stmt.free();
        }
        return entries;
    }

    private mapRowToEntry(row: z.infer<typeof rowSchema>): JournalEntry {
        const detail = row.detail ? detailSchema.parse(JSON.parse(row.detail)) : undefined;
        return {
            entryId: row.entryId,
            previousEntryId: row.previousEntryId,
            sequence: row.sequence,
            chainId: row.chainId,
            event: row.event,
            promiseId: row.promiseId,
            actor: row.actor,
            ...(detail ? { detail } : {})
        };
    }
}
