import { Pool } from 'pg';
import { TaskEntity } from '../db/task.entity';
import { taskSchema } from '../db/task.schema';
import { StoreError, TaskNotFoundError } from '../errors/store.error';
import { TaskStore } from './task.store';

export const TRANSFER_TASKS_DDL = `
    CREATE TABLE IF NOT EXISTS transfer_tasks (
        id              TEXT PRIMARY KEY,
        source          TEXT NOT NULL,
        state           TEXT NOT NULL,
        download_handle TEXT,
        name            TEXT,
        progress        JSONB,
        local_path      TEXT,
        remote_path     TEXT,
        error           JSONB,
        retry_count     INTEGER NOT NULL DEFAULT 0,
        next_attempt_at TIMESTAMPTZ,
        created_at      TIMESTAMPTZ NOT NULL,
        updated_at      TIMESTAMPTZ NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_transfer_tasks_created ON transfer_tasks (created_at, id);
`;

const COLUMNS = [
    'id', 'source', 'state', 'download_handle', 'name', 'progress', 'local_path',
    'remote_path', 'error', 'retry_count', 'next_attempt_at', 'created_at', 'updated_at',
] as const;

// Single-statement upsert: Postgres makes each save atomic per row.
const UPSERT = `
    INSERT INTO transfer_tasks (${COLUMNS.join(', ')})
    VALUES (${COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})
    ON CONFLICT (id) DO UPDATE SET
        ${COLUMNS.filter(c => c !== 'id' && c !== 'created_at').map(c => `${c} = EXCLUDED.${c}`).join(',\n        ')}
`;

/** Task store for runs where the local disk does not outlive the process. */
export class PgTaskStore implements TaskStore {
    constructor(private readonly pool: Pool, readonly location = 'postgres') { }

    async init(): Promise<void> {
        await this.query(TRANSFER_TASKS_DDL, []);
    }

    async load(): Promise<TaskEntity[]> {
        const res = await this.query('SELECT * FROM transfer_tasks ORDER BY created_at ASC, id ASC', []);
        return res.map(row => this.fromRow(row));
    }

    list(): Promise<TaskEntity[]> {
        return this.load();
    }

    async get(id: string): Promise<TaskEntity> {
        const res = await this.query('SELECT * FROM transfer_tasks WHERE id = $1', [id]);
        const row = res[0];
        if (!row) throw new TaskNotFoundError(id);
        return this.fromRow(row);
    }

    async save(task: TaskEntity): Promise<void> {
        await this.query(UPSERT, [
            task.id,
            task.source,
            task.state,
            task.download_handle,
            task.name,
            task.progress === null ? null : JSON.stringify(task.progress),
            task.local_path,
            task.remote_path,
            task.error === null ? null : JSON.stringify(task.error),
            task.retry_count,
            task.next_attempt_at,
            task.created_at,
            task.updated_at,
        ]);
    }

    async close(): Promise<void> {
        await this.pool.end();
    }

    private async query(sql: string, params: unknown[]): Promise<unknown[]> {
        try {
            const res = await this.pool.query(sql, params);
            return res.rows;
        } catch (err) {
            throw new StoreError(`postgres: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
        }
    }

    private fromRow(row: unknown): TaskEntity {
        const parsed = taskSchema.safeParse(row);
        if (!parsed.success) {
            throw new StoreError(`malformed transfer_tasks row: ${parsed.error.message}`);
        }
        return parsed.data;
    }
}
