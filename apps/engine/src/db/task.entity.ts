import type { ErrorKind } from '@seedferry/sdk';

/**
 * Lifecycle states for transfer tasks.
 * Tasks progress: PENDING → SUBMITTED → DOWNLOADING → DOWNLOADED → UPLOADING → COMPLETED,
 * with FAILED reachable from any non-terminal state and REMOVED set by the operator.
 */
export enum taskState {
    PENDING = 'pending',
    SUBMITTED = 'submitted',
    DOWNLOADING = 'downloading',
    DOWNLOADED = 'downloaded',
    UPLOADING = 'uploading',
    COMPLETED = 'completed',
    FAILED = 'failed',
    REMOVED = 'removed'
}

export const TERMINAL_STATES: ReadonlySet<taskState> = new Set([
    taskState.COMPLETED,
    taskState.FAILED,
    taskState.REMOVED,
]);

export interface TaskProgress {
    fraction: number;
    bytes_done: number;
    bytes_total: number;
}

/** Last failure recorded on a task. */
export interface TaskError {
    kind: ErrorKind;
    code: string;
    message: string;
    at: Date;
}

/**
 * One download-then-upload unit of work, as persisted.
 * Mutated only by the orchestrator once created.
 */
export interface TaskEntity {
    id: string;
    source: string;
    state: taskState;
    download_handle: string | null;
    name: string | null;
    progress: TaskProgress | null;  // advisory, never used for decisions
    local_path: string | null;
    remote_path: string | null;
    error: TaskError | null;
    retry_count: number;            // consecutive transient failures
    next_attempt_at: Date | null;   // backoff gate
    created_at: Date;
    updated_at: Date;
}

export function newTask(id: string, source: string, now: Date): TaskEntity {
    return {
        id,
        source,
        state: taskState.PENDING,
        download_handle: null,
        name: null,
        progress: null,
        local_path: null,
        remote_path: null,
        error: null,
        retry_count: 0,
        next_attempt_at: null,
        created_at: now,
        updated_at: now,
    };
}
