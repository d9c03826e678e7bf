import { TaskEntity } from '../db/task.entity';

/**
 * Durable mapping of task id → task record.
 *
 * Every `save` is atomic and durable before it resolves: a reader never sees
 * a half-written record, and a process killed right after `save` returns
 * loses nothing. I/O failures surface as `StoreError`.
 */
export interface TaskStore {
    /** Human-readable location, used for logs and the leader lease key. */
    readonly location: string;
    /** All records. Missing storage is an empty store, not an error. */
    load(): Promise<TaskEntity[]>;
    save(task: TaskEntity): Promise<void>;
    /** @throws TaskNotFoundError */
    get(id: string): Promise<TaskEntity>;
    /** All records, oldest `created_at` first. */
    list(): Promise<TaskEntity[]>;
    close(): Promise<void>;
}

export function byCreatedAt(a: TaskEntity, b: TaskEntity): number {
    const diff = a.created_at.getTime() - b.created_at.getTime();
    if (diff !== 0) return diff;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
