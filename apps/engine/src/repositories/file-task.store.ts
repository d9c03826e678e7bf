import fs from 'fs/promises';
import path from 'path';
import { TaskEntity } from '../db/task.entity';
import { TASK_FILE_VERSION, TaskFile, taskFileSchema } from '../db/task.schema';
import { StoreError, TaskNotFoundError } from '../errors/store.error';
import { byCreatedAt, TaskStore } from './task.store';

const TAG = '[store]';
const ID_PATTERN = /^[0-9A-Za-z-]+$/;

function isNotFound(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Task store backed by a directory of JSON files, one per task:
 *
 *   <root>/tasks/<id>.json  →  { "version": 1, "task": { ... } }
 *
 * One file per record keeps concurrent writers (a CLI `add` next to a
 * running loop) from rewriting each other's tasks. Writes go to a temp file
 * in the same directory, are fsynced, then renamed over the target, and the
 * directory is fsynced after the rename.
 */
export class FileTaskStore implements TaskStore {
    private readonly tasksDir: string;

    constructor(private readonly rootDir: string) {
        this.tasksDir = path.join(rootDir, 'tasks');
    }

    get location(): string {
        return path.resolve(this.rootDir);
    }

    async load(): Promise<TaskEntity[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(this.tasksDir);
        } catch (err) {
            if (isNotFound(err)) return [];
            throw new StoreError(`cannot read ${this.tasksDir}: ${errorMessage(err)}`, { cause: err });
        }

        const tasks: TaskEntity[] = [];
        for (const entry of entries) {
            // temp files from an interrupted save are not records
            if (!entry.endsWith('.json')) continue;
            const task = await this.readTask(path.join(this.tasksDir, entry));
            if (task) tasks.push(task);
        }
        return tasks.sort(byCreatedAt);
    }

    list(): Promise<TaskEntity[]> {
        return this.load();
    }

    async get(id: string): Promise<TaskEntity> {
        if (!ID_PATTERN.test(id)) throw new TaskNotFoundError(id);
        const task = await this.readTask(this.fileFor(id));
        if (!task) throw new TaskNotFoundError(id);
        return task;
    }

    async save(task: TaskEntity): Promise<void> {
        if (!ID_PATTERN.test(task.id)) {
            throw new StoreError(`refusing to store task with unsafe id "${task.id}"`);
        }
        const target = this.fileFor(task.id);
        const tmp = `${target}.${process.pid}.${Date.now()}.tmp`;
        const payload: TaskFile = { version: TASK_FILE_VERSION, task };

        try {
            await fs.mkdir(this.tasksDir, { recursive: true });
            const handle = await fs.open(tmp, 'w');
            try {
                await handle.writeFile(`${JSON.stringify(payload, null, 2)}\n`, 'utf8');
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.rename(tmp, target);
            // the rename is only durable once the directory entry is
            const dir = await fs.open(this.tasksDir, 'r');
            try {
                await dir.sync();
            } finally {
                await dir.close();
            }
        } catch (err) {
            await fs.rm(tmp, { force: true });
            throw new StoreError(`cannot save task ${task.id}: ${errorMessage(err)}`, { cause: err });
        }
    }

    async close(): Promise<void> {
        // nothing held open between calls
    }

    private fileFor(id: string): string {
        return path.join(this.tasksDir, `${id}.json`);
    }

    private async readTask(file: string): Promise<TaskEntity | null> {
        let raw: string;
        try {
            raw = await fs.readFile(file, 'utf8');
        } catch (err) {
            // removed between readdir and read
            if (isNotFound(err)) return null;
            throw new StoreError(`cannot read ${file}: ${errorMessage(err)}`, { cause: err });
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            throw new StoreError(`${file} is not valid JSON: ${errorMessage(err)}`, { cause: err });
        }

        const parsed = taskFileSchema.safeParse(json);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
            throw new StoreError(`${file} is not a version ${TASK_FILE_VERSION} task file (${where})`);
        }

        const expectedId = path.basename(file, '.json');
        if (parsed.data.task.id !== expectedId) {
            console.warn(`${TAG} ${file} holds task ${parsed.data.task.id}, ignoring`);
            return null;
        }
        return parsed.data.task;
    }
}
