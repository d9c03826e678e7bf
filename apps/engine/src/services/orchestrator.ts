import { classifyError, DownloadGateway, DownloadStatus, TransientError, UploadGateway } from '@seedferry/sdk';
import { TaskEntity, TaskError, TaskProgress, taskState } from '../db/task.entity';
import { StoreError } from '../errors/store.error';
import { IllegalTransitionError, InvariantViolationError } from '../errors/transition.error';
import { TaskStore } from '../repositories/task.store';
import { BackoffOptions, calculateBackOff } from '../utils/backoff';
import { advance, assertInvariants, assertTransition, hasChanged, isTerminal } from './state-machine';

const TAG = '[orchestrator]';

export interface RetryPolicy {
    /** Consecutive transient failures after which the task is failed. */
    maxConsecutiveFailures: number;
    backoff: BackoffOptions;
}

export interface OrchestratorConfig {
    remoteFolder: string;
    /** Delete the downloaded content through the download engine once uploaded. */
    purgeOnComplete: boolean;
    retry: RetryPolicy;
}

export interface OrchestratorDeps {
    store: TaskStore;
    downloads: DownloadGateway;
    uploads: UploadGateway;
    config: OrchestratorConfig;
    clock?: () => Date;
}

export interface TickReport {
    /** Non-terminal tasks seen this tick, including deferred ones. */
    active: number;
    /** Tasks whose backoff window had not elapsed. */
    deferred: number;
    /** Tasks that changed state. */
    advanced: number;
    /** Tasks that ended this tick in FAILED. */
    failed: number;
    /** Tasks that recorded an error without failing. */
    errored: number;
}

export interface RunOptions {
    intervalMs: number;
    /** Exit after this long, finishing the tick in progress first. */
    maxRuntimeMs?: number;
    /** Exit once no task is left to advance. */
    exitWhenIdle?: boolean;
    signal?: AbortSignal;
}

export interface RemoveOptions {
    purgeFiles: boolean;
}

/**
 * Drives every non-terminal task one transition per tick.
 *
 * Tasks are processed one after another; each mutation is saved before the
 * next task is looked at. A gateway failure is recorded on its task and
 * never stops the tick. Store failures do.
 */
export class Orchestrator {
    private readonly store: TaskStore;
    private readonly downloads: DownloadGateway;
    private readonly uploads: UploadGateway;
    private readonly config: OrchestratorConfig;
    private readonly clock: () => Date;

    private stopRequested = false;
    private loop: Promise<void> | null = null;
    private wake: (() => void) | null = null;

    constructor(deps: OrchestratorDeps) {
        this.store = deps.store;
        this.downloads = deps.downloads;
        this.uploads = deps.uploads;
        this.config = deps.config;
        this.clock = deps.clock ?? (() => new Date());
    }

    async tick(): Promise<TickReport> {
        const report: TickReport = { active: 0, deferred: 0, advanced: 0, failed: 0, errored: 0 };
        const tasks = await this.store.list();

        for (const task of tasks) {
            if (isTerminal(task.state)) continue;
            report.active++;

            if (task.next_attempt_at && task.next_attempt_at.getTime() > this.clock().getTime()) {
                report.deferred++;
                continue;
            }

            const stepped = await this.step(task);
            if (!hasChanged(task, stepped)) continue;

            const next = await this.persistOrFail(task, stepped);
            if (!next) continue;

            if (next.state !== task.state) {
                report.advanced++;
                console.log(`${TAG} task ${task.id}: ${task.state} -> ${next.state}`);
            }
            if (next.state === taskState.FAILED) {
                report.failed++;
                console.error(`${TAG} task ${task.id} failed: ${next.error?.code}: ${next.error?.message}`);
            } else if (next.error) {
                report.errored++;
                const retry = next.error.kind === 'TransientError'
                    ? ` (attempt ${next.retry_count}/${this.config.retry.maxConsecutiveFailures})`
                    : '';
                console.warn(`${TAG} task ${task.id}: ${next.error.code}: ${next.error.message}${retry}`);
            }
            if (next.state === taskState.COMPLETED) {
                await this.afterCompleted(next);
            }
        }

        return report;
    }

    /**
     * Ticks until stopped, aborted, past the deadline or, with
     * `exitWhenIdle`, out of work. Stopping never interrupts a tick.
     */
    run(options: RunOptions): Promise<void> {
        if (this.loop) throw new Error('orchestrator is already running');
        this.stopRequested = false;

        const onAbort = () => this.requestStop();
        options.signal?.addEventListener('abort', onAbort, { once: true });
        if (options.signal?.aborted) this.requestStop();

        this.loop = this.loopUntilStopped(options).finally(() => {
            options.signal?.removeEventListener('abort', onAbort);
            this.loop = null;
        });
        return this.loop;
    }

    /** Requests a graceful stop and waits for the current tick to finish. */
    async stop(): Promise<void> {
        this.requestStop();
        if (this.loop) await this.loop;
    }

    /**
     * Operator removal. Cancels the transfer in the download engine (keeping
     * the files unless asked otherwise) and marks the task REMOVED.
     */
    async remove(id: string, options: RemoveOptions): Promise<TaskEntity> {
        const task = await this.store.get(id);
        if (task.state === taskState.REMOVED) return task;
        assertTransition(task, taskState.REMOVED);

        if (task.download_handle) {
            await this.downloads.cancel(task.download_handle, options.purgeFiles);
        }

        const removed: TaskEntity = {
            ...task,
            state: taskState.REMOVED,
            next_attempt_at: null,
            updated_at: this.clock(),
        };
        await this.store.save(removed);
        console.log(`${TAG} task ${id} removed (purge files: ${options.purgeFiles})`);
        return removed;
    }

    private async loopUntilStopped(options: RunOptions): Promise<void> {
        const startedAt = Date.now();
        const deadline = options.maxRuntimeMs ? startedAt + options.maxRuntimeMs : null;
        console.log(`${TAG} started (interval: ${options.intervalMs}ms${deadline ? `, max runtime: ${options.maxRuntimeMs}ms` : ''})`);

        while (!this.stopRequested) {
            const report = await this.tick();

            if (options.exitWhenIdle && report.active === 0) {
                console.log(`${TAG} no active tasks left`);
                break;
            }
            if (deadline !== null && Date.now() >= deadline) {
                console.log(`${TAG} max runtime reached`);
                break;
            }
            if (this.stopRequested) break;

            const remaining = deadline === null ? options.intervalMs : Math.min(options.intervalMs, deadline - Date.now());
            await this.sleep(Math.max(remaining, 0));
        }

        console.log(`${TAG} stopped`);
    }

    /** Asks the loop to exit after the tick in progress, without waiting for it. */
    requestStop(): void {
        this.stopRequested = true;
        this.wake?.();
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve();
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
        });
    }

    // One transition for one task. Gateway failures and broken records come
    // back as a record carrying the error; only store failures are thrown.
    private async step(task: TaskEntity): Promise<TaskEntity> {
        try {
            switch (task.state) {
                case taskState.PENDING:
                    return await this.submit(task);
                case taskState.SUBMITTED:
                case taskState.DOWNLOADING:
                    return await this.pollDownload(task);
                case taskState.DOWNLOADED:
                    return await this.beginUpload(task);
                case taskState.UPLOADING:
                    return await this.upload(task);
                default:
                    return task;
            }
        } catch (err) {
            if (err instanceof StoreError) throw err;
            // an inconsistent record (hand-edited file, bad row) fails alone
            if (isRecordError(err)) return this.failBroken(task, err);
            return this.recordError(task, err);
        }
    }

    private async submit(task: TaskEntity): Promise<TaskEntity> {
        const handle = await this.downloads.submit(task.source);
        return advance(task, taskState.SUBMITTED, { download_handle: handle }, this.clock());
    }

    private async pollDownload(task: TaskEntity): Promise<TaskEntity> {
        const handle = this.require(task, 'download_handle');
        const status = await this.downloads.status(handle);
        const changes = {
            progress: toProgress(status),
            name: status.name ?? task.name,
        };

        if (status.state === 'error') {
            return this.fail(task, {
                kind: 'FatalGatewayError',
                code: 'DownloadError',
                message: status.error ?? 'download engine reported an error',
            }, changes);
        }

        if (status.state !== 'complete') {
            if (task.state === taskState.DOWNLOADING && !task.error && !hasProgressed(task, changes)) {
                return task;
            }
            return advance(task, taskState.DOWNLOADING, changes, this.clock());
        }

        if (!status.localPath) {
            throw new TransientError('download reported complete without a local path');
        }
        return advance(task, taskState.DOWNLOADED, { ...changes, local_path: status.localPath }, this.clock());
    }

    private async beginUpload(task: TaskEntity): Promise<TaskEntity> {
        this.require(task, 'local_path');
        await this.uploads.ensureAuthenticated();
        return advance(task, taskState.UPLOADING, {}, this.clock());
    }

    private async upload(task: TaskEntity): Promise<TaskEntity> {
        const localPath = this.require(task, 'local_path');
        // an expired credential surfaces here, before any bytes are sent
        await this.uploads.ensureAuthenticated();
        const remotePath = await this.uploads.upload(localPath, this.config.remoteFolder);
        return advance(task, taskState.COMPLETED, { remote_path: remotePath }, this.clock());
    }

    private async afterCompleted(task: TaskEntity): Promise<void> {
        if (!this.config.purgeOnComplete || !task.download_handle) return;
        try {
            await this.downloads.cancel(task.download_handle, true);
            console.log(`${TAG} task ${task.id}: purged local content`);
        } catch (err) {
            // the upload is done; a leftover download is the operator's to clean
            console.error(`${TAG} task ${task.id}: purge failed:`, err);
        }
    }

    private recordError(task: TaskEntity, err: unknown): TaskEntity {
        const now = this.clock();
        const classified = classifyError(err);
        const error: TaskError = { ...classified, at: now };

        if (classified.kind === 'InputError' || classified.kind === 'FatalGatewayError') {
            return this.fail(task, classified);
        }

        if (classified.kind === 'AuthError') {
            // waits for a credential; does not spend the retry budget
            if (task.error?.code === error.code && task.error.message === error.message) return task;
            return { ...task, error, updated_at: now };
        }

        const attempt = task.retry_count + 1;
        if (attempt >= this.config.retry.maxConsecutiveFailures) {
            return { ...this.fail(task, classified), retry_count: attempt };
        }
        const delay = calculateBackOff(attempt, this.config.retry.backoff);
        return {
            ...task,
            error,
            retry_count: attempt,
            next_attempt_at: new Date(now.getTime() + delay),
            updated_at: now,
        };
    }

    private fail(
        task: TaskEntity,
        error: Omit<TaskError, 'at'>,
        changes: Partial<Pick<TaskEntity, 'progress' | 'name'>> = {},
    ): TaskEntity {
        assertTransition(task, taskState.FAILED);
        const now = this.clock();
        return {
            ...task,
            ...changes,
            state: taskState.FAILED,
            error: { ...error, at: now },
            next_attempt_at: null,
            updated_at: now,
        };
    }

    private failBroken(task: TaskEntity, err: InvariantViolationError | IllegalTransitionError): TaskEntity {
        return this.fail(task, { kind: 'FatalGatewayError', code: err.name, message: err.message });
    }

    // A result that breaks the lifecycle rules marks the task FAILED instead;
    // when even that cannot be stored the task is skipped.
    private async persistOrFail(prev: TaskEntity, next: TaskEntity): Promise<TaskEntity | null> {
        try {
            return (await this.persist(prev, next)) ? next : null;
        } catch (err) {
            if (!isRecordError(err)) throw err;
            const failed = this.failBroken(prev, err);
            try {
                return (await this.persist(prev, failed)) ? failed : null;
            } catch (again) {
                if (!isRecordError(again)) throw again;
                console.error(`${TAG} task ${prev.id} skipped: ${again.message}`);
                return null;
            }
        }
    }

    // Saves `next` unless the stored copy moved on since `prev` was read,
    // e.g. an operator removed the task from another process mid-tick.
    private async persist(prev: TaskEntity, next: TaskEntity): Promise<boolean> {
        assertTransition(prev, next.state);
        assertInvariants(next);

        const current = await this.store.get(prev.id);
        if (current.updated_at.getTime() !== prev.updated_at.getTime() || current.state !== prev.state) {
            console.warn(`${TAG} task ${prev.id} changed while being advanced (now ${current.state}), dropping this tick's update`);
            return false;
        }

        await this.store.save(next);
        return true;
    }

    private require(task: TaskEntity, field: 'download_handle' | 'local_path'): string {
        const value = task[field];
        if (value === null) {
            throw new InvariantViolationError(task.id, `${field} missing (state ${task.state})`);
        }
        return value;
    }
}

function toProgress(status: DownloadStatus): TaskProgress {
    return {
        fraction: Math.min(Math.max(status.progress.fraction, 0), 1),
        bytes_done: status.progress.bytesDone,
        bytes_total: status.progress.bytesTotal,
    };
}

function isRecordError(err: unknown): err is InvariantViolationError | IllegalTransitionError {
    return err instanceof InvariantViolationError || err instanceof IllegalTransitionError;
}

function hasProgressed(task: TaskEntity, changes: Pick<TaskEntity, 'progress' | 'name'>): boolean {
    return task.name !== changes.name || JSON.stringify(task.progress) !== JSON.stringify(changes.progress);
}
