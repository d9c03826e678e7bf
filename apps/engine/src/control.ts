import { v7 as uuid } from 'uuid';
import { classifyError, InvalidSource, UploadCredential, UploadGateway } from '@seedferry/sdk';
import { newTask, TaskEntity, taskState } from './db/task.entity';
import { LeaseUnavailableError } from './errors/lease.error';
import { DuplicateSourceError } from './errors/store.error';
import { TaskStore } from './repositories/task.store';
import { Lease, Orchestrator, RunOptions, TickReport } from './services';

const TAG = '[seedferry]';

export interface ControlDeps {
    store: TaskStore;
    orchestrator: Orchestrator;
    uploads: UploadGateway;
    lease?: Lease | null;
    clock?: () => Date;
    idFactory?: () => string;
}

export interface StartOptions extends RunOptions {
    /** Run a single tick instead of the polling loop. */
    once?: boolean;
}

/**
 * Operator-facing operations. Everything except `start` only touches the
 * store (and, for `remove`, the download engine); none of them needs the
 * polling loop to be running.
 */
export class ControlSurface {
    private readonly store: TaskStore;
    private readonly orchestrator: Orchestrator;
    private readonly uploads: UploadGateway;
    private readonly lease: Lease | null;
    private readonly clock: () => Date;
    private readonly idFactory: () => string;

    constructor(deps: ControlDeps) {
        this.store = deps.store;
        this.orchestrator = deps.orchestrator;
        this.uploads = deps.uploads;
        this.lease = deps.lease ?? null;
        this.clock = deps.clock ?? (() => new Date());
        this.idFactory = deps.idFactory ?? (() => uuid());
    }

    async add(source: string): Promise<TaskEntity> {
        const trimmed = source.trim();
        if (!trimmed) throw new InvalidSource(source, 'empty source');

        const tasks = await this.store.list();
        const existing = tasks.find(t =>
            t.source === trimmed && t.state !== taskState.FAILED && t.state !== taskState.REMOVED,
        );
        if (existing) throw new DuplicateSourceError(trimmed, existing.id);

        const task = newTask(this.idFactory(), trimmed, this.clock());
        await this.store.save(task);
        console.log(`${TAG} added task ${task.id}`);
        return task;
    }

    list(): Promise<TaskEntity[]> {
        return this.store.list();
    }

    show(id: string): Promise<TaskEntity> {
        return this.store.get(id);
    }

    remove(id: string, purgeFiles = false): Promise<TaskEntity> {
        return this.orchestrator.remove(id, { purgeFiles });
    }

    async authenticate(): Promise<UploadCredential> {
        const credential = await this.uploads.ensureAuthenticated();
        console.log(`${TAG} authenticated as ${credential.account}`);
        return credential;
    }

    /**
     * Drives the store until stopped. Holds the lease, when one is
     * configured, for the whole run; losing it stops the loop.
     */
    async start(options: StartOptions): Promise<TickReport | null> {
        const onLost = () => {
            console.error(`${TAG} lease lost, stopping after the current tick`);
            this.orchestrator.requestStop();
        };
        if (this.lease && !(await this.lease.tryAcquire(onLost))) {
            throw new LeaseUnavailableError(this.store.location);
        }

        try {
            await this.checkAuthentication();
            if (options.once) {
                const report = await this.orchestrator.tick();
                console.log(`${TAG} tick: ${report.active} active, ${report.advanced} advanced, ${report.failed} failed`);
                return report;
            }
            await this.orchestrator.run(options);
            return null;
        } finally {
            await this.lease?.release();
        }
    }

    // Uploads wait for a credential; downloads can go ahead without one.
    private async checkAuthentication(): Promise<void> {
        try {
            const credential = await this.uploads.ensureAuthenticated();
            console.log(`${TAG} upload credential ok (${credential.account})`);
        } catch (err) {
            const { code, message } = classifyError(err);
            console.warn(`${TAG} not authenticated for uploads (${code}: ${message}); run the auth command`);
        }
    }
}
