import { AuthRequired, InvalidSource } from '@seedferry/sdk';
import { ControlSurface } from '../../src/control';
import { taskState } from '../../src/db/task.entity';
import { LeaseUnavailableError } from '../../src/errors/lease.error';
import { DuplicateSourceError, StoreError, TaskNotFoundError } from '../../src/errors/store.error';
import { Orchestrator } from '../../src/services/orchestrator';
import {
    FakeDownloadGateway,
    FakeUploadGateway,
    MAGNET,
    makeTask,
    MemoryTaskStore,
    T0,
} from '../helpers/fakes';
import { waitUntil } from '../helpers/poll';

describe('ControlSurface', () => {
    let store: MemoryTaskStore;
    let downloads: FakeDownloadGateway;
    let uploads: FakeUploadGateway;
    let mockLease: any;
    let control: ControlSurface;
    let ids: number;

    function build(tasks = [makeTask({ id: 'existing', state: taskState.COMPLETED, source: 'magnet:?xt=urn:btih:ffff' })]) {
        store = new MemoryTaskStore(tasks);
        downloads = new FakeDownloadGateway();
        uploads = new FakeUploadGateway();
        mockLease = {
            tryAcquire: jest.fn().mockResolvedValue(true),
            release: jest.fn().mockResolvedValue(undefined),
        };
        const orchestrator = new Orchestrator({
            store,
            downloads,
            uploads,
            config: {
                remoteFolder: '/BTDownloads',
                purgeOnComplete: false,
                retry: { maxConsecutiveFailures: 3, backoff: { initialIntervalMs: 1000, multiplier: 2, maxIntervalMs: 10_000 } },
            },
            clock: () => T0,
        });
        ids = 0;
        control = new ControlSurface({
            store,
            orchestrator,
            uploads,
            lease: mockLease,
            clock: () => T0,
            idFactory: () => `task-${++ids}`,
        });
    }

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
        build();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('add', () => {
        it('stores a pending task for the trimmed source', async () => {
            const task = await control.add(`  ${MAGNET}\n`);

            expect(task).toEqual(makeTask({ id: 'task-1', source: MAGNET }));
            expect(store.peek('task-1').state).toBe(taskState.PENDING);
        });

        it('rejects an empty source', async () => {
            await expect(control.add('   ')).rejects.toThrow(InvalidSource);
        });

        it('rejects a source that is already being transferred', async () => {
            await control.add(MAGNET);

            const err = await control.add(MAGNET).catch(e => e);
            expect(err).toBeInstanceOf(DuplicateSourceError);
            expect(err.existingId).toBe('task-1');
        });

        it('accepts a source again once its task failed or was removed', async () => {
            build([
                makeTask({ id: 'old-1', state: taskState.FAILED }),
                makeTask({ id: 'old-2', state: taskState.REMOVED }),
            ]);

            const task = await control.add(MAGNET);
            expect(task.id).toBe('task-1');
        });

        it('does not validate the source itself', async () => {
            const task = await control.add('not-a-magnet');
            expect(task.state).toBe(taskState.PENDING);
        });
    });

    it('lists and shows tasks', async () => {
        await control.add(MAGNET);

        expect((await control.list()).map(t => t.id)).toEqual(['existing', 'task-1']);
        expect((await control.show('task-1')).source).toBe(MAGNET);
        await expect(control.show('missing')).rejects.toThrow(TaskNotFoundError);
    });

    it('removes through the orchestrator', async () => {
        build([makeTask({ state: taskState.DOWNLOADING, download_handle: 'handle-1' })]);

        const removed = await control.remove('task-1', true);

        expect(removed.state).toBe(taskState.REMOVED);
        expect(downloads.cancel).toHaveBeenCalledWith('handle-1', true);
    });

    it('authenticates through the upload gateway', async () => {
        expect(await control.authenticate()).toEqual({ account: 'user@example.com', expiresAt: null });
    });

    describe('start', () => {
        it('holds the lease around a single tick', async () => {
            build([makeTask()]);

            const report = await control.start({ intervalMs: 1000, once: true });

            expect(report).toEqual({ active: 1, deferred: 0, advanced: 1, failed: 0, errored: 0 });
            expect(mockLease.tryAcquire).toHaveBeenCalledTimes(1);
            expect(mockLease.release).toHaveBeenCalledTimes(1);
            expect(store.peek('task-1').state).toBe(taskState.SUBMITTED);
        });

        it('refuses to start while another loop holds the lease', async () => {
            build([makeTask()]);
            mockLease.tryAcquire.mockResolvedValue(false);

            await expect(control.start({ intervalMs: 1000, once: true })).rejects.toThrow(LeaseUnavailableError);
            expect(downloads.submit).not.toHaveBeenCalled();
            expect(mockLease.release).not.toHaveBeenCalled();
        });

        it('warns but keeps going without an upload credential', async () => {
            build([makeTask()]);
            uploads.authError = new AuthRequired();

            await control.start({ intervalMs: 1000, once: true });

            expect(console.warn).toHaveBeenCalledWith(
                '[seedferry] not authenticated for uploads (AuthRequired: no valid credential; run the auth command or supply a token); run the auth command',
            );
            expect(store.peek('task-1').state).toBe(taskState.SUBMITTED);
        });

        it('releases the lease when the store fails', async () => {
            build([makeTask()]);
            store.failSave = new StoreError('disk full');

            await expect(control.start({ intervalMs: 1000, once: true })).rejects.toThrow(StoreError);
            expect(mockLease.release).toHaveBeenCalledTimes(1);
        });

        it('runs the loop until there is nothing left to do', async () => {
            build([makeTask()]);
            downloads.completeOnSubmit = true;

            const report = await control.start({ intervalMs: 1, exitWhenIdle: true });

            expect(report).toBeNull();
            expect(store.peek('task-1').state).toBe(taskState.COMPLETED);
        });

        it('stops the loop when the lease is lost', async () => {
            build([makeTask()]);
            let onLost: () => void = () => { };
            mockLease.tryAcquire.mockImplementation(async (callback: () => void) => {
                onLost = callback;
                return true;
            });

            const running = control.start({ intervalMs: 60_000 });
            await waitUntil(() => downloads.submit.mock.calls.length > 0);
            onLost();

            await expect(running).resolves.toBeNull();
            expect(console.error).toHaveBeenCalledWith('[seedferry] lease lost, stopping after the current tick');
            expect(mockLease.release).toHaveBeenCalledTimes(1);
        });

        it('works without a lease', async () => {
            build([makeTask()]);
            const orchestrator = new Orchestrator({
                store,
                downloads,
                uploads,
                config: {
                    remoteFolder: '/BTDownloads',
                    purgeOnComplete: false,
                    retry: { maxConsecutiveFailures: 3, backoff: { initialIntervalMs: 1000, multiplier: 2, maxIntervalMs: 10_000 } },
                },
            });
            const bare = new ControlSurface({ store, orchestrator, uploads });

            expect(await bare.start({ intervalMs: 1000, once: true })).not.toBeNull();
        });
    });
});
