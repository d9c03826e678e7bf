import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ControlSurface } from '../../src/control';
import { taskState } from '../../src/db/task.entity';
import { FileTaskStore } from '../../src/repositories/file-task.store';
import { Orchestrator, OrchestratorConfig } from '../../src/services/orchestrator';
import { FakeDownloadGateway, FakeUploadGateway, MAGNET, T0 } from '../helpers/fakes';

const CONFIG: OrchestratorConfig = {
    remoteFolder: '/BTDownloads',
    purgeOnComplete: false,
    retry: { maxConsecutiveFailures: 3, backoff: { initialIntervalMs: 1000, multiplier: 2, maxIntervalMs: 10_000 } },
};

describe('Crash Recovery Integration', () => {
    let root: string;

    beforeEach(async () => {
        root = await fs.mkdtemp(path.join(os.tmpdir(), 'seedferry-crash-'));
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(root, { recursive: true, force: true });
    });

    it('picks up where a killed process left off', async () => {
        // the download engine outlives the orchestrator process
        const downloads = new FakeDownloadGateway();

        // first process: add two tasks and drive them part way
        const firstStore = new FileTaskStore(root);
        const firstUploads = new FakeUploadGateway();
        const first = new Orchestrator({ store: firstStore, downloads, uploads: firstUploads, config: CONFIG, clock: () => T0 });
        let ids = 0;
        const control = new ControlSurface({
            store: firstStore,
            orchestrator: first,
            uploads: firstUploads,
            clock: () => T0,
            idFactory: () => `task-${++ids}`,
        });
        await control.add(MAGNET);
        await control.add('not-a-magnet');

        await first.tick();
        downloads.progress('handle-1', 0.25);
        await first.tick();
        expect((await firstStore.get('task-1')).state).toBe(taskState.DOWNLOADING);
        downloads.complete('handle-1', '/downloads/payload');

        // killed in the middle of a save: only the temp file made it to disk
        await fs.writeFile(path.join(root, 'tasks', 'task-1.json.999.1.tmp'), '{"version":1,"ta');

        // second process: fresh store and gateways over the same directory
        const secondStore = new FileTaskStore(root);
        const secondUploads = new FakeUploadGateway();
        const second = new Orchestrator({ store: secondStore, downloads, uploads: secondUploads, config: CONFIG, clock: () => T0 });
        await second.run({ intervalMs: 1, exitWhenIdle: true });

        const tasks = await new FileTaskStore(root).list();
        expect(tasks.map(t => [t.id, t.state])).toEqual([
            ['task-1', taskState.COMPLETED],
            ['task-2', taskState.FAILED],
        ]);
        expect(tasks[0]?.remote_path).toBe('/BTDownloads/payload');
        expect(tasks[1]?.error?.code).toBe('InvalidSource');
        expect(downloads.submit).toHaveBeenCalledTimes(2);
        expect(secondUploads.upload).toHaveBeenCalledWith('/downloads/payload', '/BTDownloads');
        expect(firstUploads.upload).not.toHaveBeenCalled();
    });
});
