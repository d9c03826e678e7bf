import { taskState } from '../../src/db/task.entity';
import { StoreError, TaskNotFoundError } from '../../src/errors/store.error';
import { PgTaskStore, TRANSFER_TASKS_DDL } from '../../src/repositories/pg-task.store';
import { makeTask, T0 } from '../helpers/fakes';

describe('PgTaskStore', () => {
    let mockPool: any;
    let store: PgTaskStore;

    beforeEach(() => {
        mockPool = {
            query: jest.fn().mockResolvedValue({ rows: [] }),
            end: jest.fn().mockResolvedValue(undefined),
        };
        store = new PgTaskStore(mockPool, 'postgres:db.internal/seedferry');
    });

    it('creates the table on init', async () => {
        await store.init();
        expect(mockPool.query).toHaveBeenCalledWith(TRANSFER_TASKS_DDL, []);
    });

    it('upserts every column in a single statement', async () => {
        const task = makeTask({
            state: taskState.DOWNLOADING,
            download_handle: 'abc123',
            progress: { fraction: 0.5, bytes_done: 50, bytes_total: 100 },
        });

        await store.save(task);

        expect(mockPool.query).toHaveBeenCalledTimes(1);
        const [sql, params] = mockPool.query.mock.calls[0];
        expect(sql).toContain('ON CONFLICT (id) DO UPDATE SET');
        expect(params).toEqual([
            'task-1',
            task.source,
            'downloading',
            'abc123',
            null,
            '{"fraction":0.5,"bytes_done":50,"bytes_total":100}',
            null,
            null,
            null,
            0,
            null,
            T0,
            T0,
        ]);
    });

    it('maps rows back to records', async () => {
        const task = makeTask({
            state: taskState.FAILED,
            error: { kind: 'InputError', code: 'InvalidSource', message: 'bad', at: T0 },
        });
        mockPool.query.mockResolvedValue({
            rows: [{ ...task, error: { ...task.error, at: T0.toISOString() } }],
        });

        expect(await store.get('task-1')).toEqual(task);
        expect(mockPool.query).toHaveBeenCalledWith('SELECT * FROM transfer_tasks WHERE id = $1', ['task-1']);
    });

    it('lists in creation order', async () => {
        await store.list();
        expect(mockPool.query).toHaveBeenCalledWith('SELECT * FROM transfer_tasks ORDER BY created_at ASC, id ASC', []);
    });

    it('throws TaskNotFoundError when no row matches', async () => {
        await expect(store.get('missing')).rejects.toThrow(TaskNotFoundError);
    });

    it('wraps query failures in StoreError', async () => {
        mockPool.query.mockRejectedValue(new Error('connection refused'));
        await expect(store.save(makeTask())).rejects.toThrow('postgres: connection refused');
        await expect(store.load()).rejects.toThrow(StoreError);
    });

    it('rejects malformed rows', async () => {
        mockPool.query.mockResolvedValue({ rows: [{ id: 'task-1', state: 'exploded' }] });
        await expect(store.load()).rejects.toThrow(StoreError);
    });

    it('ends the pool on close', async () => {
        await store.close();
        expect(mockPool.end).toHaveBeenCalled();
        expect(store.location).toBe('postgres:db.internal/seedferry');
    });
});
