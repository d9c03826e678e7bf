import { taskState } from '../../src/db/task.entity';
import { IllegalTransitionError, InvariantViolationError } from '../../src/errors/transition.error';
import {
    advance,
    assertInvariants,
    assertTransition,
    canTransition,
    hasChanged,
    isTerminal,
} from '../../src/services/state-machine';
import { makeTask, T0 } from '../helpers/fakes';

describe('state machine', () => {
    it('follows the happy path', () => {
        expect(canTransition(taskState.PENDING, taskState.SUBMITTED)).toBe(true);
        expect(canTransition(taskState.SUBMITTED, taskState.DOWNLOADING)).toBe(true);
        expect(canTransition(taskState.DOWNLOADING, taskState.DOWNLOADED)).toBe(true);
        expect(canTransition(taskState.DOWNLOADED, taskState.UPLOADING)).toBe(true);
        expect(canTransition(taskState.UPLOADING, taskState.COMPLETED)).toBe(true);
    });

    it('lets a download that finished between polls skip downloading', () => {
        expect(canTransition(taskState.SUBMITTED, taskState.DOWNLOADED)).toBe(true);
    });

    it('does not skip or go back', () => {
        expect(canTransition(taskState.PENDING, taskState.DOWNLOADING)).toBe(false);
        expect(canTransition(taskState.SUBMITTED, taskState.UPLOADING)).toBe(false);
        expect(canTransition(taskState.UPLOADING, taskState.DOWNLOADED)).toBe(false);
        expect(canTransition(taskState.DOWNLOADED, taskState.COMPLETED)).toBe(false);
    });

    it('allows failing and removing from every non-terminal state', () => {
        for (const state of [taskState.PENDING, taskState.SUBMITTED, taskState.DOWNLOADING, taskState.DOWNLOADED, taskState.UPLOADING]) {
            expect(canTransition(state, taskState.FAILED)).toBe(true);
            expect(canTransition(state, taskState.REMOVED)).toBe(true);
            expect(canTransition(state, state)).toBe(true);
        }
    });

    it('only lets terminal states move to removed', () => {
        expect(canTransition(taskState.COMPLETED, taskState.REMOVED)).toBe(true);
        expect(canTransition(taskState.FAILED, taskState.REMOVED)).toBe(true);
        expect(canTransition(taskState.FAILED, taskState.PENDING)).toBe(false);
        expect(canTransition(taskState.COMPLETED, taskState.COMPLETED)).toBe(false);
        expect(canTransition(taskState.REMOVED, taskState.REMOVED)).toBe(false);
        expect(isTerminal(taskState.REMOVED)).toBe(true);
        expect(isTerminal(taskState.UPLOADING)).toBe(false);
    });

    it('throws on an illegal transition', () => {
        const task = makeTask({ state: taskState.COMPLETED });
        expect(() => assertTransition(task, taskState.UPLOADING)).toThrow(IllegalTransitionError);
        expect(() => assertTransition(task, taskState.UPLOADING)).toThrow('task task-1: illegal transition completed -> uploading');
    });

    describe('assertInvariants', () => {
        it('accepts records that match their state', () => {
            expect(() => assertInvariants(makeTask())).not.toThrow();
            expect(() => assertInvariants(makeTask({
                state: taskState.DOWNLOADED,
                download_handle: 'h',
                local_path: '/downloads/x',
            }))).not.toThrow();
            expect(() => assertInvariants(makeTask({
                state: taskState.COMPLETED,
                download_handle: 'h',
                local_path: '/downloads/x',
                remote_path: '/BTDownloads/x',
            }))).not.toThrow();
            expect(() => assertInvariants(makeTask({ state: taskState.FAILED, download_handle: 'h' }))).not.toThrow();
        });

        it('requires a handle once submitted', () => {
            expect(() => assertInvariants(makeTask({ state: taskState.SUBMITTED })))
                .toThrow('task task-1: download_handle missing (state submitted)');
        });

        it('requires a local path once downloaded', () => {
            expect(() => assertInvariants(makeTask({ state: taskState.UPLOADING, download_handle: 'h' })))
                .toThrow(InvariantViolationError);
        });

        it('rejects a remote path before completion', () => {
            expect(() => assertInvariants(makeTask({
                state: taskState.UPLOADING,
                download_handle: 'h',
                local_path: '/downloads/x',
                remote_path: '/BTDownloads/x',
            }))).toThrow('task task-1: remote_path set before completion (state uploading)');
            expect(() => assertInvariants(makeTask({ state: taskState.FAILED, remote_path: '/BTDownloads/x' })))
                .toThrow(InvariantViolationError);
        });
    });

    it('clears the error and the retry counters on advance', () => {
        const later = new Date(T0.getTime() + 5000);
        const task = makeTask({
            error: { kind: 'TransientError', code: 'TransientNetworkError', message: 'timeout', at: T0 },
            retry_count: 2,
            next_attempt_at: later,
        });

        const next = advance(task, taskState.SUBMITTED, { download_handle: 'h' }, later);

        expect(next.state).toBe(taskState.SUBMITTED);
        expect(next.download_handle).toBe('h');
        expect(next.error).toBeNull();
        expect(next.retry_count).toBe(0);
        expect(next.next_attempt_at).toBeNull();
        expect(next.updated_at).toBe(later);
        expect(next.created_at).toBe(T0);
    });

    it('ignores updated_at when comparing records', () => {
        const task = makeTask();
        expect(hasChanged(task, { ...task, updated_at: new Date(T0.getTime() + 1) })).toBe(false);
        expect(hasChanged(task, { ...task, name: 'payload' })).toBe(true);
    });
});
