import { TaskEntity, taskState, TERMINAL_STATES } from '../db/task.entity';
import { IllegalTransitionError, InvariantViolationError } from '../errors/transition.error';

// Position along the happy path. FAILED and REMOVED sit outside it.
const PROGRESS_RANK: Partial<Record<taskState, number>> = {
    [taskState.PENDING]: 0,
    [taskState.SUBMITTED]: 1,
    [taskState.DOWNLOADING]: 2,
    [taskState.DOWNLOADED]: 3,
    [taskState.UPLOADING]: 4,
    [taskState.COMPLETED]: 5,
};

const EDGES: Record<taskState, readonly taskState[]> = {
    [taskState.PENDING]: [taskState.SUBMITTED, taskState.FAILED, taskState.REMOVED],
    // a download can finish between two polls
    [taskState.SUBMITTED]: [taskState.DOWNLOADING, taskState.DOWNLOADED, taskState.FAILED, taskState.REMOVED],
    [taskState.DOWNLOADING]: [taskState.DOWNLOADING, taskState.DOWNLOADED, taskState.FAILED, taskState.REMOVED],
    [taskState.DOWNLOADED]: [taskState.UPLOADING, taskState.FAILED, taskState.REMOVED],
    [taskState.UPLOADING]: [taskState.UPLOADING, taskState.COMPLETED, taskState.FAILED, taskState.REMOVED],
    [taskState.COMPLETED]: [taskState.REMOVED],
    [taskState.FAILED]: [taskState.REMOVED],
    [taskState.REMOVED]: [],
};

export function isTerminal(state: taskState): boolean {
    return TERMINAL_STATES.has(state);
}

/**
 * Whether `from → to` is an edge of the lifecycle. Staying put is allowed
 * for non-terminal states: a failed attempt records an error without moving.
 */
export function canTransition(from: taskState, to: taskState): boolean {
    if (from === to) return !isTerminal(from);
    return EDGES[from].includes(to);
}

export function assertTransition(task: TaskEntity, to: taskState): void {
    if (!canTransition(task.state, to)) {
        throw new IllegalTransitionError(task.id, task.state, to);
    }
}

/** Checks the presence rules for handle and paths against the state. */
export function assertInvariants(task: TaskEntity): void {
    const rank = PROGRESS_RANK[task.state];
    const fail = (detail: string) => {
        throw new InvariantViolationError(task.id, `${detail} (state ${task.state})`);
    };

    if (rank !== undefined) {
        if ((task.download_handle !== null) !== rank >= 1) {
            fail(task.download_handle === null ? 'download_handle missing' : 'download_handle set too early');
        }
        if ((task.local_path !== null) !== rank >= 3) {
            fail(task.local_path === null ? 'local_path missing' : 'local_path set too early');
        }
        if ((task.remote_path !== null) !== (rank === 5)) {
            fail(task.remote_path === null ? 'remote_path missing' : 'remote_path set before completion');
        }
    } else if (task.state === taskState.FAILED && task.remote_path !== null) {
        fail('remote_path set on a failed task');
    }
}

/**
 * Applies a successful transition: the error and the retry counters are
 * cleared because the task made progress.
 */
export function advance(
    task: TaskEntity,
    to: taskState,
    changes: Partial<Omit<TaskEntity, 'id' | 'source' | 'state' | 'created_at'>>,
    now: Date,
): TaskEntity {
    assertTransition(task, to);
    return {
        ...task,
        ...changes,
        state: to,
        error: null,
        retry_count: 0,
        next_attempt_at: null,
        updated_at: now,
    };
}

/** True when the two records differ in anything but `updated_at`. */
export function hasChanged(before: TaskEntity, after: TaskEntity): boolean {
    const { updated_at: _a, ...left } = before;
    const { updated_at: _b, ...right } = after;
    return JSON.stringify(left) !== JSON.stringify(right);
}
