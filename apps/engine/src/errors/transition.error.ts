import { taskState } from '../db/task.entity';

export class IllegalTransitionError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly from: taskState,
        public readonly to: taskState,
    ) {
        super(`task ${taskId}: illegal transition ${from} -> ${to}`);
        this.name = 'IllegalTransitionError';
    }
}

export class InvariantViolationError extends Error {
    constructor(public readonly taskId: string, detail: string) {
        super(`task ${taskId}: ${detail}`);
        this.name = 'InvariantViolationError';
    }
}
