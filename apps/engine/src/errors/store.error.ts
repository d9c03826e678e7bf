// Store failures are the only errors allowed to stop the polling loop:
// carrying on without being able to persist would silently lose progress.
export class StoreError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreError';
    }
}

export class TaskNotFoundError extends Error {
    constructor(public readonly taskId: string) {
        super(`task ${taskId} not found`);
        this.name = 'TaskNotFoundError';
    }
}

export class DuplicateSourceError extends Error {
    constructor(public readonly source: string, public readonly existingId: string) {
        super(`source already tracked by task ${existingId}`);
        this.name = 'DuplicateSourceError';
    }
}
