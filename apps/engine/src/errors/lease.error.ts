export class LeaseUnavailableError extends Error {
    constructor(public readonly location: string) {
        super(`another orchestrator is already driving ${location}`);
        this.name = 'LeaseUnavailableError';
    }
}
