/**
 * Failure categories a gateway can report. The engine decides what to do
 * with a task purely from the kind:
 *   InputError        → fail the task now
 *   TransientError    → retry on a later tick, up to the retry cap
 *   AuthError         → wait for a valid credential, no retry budget spent
 *   FatalGatewayError → fail the task now
 */
export type ErrorKind = 'InputError' | 'TransientError' | 'AuthError' | 'FatalGatewayError';

export abstract class GatewayError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InputError extends GatewayError {
    readonly kind = 'InputError';
}

export class InvalidSource extends InputError {
    constructor(public readonly source: string, reason: string) {
        super(`invalid source "${source}": ${reason}`);
    }
}

export class TransientError extends GatewayError {
    readonly kind = 'TransientError';
}

export class TransientNetworkError extends TransientError { }

export class AuthError extends GatewayError {
    readonly kind = 'AuthError';
}

export class AuthRequired extends AuthError {
    constructor(message = 'no valid credential; run the auth command or supply a token') {
        super(message);
    }
}

export class AuthExpired extends AuthError { }

export class FatalGatewayError extends GatewayError {
    readonly kind = 'FatalGatewayError';
}

export class QuotaExceeded extends FatalGatewayError { }

export interface ClassifiedError {
    kind: ErrorKind;
    code: string;
    message: string;
}

// Anything that is not a GatewayError (a bug in an adapter, a socket
// reset surfacing as a plain Error) is treated as transient so the retry
// cap still bounds it.
export function classifyError(err: unknown): ClassifiedError {
    if (err instanceof GatewayError) {
        return { kind: err.kind, code: err.name, message: err.message };
    }
    if (err instanceof Error) {
        return { kind: 'TransientError', code: err.name || 'Error', message: err.message };
    }
    return { kind: 'TransientError', code: 'Error', message: String(err) };
}
