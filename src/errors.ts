import type { Key } from './records/record_types';

/**
 * Raised when an operation is invoked in a state that does not allow it,
 * such as starting an activity manager that is already running.
 */
export class IllegalStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IllegalStateError';
    }
}

/**
 * Raised by the record store when a query value is not of the kind its key
 * expects (text for name/email, integer for age/id).
 */
export class TypeMismatchError extends Error {
    constructor(public readonly key: Key, public readonly value: unknown) {
        super(`Value ${typeof value === 'number' ? String(value) : JSON.stringify(value)} is not valid for key "${key}"`);
        this.name = 'TypeMismatchError';
    }
}
