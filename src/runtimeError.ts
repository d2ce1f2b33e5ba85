import { formatStack } from './globals';
import { Context } from './types';

export type ErrorKind = 'ReferenceError' | 'TypeError' | 'SyntaxError';

export const errorKinds: readonly ErrorKind[] = ['ReferenceError', 'TypeError', 'SyntaxError'];

export class RuntimeError extends Error {
    constructor(
        context: Context,
        readonly kind: ErrorKind,
        readonly details: string
    ) {
        super();
        this.name = kind;
        this.message = `${details}${formatStack(context)}`;
    }

    toString() {
        return `${this.kind}: ${this.message}`;
    }
}

export function isErrorKind(value: unknown): value is ErrorKind {
    return typeof value === 'string' && errorKinds.some(kind => kind === value);
}
