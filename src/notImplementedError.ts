import { SourceLocation } from './ast';

export class NotImplementedError extends Error {
    constructor(
        details: string,
        path: string | null = null,
        loc: SourceLocation | null = null
    ) {
        super();
        this.message = `${details}${formatLocation(path, loc)}`;
    }

    toString() {
        return this.message;
    }
}

function formatLocation(path: string | null, loc: SourceLocation | null): string {
    if (loc === null) {
        return '';
    }

    const lineCol = `${loc.line}:${loc.column}`;

    return `\n    at ${path === null ? lineCol : `${path}:${lineCol}`}`;
}
