import { CallStackEntry, Context } from './types';

export function formatStack(context: Context): string {
    if (context === null) {
        return '';
    }

    if (context.scope.callStackEntry === null) {
        return formatStackLine(context);
    }

    const caller = context.scope.callStackEntry.caller;

    return formatStackLine(context) + formatStack(caller);
}

function formatStackLine(context: NonNullable<Context>): string {
    if (context.node === null || context.node.loc === undefined) {
        return '';
    }

    return `\n    at ${formatNodeLocation(context, context.node.loc)}`;
}

function formatNodeLocation(context: NonNullable<Context>, loc: { line: number; column: number }) {
    const location = formatNodeScriptLocation(context, loc);

    const functionName = getCalledFunctionName(context.scope.callStackEntry);

    return functionName === null ? location : `${functionName} (${location})`;
}

function formatNodeScriptLocation(context: NonNullable<Context>, loc: { line: number; column: number }) {
    const lineCol = `${loc.line}:${loc.column}`;

    if (context.scope.script === null) {
        return lineCol;
    }

    return `${context.scope.script.path}:${lineCol}`;
}

function getCalledFunctionName(callStackEntry: CallStackEntry | null): string | null {
    if (callStackEntry === null) {
        return null;
    }

    return callStackEntry.callee.name;
}
