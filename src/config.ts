import { Value } from './types';

export type OutputSink = (text: string) => void;

export type EngineOptions = {
    /** Receives everything `console.log` prints, newline included. */
    output: OutputSink;
    /** Maximum number of array items rendered when a value is displayed. */
    displayLimit: number;
    globals: Readonly<Record<string, Value>>;
};

export type RunnerConfig = {
    scriptsGlob: string;
    displayLimit: number;
};

export const DEFAULT_DISPLAY_LIMIT = 100;
export const DEFAULT_SCRIPTS_GLOB = 'samples/**/*.js';

export function engineOptions(overrides: Partial<EngineOptions> = {}): EngineOptions {
    return {
        output: overrides.output ?? (text => {
            process.stdout.write(text);
        }),
        displayLimit: overrides.displayLimit ?? DEFAULT_DISPLAY_LIMIT,
        globals: overrides.globals ?? {}
    };
}

export function loadRunnerConfig(env: NodeJS.ProcessEnv, args: readonly string[]): RunnerConfig {
    return {
        scriptsGlob: args[0] ?? env.SCRIPTS_GLOB ?? DEFAULT_SCRIPTS_GLOB,
        displayLimit: env.DISPLAY_LIMIT === undefined ?
            DEFAULT_DISPLAY_LIMIT :
            parsePositiveInteger('DISPLAY_LIMIT', env.DISPLAY_LIMIT)
    };
}

function parsePositiveInteger(name: string, text: string): number {
    const value = Number(text);

    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${name} must be a positive integer, got '${text}'`);
    }

    return value;
}
