import fs from 'fs';
import { glob } from 'glob';
import yaml from 'js-yaml';
import path from 'path';
import { DEFAULT_DISPLAY_LIMIT } from './config';
import { Engine } from './engine';
import { ErrorKind, isErrorKind } from './runtimeError';

export type ScriptMetadata = {
    description?: string;
    /** Exact text the script must print through `console.log`. */
    expected?: string;
    /** Error kind the script must fail with. */
    negative?: ErrorKind;
};

export type ScriptResult = {
    passed: boolean;
    message: string | null;
};

export type RunnerOptions = {
    displayLimit?: number;
    cwd?: string;
    log?: (...lines: string[]) => void;
};

export type RunCounts = {
    passed: number;
    failed: number;
};

function readFileAsync(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => fs.readFile(filePath, 'utf8', (err, contents) => {
        if (err) {
            reject(err);
        } else {
            resolve(contents);
        }
    }));
}

export function extractYaml(text: string): unknown {
    const start = text.indexOf('/*---');

    if (start === -1) {
        return undefined;
    }

    const end = text.indexOf('---*/', start);

    if (end === -1) {
        throw new Error('metadata block is not closed');
    }

    return yaml.load(text.substring(start + 5, end));
}

export function readMetadata(sourceCode: string): ScriptMetadata {
    const loaded = extractYaml(sourceCode);

    if (loaded === undefined || loaded === null) {
        return {};
    }

    if (typeof loaded !== 'object') {
        throw new Error('metadata must be a mapping');
    }

    const field = (name: string): unknown => Reflect.get(loaded, name);
    const metadata: ScriptMetadata = {};

    const description = field('description');
    if (typeof description === 'string') {
        metadata.description = description;
    }

    const expected = field('expected');
    if (expected !== undefined) {
        if (typeof expected !== 'string') {
            throw new Error('expected output must be a string');
        }

        metadata.expected = expected;
    }

    const negative = field('negative');
    if (negative !== undefined) {
        if (!isErrorKind(negative)) {
            throw new Error(`unknown negative error kind ${String(negative)}`);
        }

        metadata.negative = negative;
    }

    return metadata;
}

export function runScript(file: string, sourceCode: string, displayLimit: number = DEFAULT_DISPLAY_LIMIT): ScriptResult {
    let metadata: ScriptMetadata;

    try {
        metadata = readMetadata(sourceCode);
    } catch (e) {
        return { passed: false, message: `Invalid metadata: ${describeError(e)}` };
    }

    let output = '';

    const engine = new Engine({
        displayLimit,
        output: text => {
            output += text;
        }
    });

    try {
        engine.run(sourceCode, file);
    } catch (e) {
        if (metadata.negative !== undefined && e instanceof Error && e.name === metadata.negative) {
            return { passed: true, message: null };
        }

        return { passed: false, message: `Engine error ${describeError(e)}` };
    }

    if (metadata.negative !== undefined) {
        return { passed: false, message: `Unexpected positive result, expected ${metadata.negative}` };
    }

    if (metadata.expected !== undefined && output !== metadata.expected) {
        return { passed: false, message: `Unexpected output:\n${output}` };
    }

    return { passed: true, message: null };
}

function describeError(e: unknown): string {
    return e instanceof Error ? e.toString() : String(e);
}

export async function runScripts(pattern: string, options: RunnerOptions = {}): Promise<RunCounts> {
    const cwd = options.cwd ?? process.cwd();
    const log = options.log ?? console.log;
    const files = (await glob(pattern, { cwd })).sort();

    const counts = {
        passed: 0,
        failed: 0
    };

    for (const file of files) {
        const sourceCode = await readFileAsync(path.join(cwd, file));
        const result = runScript(file, sourceCode, options.displayLimit);

        if (result.passed) {
            log(`+ PASS:   ${file}`);
            counts.passed++;
        } else {
            log(`- FAILED: ${file}`);
            log(result.message ?? '');
            counts.failed++;
        }
    }

    log();
    log(`Test run complete: ${counts.passed}/${counts.passed + counts.failed} passed`);

    return counts;
}
