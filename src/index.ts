#!/usr/bin/env node
import { loadRunnerConfig } from './config';
import { runScripts } from './runner';

async function run(): Promise<number> {
    const config = loadRunnerConfig(process.env, process.argv.slice(2));

    const counts = await runScripts(config.scriptsGlob, {
        displayLimit: config.displayLimit
    });

    return counts.failed === 0 ? 0 : 1;
}

run().then(
    code => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error(err);
        process.exitCode = 1;
    }
);
