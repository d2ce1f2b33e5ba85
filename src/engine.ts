import { EngineOptions, engineOptions } from './config';
import { Environment } from './environment';
import { nativeFunctionValue, numberValue, objectValue, ParsedScript, undefinedValue } from './factories';
import { parseExpression, parseScript } from './parser';
import { Scope } from './scope';
import { ObjectValue, ProgramResult, Value } from './types';

export class Engine {
    readonly options: EngineOptions;
    readonly console: ObjectValue;
    readonly globalEnvironment: Environment;
    readonly globalScope: Scope;

    constructor(options: Partial<EngineOptions> = {}) {
        this.options = engineOptions(options);

        this.console = objectValue([
            ['log', nativeFunctionValue('log', (thisArg, args) => this.log(args))]
        ]);

        this.globalEnvironment = new Environment([
            ['this', undefinedValue],
            ['undefined', undefinedValue],
            ['NaN', numberValue(NaN)],
            ['Infinity', numberValue(Infinity)],
            ['console', this.console],
            ...Object.entries(this.options.globals)
        ]);

        this.globalScope = new Scope(this, null, this.globalEnvironment, null);
    }

    define(name: string, value: Value): void {
        this.globalEnvironment.declare(name, value);
    }

    runGlobalCode(script: ParsedScript): ProgramResult {
        const programScope = new Scope(this, null, this.globalEnvironment, script);
        const completion = programScope.evaluateProgram(script.program);
        const value = completion.value;

        return {
            completion,
            value: value.type === 'empty' ? undefinedValue : value,
            environment: this.globalEnvironment
        };
    }

    run(sourceCode: string, path = '<script>'): ProgramResult {
        return this.runGlobalCode(parseScript(sourceCode, path));
    }

    evaluateExpression(sourceCode: string, environment: Environment = this.globalEnvironment): Value {
        const scope = new Scope(this, null, environment, null);

        return scope.getValue(parseExpression(sourceCode));
    }

    /** Invokes a script or native function from the host. */
    callFunction(callee: Value, args: Value[], thisArg: Value = undefinedValue): Value {
        return this.globalScope.createContext(null).executeFunction(callee, thisArg, args);
    }

    private log(args: Value[]): Value {
        const context = this.globalScope.createContext(null);

        this.options.output(args.map(arg => context.toString(arg)).join(' ') + '\n');

        return undefinedValue;
    }
}
