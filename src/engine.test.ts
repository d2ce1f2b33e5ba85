import { describe, expect, it } from 'vitest';
import { engineOptions } from './config';
import { Engine } from './engine';
import { nativeFunctionValue, numberValue, stringValue, undefinedValue } from './factories';
import { NotImplementedError } from './notImplementedError';
import { RuntimeError } from './runtimeError';
import { Value } from './types';

function captureOutput(options: { displayLimit?: number } = {}) {
    const lines: string[] = [];
    const engine = new Engine({
        ...options,
        output: text => {
            lines.push(text);
        }
    });

    return { engine, output: () => lines.join('') };
}

describe('Engine', () => {
    it('installs the default globals', () => {
        const engine = new Engine();

        expect(engine.evaluateExpression('NaN')).toEqual(numberValue(NaN));
        expect(engine.evaluateExpression('-Infinity')).toEqual(numberValue(-Infinity));
        expect(engine.evaluateExpression('undefined')).toEqual(undefinedValue);
        expect(engine.globalEnvironment.get('console')).toBe(engine.console);
    });

    it('joins console.log arguments with spaces and ends the line', () => {
        const { engine, output } = captureOutput();

        engine.run('console.log("a", 1, [1, "b"], {k: null}); console.log(); console.log(function named() {});');

        expect(output()).toBe('a 1 [1, "b"] {k: null}\n\n[function named]\n');
    });

    it('applies the display limit to logged arrays', () => {
        const { engine, output } = captureOutput({ displayLimit: 3 });

        engine.run('console.log([1, 2, 3, 4, 5]);');

        expect(output()).toBe('[1, 2, 3, ... 2 more items]\n');
    });

    it('accepts extra host bindings', () => {
        const calls: Value[][] = [];
        const record = nativeFunctionValue('record', (thisArg, args) => {
            calls.push(args);
            return numberValue(args.length);
        });

        const engine = new Engine({ globals: { record } });
        engine.define('limit', numberValue(2));

        expect(engine.run('record(limit, "x");').value).toEqual(numberValue(2));
        expect(calls).toEqual([[numberValue(2), stringValue('x')]]);
    });

    it('returns the program value and the global environment', () => {
        const engine = new Engine();
        const result = engine.run('var total = 2; total * 21;');

        expect(result.value).toEqual(numberValue(42));
        expect(result.environment).toBe(engine.globalEnvironment);
        expect(result.environment.get('total')).toEqual(numberValue(2));
        expect(engine.run('var nothing;').value).toEqual(undefinedValue);
    });

    it('keeps globals between runs of one engine', () => {
        const engine = new Engine();

        engine.run('var counter = 1;');
        engine.run('counter += 1;');

        expect(engine.globalEnvironment.get('counter')).toEqual(numberValue(2));
    });

    it('calls script closures from the host', () => {
        const engine = new Engine();
        engine.run('var add = function (a, b) { return a + b; };\nvar self = function () { return this; };');

        const add = engine.globalEnvironment.get('add');

        expect(engine.callFunction(add, [numberValue(1), numberValue(2)])).toEqual(numberValue(3));
        expect(engine.callFunction(engine.globalEnvironment.get('self'), [], stringValue('me'))).toEqual(stringValue('me'));
    });

    it('refuses to call a non-function from the host', () => {
        const engine = new Engine();

        expect(() => engine.callFunction(numberValue(1), [])).toThrow(RuntimeError);
        expect(() => engine.callFunction(numberValue(1), [])).toThrow('1 is not a function');
    });

    it('evaluates an expression in a given environment', () => {
        const engine = new Engine();
        const local = engine.globalEnvironment.createChild([['x', numberValue(4)]]);

        expect(engine.evaluateExpression('x * x', local)).toEqual(numberValue(16));
        expect(() => engine.evaluateExpression('x')).toThrow('x is not defined');
    });

    it('rejects syntax outside the supported subset before running', () => {
        const { engine, output } = captureOutput();

        expect(() => engine.run('console.log(1); for (;;) {}')).toThrow(NotImplementedError);
        expect(output()).toBe('');
    });

    it('fills in default options', () => {
        const options = engineOptions({ displayLimit: 5 });

        expect(options.displayLimit).toBe(5);
        expect(options.globals).toEqual({});
        expect(engineOptions().displayLimit).toBe(100);
    });
});
