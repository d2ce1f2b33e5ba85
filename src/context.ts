import { isValidIdentifier } from '@babel/types';
import type { Node } from './ast';
import { Environment } from './environment';
import { booleanValue, isReference, numberValue, stringValue, undefinedValue } from './factories';
import { RuntimeError } from './runtimeError';
import type { Scope } from './scope';
import { ArrayValue, ObjectValue, Reference, Value } from './types';

export class Context {
    constructor(
        public node: Node | null,
        public scope: Scope
        ) {
    }

    getValue(value: Value | Reference): Value {
        if (!isReference(value)) {
            return value;
        }

        const base = value.base;

        if (base instanceof Environment) {
            const result = base.lookup(value.name);

            if (result === undefined) {
                throw this.newReferenceError(`${value.name} is not defined`);
            }

            return result;
        }

        if (base.type === 'unresolvable') {
            throw this.newReferenceError(`${value.name} is unresolvable`);
        }

        return this.readProperty(base, value.name);
    }

    putValue(target: Value | Reference, value: Value): void {
        if (!isReference(target)) {
            throw this.newReferenceError('Invalid left-hand side in assignment');
        }

        const base = target.base;

        if (base instanceof Environment) {
            base.set(target.name, value);
            return;
        }

        switch (base.type) {
            case 'unresolvable':
                throw this.newReferenceError(`${target.name} is unresolvable`);
            case 'array':
                if (target.name === 'length') {
                    throw this.newTypeError(`Cannot assign to read only property 'length' of array`);
                }

                setArrayProperty(base, target.name, value);
                return;
            case 'object':
                base.properties.set(target.name, value);
                return;
            default:
                throw this.newTypeError(`Cannot create property '${target.name}' on ${base.type}`);
        }
    }

    readProperty(object: Value, propertyName: string): Value {
        switch (object.type) {
            case 'object':
                return object.properties.get(propertyName) ?? undefinedValue;
            case 'array':
                if (propertyName === 'length') {
                    return numberValue(arrayLength(object));
                }

                return object.properties.get(propertyName) ?? undefinedValue;
            case 'string':
                if (propertyName === 'length') {
                    return numberValue(object.value.length);
                }

                if (isArrayIndex(propertyName) && Number(propertyName) < object.value.length) {
                    return stringValue(object.value.charAt(Number(propertyName)));
                }

                return undefinedValue;
            default:
                return undefinedValue;
        }
    }

    toBoolean(value: Value): boolean {
        switch (value.type) {
            case 'string':
                return value.value !== '';
            case 'boolean':
                return value.value;
            case 'number':
                return Boolean(value.value);
            case 'null':
            case 'undefined':
                return false;
            default:
                return true;
        }
    }

    toNumber(value: Value): number {
        switch (value.type) {
            case 'string':
                return Number(value.value);
            case 'boolean':
                return Number(value.value);
            case 'number':
                return value.value;
            case 'null':
                return 0;
            default:
                return NaN;
        }
    }

    /**
     * Display form used by `console.log` and string concatenation. Strings
     * nested inside arrays and objects are quoted.
     */
    toString(value: Value): string {
        return this.displayValue(value, false, []);
    }

    toPropertyKey(value: Value): string {
        switch (value.type) {
            case 'string':
                return value.value;
            case 'number':
                return String(value.value);
            default:
                return this.toString(value);
        }
    }

    equals(left: Value, right: Value): boolean {
        return valuesEqual(left, right, []);
    }

    applyBinaryOperator(op: string, left: Value, right: Value): Value {
        switch (op) {
            case '+':
                if (left.type === 'string' || right.type === 'string') {
                    return stringValue(this.toString(left) + this.toString(right));
                } else {
                    return numberValue(this.toNumber(left) + this.toNumber(right));
                }
            case '-':
                return numberValue(this.toNumber(left) - this.toNumber(right));
            case '*':
                return numberValue(this.toNumber(left) * this.toNumber(right));
            case '/':
                return numberValue(this.toNumber(left) / this.toNumber(right));
            case '%':
                return numberValue(this.toNumber(left) % this.toNumber(right));
            case '&':
                return numberValue(this.toNumber(left) & this.toNumber(right));
            case '|':
                return numberValue(this.toNumber(left) | this.toNumber(right));
            case '^':
                return numberValue(this.toNumber(left) ^ this.toNumber(right));
            case '<<':
                return numberValue(this.toNumber(left) << this.toNumber(right));
            case '>>':
                return numberValue(this.toNumber(left) >> this.toNumber(right));
            case '>>>':
                return numberValue(this.toNumber(left) >>> this.toNumber(right));
            case '<':
                return booleanValue(this.compare(left, right) < 0);
            case '<=':
                return booleanValue(this.compare(left, right) <= 0);
            case '>':
                return booleanValue(this.compare(left, right) > 0);
            case '>=':
                return booleanValue(this.compare(left, right) >= 0);
            // loose and strict equality are both structural
            case '==':
            case '===':
                return booleanValue(this.equals(left, right));
            case '!=':
            case '!==':
                return booleanValue(!this.equals(left, right));
            case 'in':
            case 'instanceof':
                return booleanValue(false);
        }

        throw this.newSyntaxError(`Unknown binary operator: ${op}`);
    }

    executeFunction(callee: Value, thisArg: Value, args: Value[]): Value {
        switch (callee.type) {
            case 'native-function':
                return callee.invoke(thisArg, args);
            case 'function':
                return this.scope.callFunction(callee, thisArg, args, this);
            default:
                throw this.newTypeError(`${this.toString(callee)} is not a function`);
        }
    }

    newReferenceError(message: string): RuntimeError {
        return new RuntimeError(this, 'ReferenceError', message);
    }

    newTypeError(message: string): RuntimeError {
        return new RuntimeError(this, 'TypeError', message);
    }

    newSyntaxError(message: string): RuntimeError {
        return new RuntimeError(this, 'SyntaxError', message);
    }

    // NaN when either side is NaN, so every relational operator yields false
    private compare(left: Value, right: Value): number {
        if (left.type === 'string' && right.type === 'string') {
            return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
        }

        const a = this.toNumber(left);
        const b = this.toNumber(right);

        return a < b ? -1 : a > b ? 1 : a === b ? 0 : NaN;
    }

    private displayValue(value: Value, nested: boolean, path: Value[]): string {
        switch (value.type) {
            case 'undefined':
                return 'undefined';
            case 'null':
                return 'null';
            case 'boolean':
                return String(value.value);
            case 'number':
                return String(value.value);
            case 'string':
                return nested ? JSON.stringify(value.value) : value.value;
            case 'function':
                return value.name === null ? '[function]' : `[function ${value.name}]`;
            case 'native-function':
                return `[native function ${value.name}]`;
            case 'array':
                return path.includes(value) ? '[circular]' : this.displayArray(value, [...path, value]);
            case 'object':
                return path.includes(value) ? '[circular]' : this.displayObject(value, [...path, value]);
        }
    }

    private displayArray(array: ArrayValue, path: Value[]): string {
        const length = arrayLength(array);
        const limit = this.scope.engine.options.displayLimit;
        const items: string[] = [];

        for (let i = 0; i < Math.min(length, limit); i++) {
            items.push(this.displayValue(array.properties.get(i.toString()) ?? undefinedValue, true, path));
        }

        if (length > limit) {
            items.push(`... ${length - limit} more items`);
        }

        return `[${items.join(', ')}]`;
    }

    private displayObject(object: ObjectValue, path: Value[]): string {
        const entries = [...object.properties].map(([key, item]) => {
            const name = isValidIdentifier(key) ? key : JSON.stringify(key);

            return `${name}: ${this.displayValue(item, true, path)}`;
        });

        return `{${entries.join(', ')}}`;
    }
}

export function isArrayIndex(key: string): boolean {
    return /^(0|[1-9][0-9]*)$/.test(key) && Number(key) < 4294967295;
}

type LengthCacheEntry = {
    keyCount: number;
    length: number;
};

// array keys are only ever added, so an unchanged key count means an unchanged length
const lengthCache = new WeakMap<ArrayValue, LengthCacheEntry>();

/** One past the highest index present; holes count towards the length. */
export function arrayLength(array: ArrayValue): number {
    const cached = lengthCache.get(array);

    if (cached !== undefined && cached.keyCount === array.properties.size) {
        return cached.length;
    }

    let length = 0;

    for (const key of array.properties.keys()) {
        if (isArrayIndex(key)) {
            length = Math.max(length, Number(key) + 1);
        }
    }

    lengthCache.set(array, { keyCount: array.properties.size, length });

    return length;
}

function setArrayProperty(array: ArrayValue, key: string, value: Value): void {
    const cached = lengthCache.get(array);
    const fresh = cached !== undefined && cached.keyCount === array.properties.size;

    array.properties.set(key, value);

    if (fresh) {
        lengthCache.set(array, {
            keyCount: array.properties.size,
            length: isArrayIndex(key) ? Math.max(cached.length, Number(key) + 1) : cached.length
        });
    }
}

function valuesEqual(left: Value, right: Value, comparing: [Value, Value][]): boolean {
    switch (left.type) {
        case 'undefined':
        case 'null':
            return left.type === right.type;
        case 'number':
            return right.type === 'number' && left.value === right.value;
        case 'string':
            return right.type === 'string' && left.value === right.value;
        case 'boolean':
            return right.type === 'boolean' && left.value === right.value;
        case 'function':
        case 'native-function':
            return left === right;
        case 'object':
        case 'array': {
            if (left === right) {
                return true;
            }

            if (right.type !== 'object' && right.type !== 'array') {
                return false;
            }

            if (right.type !== left.type || right.properties.size !== left.properties.size) {
                return false;
            }

            // a pair already under comparison further up is assumed equal
            if (comparing.some(([l, r]) => l === left && r === right)) {
                return true;
            }

            const next: [Value, Value][] = [...comparing, [left, right]];
            const rightProperties = right.properties;

            return [...left.properties].every(([key, item]) => {
                const other = rightProperties.get(key);

                return other !== undefined && valuesEqual(item, other, next);
            });
        }
    }
}
