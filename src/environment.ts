import { RuntimeError } from './runtimeError';
import { Value } from './types';

/**
 * A lexical scope record. Function values hold on to the environment they were
 * created in, so several closures may share (and mutate) one parent.
 */
export class Environment {
    private readonly bindings: Map<string, Value>;

    constructor(
        bindings: Iterable<[string, Value]> = [],
        readonly parent: Environment | null = null
    ) {
        this.bindings = new Map(bindings);
    }

    createChild(bindings: Iterable<[string, Value]> = []): Environment {
        return new Environment(bindings, this);
    }

    hasOwn(name: string): boolean {
        return this.bindings.has(name);
    }

    ownNames(): string[] {
        return [...this.bindings.keys()];
    }

    lookup(name: string): Value | undefined {
        const value = this.bindings.get(name);

        if (value !== undefined) {
            return value;
        }

        return this.parent === null ? undefined : this.parent.lookup(name);
    }

    get(name: string): Value {
        const value = this.lookup(name);

        if (value === undefined) {
            throw new RuntimeError(null, 'ReferenceError', `${name} is not defined`);
        }

        return value;
    }

    /**
     * Overwrites the nearest binding of `name`. Names bound nowhere in the chain
     * become new bindings of the root environment.
     */
    set(name: string, value: Value): void {
        if (this.bindings.has(name) || this.parent === null) {
            this.bindings.set(name, value);
        } else {
            this.parent.set(name, value);
        }
    }

    declare(name: string, value: Value): void {
        this.bindings.set(name, value);
    }

    /** The nearest `this` binding, if any environment in the chain has one. */
    getThis(): Value | undefined {
        return this.lookup('this');
    }
}
