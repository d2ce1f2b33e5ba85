import type { Block, Node } from './ast';
import type { Environment } from './environment';
import type { ParsedScript } from './factories';

export type Value = UndefinedValue | NullValue | NumberValue | StringValue | BooleanValue | ObjectValue | ArrayValue | FunctionValue | NativeFunctionValue;

export type NumberValue = {
    readonly type: 'number';
    readonly value: number;
};

export type StringValue = {
    readonly type: 'string';
    readonly value: string;
};

export type BooleanValue = {
    readonly type: 'boolean';
    readonly value: boolean;
};

export type NullValue = {
    readonly type: 'null';
};

export type UndefinedValue = {
    readonly type: 'undefined';
};

// Keys are always canonical strings; see toPropertyKey in context.ts.
export type ObjectProperties = Map<string, Value>;

export type ObjectValue = {
    readonly type: 'object';
    readonly properties: ObjectProperties;
};

// Same backing map as an object, keyed by canonical index strings. Length is derived.
export type ArrayValue = {
    readonly type: 'array';
    readonly properties: ObjectProperties;
};

export type FunctionValue = {
    readonly type: 'function';
    readonly name: string | null;
    readonly parameters: readonly string[];
    readonly body: Block;
    readonly declaredVars: ReadonlySet<string>;
    readonly environment: Environment;
    readonly script: ParsedScript | null;
    // named function expressions see their own name; declarations are bound by the enclosing scope
    readonly bindsOwnName: boolean;
};

export type NativeFunctionInvoke = (thisArg: Value, args: Value[]) => Value;

export type NativeFunctionValue = {
    readonly type: 'native-function';
    readonly name: string;
    readonly invoke: NativeFunctionInvoke;
};

/** "No value produced". Distinct from undefined and never a Value itself. */
export type EmptyValue = {
    readonly type: 'empty';
};

export type CompletionType = 'normal' | 'break' | 'continue' | 'return';

export type Completion = {
    readonly type: CompletionType;
    readonly value: Value | EmptyValue;
    // reserved for labelled statements
    readonly target: EmptyValue;
};

export type Unresolvable = {
    readonly type: 'unresolvable';
};

export type ReferenceBase = Environment | Value | Unresolvable;

export type Reference = {
    readonly type: 'reference';
    readonly name: string;
    readonly base: ReferenceBase;
};

export type CallStackEntry = {
    caller: Context;
    callee: FunctionValue;
};

export type Context = null | {
    node: Node | null;
    scope: {
        callStackEntry: CallStackEntry | null;
        script: ParsedScript | null;
    };
};

export type ProgramResult = {
    readonly completion: Completion;
    readonly value: Value;
    readonly environment: Environment;
};
