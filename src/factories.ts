import type { Block } from './ast';
import { ArrayValue, BooleanValue, Completion, CompletionType, EmptyValue, FunctionValue, NativeFunctionInvoke, NativeFunctionValue, NullValue, NumberValue, ObjectValue, Reference, ReferenceBase, StringValue, UndefinedValue, Unresolvable, Value } from './types';

export type ParsedScript = {
    program: Block;
    sourceCode: string;
    path: string;
};

export function numberValue(value: number): NumberValue {
    return {
        type: 'number',
        value
    };
}

export function stringValue(value: string): StringValue {
    return {
        type: 'string',
        value
    };
}

export function booleanValue(value: boolean): BooleanValue {
    return {
        type: 'boolean',
        value
    };
}

export function objectValue(entries: Iterable<[string, Value]> = []): ObjectValue {
    return {
        type: 'object',
        properties: new Map(entries)
    };
}

export function arrayValue(items: Value[] = []): ArrayValue {
    return {
        type: 'array',
        properties: new Map(items.map((item, index): [string, Value] => [index.toString(), item]))
    };
}

export function nativeFunctionValue(name: string, invoke: NativeFunctionInvoke): NativeFunctionValue {
    return {
        type: 'native-function',
        name,
        invoke
    };
}

export function functionValue(fields: Omit<FunctionValue, 'type'>): FunctionValue {
    return {
        type: 'function',
        ...fields
    };
}

export const nullValue: NullValue = {
    type: 'null'
};

export const undefinedValue: UndefinedValue = {
    type: 'undefined'
};

export const emptyValue: EmptyValue = {
    type: 'empty'
};

export const unresolvable: Unresolvable = {
    type: 'unresolvable'
};

export function completion(type: CompletionType, value: Value | EmptyValue = emptyValue): Completion {
    return {
        type,
        value,
        target: emptyValue
    };
}

export function normalCompletion(value: Value | EmptyValue): Completion {
    return completion('normal', value);
}

export const emptyCompletion = completion('normal');
export const breakCompletion = completion('break');
export const continueCompletion = completion('continue');

export function returnCompletion(value: Value): Completion {
    return completion('return', value);
}

export function isAbrupt(result: Completion): boolean {
    return result.type !== 'normal';
}

export function reference(name: string, base: ReferenceBase): Reference {
    return {
        type: 'reference',
        name,
        base
    };
}

export function isReference(value: Value | Reference): value is Reference {
    return value.type === 'reference';
}
