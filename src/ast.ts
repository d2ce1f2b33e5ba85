import type { BooleanValue, NullValue, NumberValue, StringValue } from './types';

export type SourceLocation = {
    readonly line: number;
    readonly column: number;
};

type NodeBase = {
    readonly loc?: SourceLocation;
};

export type LiteralValue = NumberValue | StringValue | BooleanValue | NullValue;

export type Literal = NodeBase & {
    readonly type: 'Literal';
    readonly value: LiteralValue;
};

export type Identifier = NodeBase & {
    readonly type: 'Identifier';
    readonly name: string;
};

export type This = NodeBase & {
    readonly type: 'This';
};

/** `null` items are elisions (holes). */
export type ArrayLiteral = NodeBase & {
    readonly type: 'ArrayLiteral';
    readonly items: readonly (Expression | null)[];
};

export type PropertyAssignment = {
    readonly key: string;
    readonly value: Expression;
};

export type ObjectLiteral = NodeBase & {
    readonly type: 'ObjectLiteral';
    readonly properties: readonly PropertyAssignment[];
};

export type PropertyAccess = NodeBase & {
    readonly type: 'PropertyAccess';
    readonly object: Expression;
    readonly key: Expression;
};

export type FunctionCall = NodeBase & {
    readonly type: 'FunctionCall';
    readonly callee: Expression;
    readonly args: readonly Expression[];
};

export type UnaryOp = NodeBase & {
    readonly type: 'UnaryOp';
    readonly op: string;
    readonly operand: Expression;
};

export type BinaryOp = NodeBase & {
    readonly type: 'BinaryOp';
    readonly op: string;
    readonly left: Expression;
    readonly right: Expression;
};

export type ConditionalOp = NodeBase & {
    readonly type: 'ConditionalOp';
    readonly condition: Expression;
    readonly consequent: Expression;
    readonly alternate: Expression;
};

export type Assignment = NodeBase & {
    readonly type: 'Assignment';
    readonly op: string;
    readonly target: Expression;
    readonly value: Expression;
};

export type MultiExpression = NodeBase & {
    readonly type: 'MultiExpression';
    readonly left: Expression;
    readonly right: Expression;
};

export type FunctionDefinition = NodeBase & {
    readonly type: 'FunctionDefinition';
    readonly name: string | null;
    readonly parameters: readonly Identifier[];
    readonly body: Block;
};

export type Expression = Literal | Identifier | This | ArrayLiteral | ObjectLiteral | PropertyAccess | FunctionCall | UnaryOp | BinaryOp | ConditionalOp | Assignment | MultiExpression | FunctionDefinition;

export type Block = NodeBase & {
    readonly type: 'Block';
    readonly statements: readonly Statement[];
};

export type VariableDeclaration = NodeBase & {
    readonly type: 'VariableDeclaration';
    readonly identifier: Identifier;
    readonly initializer: Expression | null;
};

export type VariableDeclarationList = NodeBase & {
    readonly type: 'VariableDeclarationList';
    readonly declarations: readonly VariableDeclaration[];
};

export type EmptyStatement = NodeBase & {
    readonly type: 'EmptyStatement';
};

export type ExpressionStatement = NodeBase & {
    readonly type: 'ExpressionStatement';
    readonly expression: Expression;
};

export type IfStatement = NodeBase & {
    readonly type: 'IfStatement';
    readonly condition: Expression;
    readonly consequent: Statement;
    readonly alternate: Statement | null;
};

export type WhileStatement = NodeBase & {
    readonly type: 'WhileStatement';
    readonly condition: Expression;
    readonly body: Statement;
};

export type DoWhileStatement = NodeBase & {
    readonly type: 'DoWhileStatement';
    readonly condition: Expression;
    readonly body: Statement;
};

export type ContinueStatement = NodeBase & {
    readonly type: 'ContinueStatement';
};

export type BreakStatement = NodeBase & {
    readonly type: 'BreakStatement';
};

export type ReturnStatement = NodeBase & {
    readonly type: 'ReturnStatement';
    readonly expression: Expression | null;
};

export type DebuggerStatement = NodeBase & {
    readonly type: 'DebuggerStatement';
};

export type FunctionDeclaration = NodeBase & {
    readonly type: 'FunctionDeclaration';
    readonly name: string;
    readonly definition: FunctionDefinition;
};

export type Statement = Block | VariableDeclarationList | VariableDeclaration | EmptyStatement | ExpressionStatement | IfStatement | WhileStatement | DoWhileStatement | ContinueStatement | BreakStatement | ReturnStatement | DebuggerStatement | FunctionDeclaration;

export type Node = Expression | Statement;

export function literal(value: LiteralValue): Literal {
    return { type: 'Literal', value };
}

export function identifier(name: string): Identifier {
    return { type: 'Identifier', name };
}

export function thisExpression(): This {
    return { type: 'This' };
}

export function arrayLiteral(items: readonly (Expression | null)[]): ArrayLiteral {
    return { type: 'ArrayLiteral', items };
}

export function objectLiteral(properties: readonly PropertyAssignment[]): ObjectLiteral {
    return { type: 'ObjectLiteral', properties };
}

export function propertyAccess(object: Expression, key: Expression): PropertyAccess {
    return { type: 'PropertyAccess', object, key };
}

export function functionCall(callee: Expression, args: readonly Expression[]): FunctionCall {
    return { type: 'FunctionCall', callee, args };
}

export function unaryOp(op: string, operand: Expression): UnaryOp {
    return { type: 'UnaryOp', op, operand };
}

export function binaryOp(op: string, left: Expression, right: Expression): BinaryOp {
    return { type: 'BinaryOp', op, left, right };
}

export function conditionalOp(condition: Expression, consequent: Expression, alternate: Expression): ConditionalOp {
    return { type: 'ConditionalOp', condition, consequent, alternate };
}

export function assignment(op: string, target: Expression, value: Expression): Assignment {
    return { type: 'Assignment', op, target, value };
}

export function multiExpression(left: Expression, right: Expression): MultiExpression {
    return { type: 'MultiExpression', left, right };
}

export function functionDefinition(parameters: readonly Identifier[], body: Block, name: string | null = null): FunctionDefinition {
    return { type: 'FunctionDefinition', name, parameters, body };
}

export function block(statements: readonly Statement[]): Block {
    return { type: 'Block', statements };
}

export function variableDeclaration(id: Identifier, initializer: Expression | null): VariableDeclaration {
    return { type: 'VariableDeclaration', identifier: id, initializer };
}

export function variableDeclarationList(declarations: readonly VariableDeclaration[]): VariableDeclarationList {
    return { type: 'VariableDeclarationList', declarations };
}

export function emptyStatement(): EmptyStatement {
    return { type: 'EmptyStatement' };
}

export function expressionStatement(expression: Expression): ExpressionStatement {
    return { type: 'ExpressionStatement', expression };
}

export function ifStatement(condition: Expression, consequent: Statement, alternate: Statement | null): IfStatement {
    return { type: 'IfStatement', condition, consequent, alternate };
}

export function whileStatement(condition: Expression, body: Statement): WhileStatement {
    return { type: 'WhileStatement', condition, body };
}

export function doWhileStatement(condition: Expression, body: Statement): DoWhileStatement {
    return { type: 'DoWhileStatement', condition, body };
}

export function continueStatement(): ContinueStatement {
    return { type: 'ContinueStatement' };
}

export function breakStatement(): BreakStatement {
    return { type: 'BreakStatement' };
}

export function returnStatement(expression: Expression | null): ReturnStatement {
    return { type: 'ReturnStatement', expression };
}

export function debuggerStatement(): DebuggerStatement {
    return { type: 'DebuggerStatement' };
}

export function functionDeclaration(name: string, definition: FunctionDefinition): FunctionDeclaration {
    return { type: 'FunctionDeclaration', name, definition };
}

/**
 * Names declared with `var` (and function declarations) in the scope that owns `node`.
 * Function bodies are separate scopes, so expressions contribute nothing.
 */
export function getDeclaredVars(node: Node): Set<string> {
    switch (node.type) {
        case 'Block':
            return union(node.statements.map(getDeclaredVars));
        case 'VariableDeclarationList':
            return union(node.declarations.map(getDeclaredVars));
        case 'VariableDeclaration':
            return new Set([node.identifier.name]);
        case 'FunctionDeclaration':
            return new Set([node.name]);
        case 'IfStatement':
            return node.alternate === null ?
                getDeclaredVars(node.consequent) :
                union([getDeclaredVars(node.consequent), getDeclaredVars(node.alternate)]);
        case 'WhileStatement':
        case 'DoWhileStatement':
            return getDeclaredVars(node.body);
        default:
            return new Set();
    }
}

export function getFunctionDeclarations(statement: Statement): FunctionDeclaration[] {
    switch (statement.type) {
        case 'Block':
            return statement.statements.flatMap(getFunctionDeclarations);
        case 'FunctionDeclaration':
            return [statement];
        case 'IfStatement':
            return statement.alternate === null ?
                getFunctionDeclarations(statement.consequent) :
                [...getFunctionDeclarations(statement.consequent), ...getFunctionDeclarations(statement.alternate)];
        case 'WhileStatement':
        case 'DoWhileStatement':
            return getFunctionDeclarations(statement.body);
        default:
            return [];
    }
}

function union(sets: Set<string>[]): Set<string> {
    const result = new Set<string>();

    for (const set of sets) {
        set.forEach(name => result.add(name));
    }

    return result;
}

/** Field-by-field comparison; source locations are ignored. */
export function nodesEqual(left: Node | null, right: Node | null): boolean {
    return structurallyEqual(left, right);
}

function structurallyEqual(left: unknown, right: unknown): boolean {
    if (left === right) {
        return true;
    }

    if (Array.isArray(left) || Array.isArray(right)) {
        return Array.isArray(left) && Array.isArray(right) &&
            left.length === right.length &&
            left.every((item, index) => structurallyEqual(item, right[index]));
    }

    if (typeof left !== 'object' || typeof right !== 'object' || left === null || right === null) {
        // NaN literals compare equal to themselves here
        return typeof left === 'number' && typeof right === 'number' && Number.isNaN(left) && Number.isNaN(right);
    }

    const leftKeys = Object.keys(left).filter(key => key !== 'loc');
    const rightKeys = Object.keys(right).filter(key => key !== 'loc');

    if (leftKeys.length !== rightKeys.length) {
        return false;
    }

    return leftKeys.every(key => rightKeys.includes(key) &&
        structurallyEqual(Reflect.get(left, key), Reflect.get(right, key)));
}
