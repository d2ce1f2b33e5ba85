import { isValidIdentifier } from '@babel/types';
import { Block, Expression, FunctionDefinition, LiteralValue, Node, Statement } from './ast';

/**
 * Prints a node back to source text. Compound expressions are always
 * parenthesized, so parsing the output gives back an equal tree.
 */
export function printNode(node: Node): string {
    switch (node.type) {
        case 'Block':
        case 'VariableDeclarationList':
        case 'VariableDeclaration':
        case 'EmptyStatement':
        case 'ExpressionStatement':
        case 'IfStatement':
        case 'WhileStatement':
        case 'DoWhileStatement':
        case 'ContinueStatement':
        case 'BreakStatement':
        case 'ReturnStatement':
        case 'DebuggerStatement':
        case 'FunctionDeclaration':
            return printStatement(node);
        default:
            return printExpression(node);
    }
}

export function printProgram(program: Block): string {
    return program.statements.map(printStatement).join('\n');
}

function printStatement(statement: Statement): string {
    switch (statement.type) {
        case 'Block':
            return statement.statements.length === 0 ?
                '{}' :
                `{ ${statement.statements.map(printStatement).join(' ')} }`;
        case 'VariableDeclarationList':
            return `var ${statement.declarations.map(printDeclaration).join(', ')};`;
        case 'VariableDeclaration':
            return `var ${printDeclaration(statement)};`;
        case 'EmptyStatement':
            return ';';
        case 'ExpressionStatement':
            // parentheses keep `{` and `function` from starting a statement
            return `(${printExpression(statement.expression)});`;
        case 'IfStatement': {
            const head = `if (${printExpression(statement.condition)}) ${printStatement(statement.consequent)}`;

            return statement.alternate === null ? head : `${head} else ${printStatement(statement.alternate)}`;
        }
        case 'WhileStatement':
            return `while (${printExpression(statement.condition)}) ${printStatement(statement.body)}`;
        case 'DoWhileStatement':
            return `do ${printStatement(statement.body)} while (${printExpression(statement.condition)});`;
        case 'ContinueStatement':
            return 'continue;';
        case 'BreakStatement':
            return 'break;';
        case 'ReturnStatement':
            return statement.expression === null ? 'return;' : `return ${printExpression(statement.expression)};`;
        case 'DebuggerStatement':
            return 'debugger;';
        case 'FunctionDeclaration':
            return printFunction(statement.definition);
    }
}

function printDeclaration(declaration: { identifier: { name: string }; initializer: Expression | null }): string {
    return declaration.initializer === null ?
        declaration.identifier.name :
        `${declaration.identifier.name} = ${printExpression(declaration.initializer)}`;
}

export function printExpression(expression: Expression): string {
    switch (expression.type) {
        case 'Literal':
            return printLiteral(expression.value);
        case 'Identifier':
            return expression.name;
        case 'This':
            return 'this';
        case 'ArrayLiteral':
            return printArrayLiteral(expression.items);
        case 'ObjectLiteral':
            return `{${expression.properties.map(property => `${printPropertyName(property.key)}: ${printExpression(property.value)}`).join(', ')}}`;
        case 'PropertyAccess':
            return `${printOperand(expression.object)}[${printExpression(expression.key)}]`;
        case 'FunctionCall':
            return `${printOperand(expression.callee)}(${expression.args.map(printExpression).join(', ')})`;
        case 'UnaryOp':
            return printUnaryOp(expression.op, printOperand(expression.operand));
        case 'BinaryOp':
            return `(${printExpression(expression.left)} ${expression.op} ${printExpression(expression.right)})`;
        case 'ConditionalOp':
            return `(${printExpression(expression.condition)} ? ${printExpression(expression.consequent)} : ${printExpression(expression.alternate)})`;
        case 'Assignment':
            return `(${printExpression(expression.target)} ${expression.op} ${printExpression(expression.value)})`;
        case 'MultiExpression':
            return `(${printExpression(expression.left)}, ${printExpression(expression.right)})`;
        case 'FunctionDefinition':
            return `(${printFunction(expression)})`;
    }
}

function printUnaryOp(op: string, operand: string): string {
    if (op.startsWith('postfix')) {
        return `(${operand}${op.slice('postfix'.length)})`;
    }

    // keep `- -x` from printing as `--x`
    return /^[a-z]/.test(op) ? `(${op} ${operand})` : `(${op}${operand})`;
}

// Identifiers and property accesses can be assignment targets, so they stay bare.
function printOperand(expression: Expression): string {
    const printed = printExpression(expression);

    return printed.startsWith('(') || expression.type === 'Identifier' || expression.type === 'PropertyAccess' || expression.type === 'This' ?
        printed :
        `(${printed})`;
}

function printFunction(definition: FunctionDefinition): string {
    const name = definition.name === null ? '' : ` ${definition.name}`;
    const parameters = definition.parameters.map(parameter => parameter.name).join(', ');

    return `function${name}(${parameters}) ${printStatement(definition.body)}`;
}

function printArrayLiteral(items: readonly (Expression | null)[]): string {
    const printItem = (item: Expression | null) => item === null ? '' : printExpression(item);

    if (items.length > 0 && items[items.length - 1] === null) {
        // the last elision stands for a trailing comma
        return `[${items.slice(0, -1).map(item => printItem(item) + ',').join(' ')}]`;
    }

    return `[${items.map(printItem).join(', ')}]`;
}

function printPropertyName(key: string): string {
    return isValidIdentifier(key) ? key : JSON.stringify(key);
}

function printLiteral(value: LiteralValue): string {
    switch (value.type) {
        case 'number':
            return String(value.value);
        case 'string':
            return JSON.stringify(value.value);
        case 'boolean':
            return String(value.value);
        case 'null':
            return 'null';
    }
}
