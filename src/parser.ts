import { parse, parseExpression as parseBabelExpression } from '@babel/parser';
import { isExpression } from '@babel/types';
import type { ArrayExpression, BlockStatement, Directive, Expression as BabelExpression, FunctionDeclaration as BabelFunctionDeclaration, FunctionExpression, Identifier as BabelIdentifier, Node as BabelNode, ObjectExpression, Program, Statement as BabelStatement, VariableDeclaration as BabelVariableDeclaration } from '@babel/types';
import * as ast from './ast';
import { Block, Expression, FunctionDefinition, Identifier, Node, PropertyAssignment, SourceLocation, Statement } from './ast';
import { booleanValue, nullValue, numberValue, ParsedScript, stringValue } from './factories';
import { NotImplementedError } from './notImplementedError';

export type ParseOptions = {
    /** Record the start line/column of every node (default true). */
    locations?: boolean;
};

export function parseScript(sourceCode: string, path: string, options: ParseOptions = {}): ParsedScript {
    const file = parse(sourceCode, {
        sourceType: 'script',
        sourceFilename: path
    });

    return {
        program: new AstMapper(path, options).mapBlock(file.program),
        sourceCode,
        path
    };
}

export function parseExpression(sourceCode: string, options: ParseOptions = {}): Expression {
    const expression = parseBabelExpression(sourceCode, {
        sourceType: 'script'
    });

    return new AstMapper(null, options).mapExpression(expression);
}

class AstMapper {
    private readonly locations: boolean;

    constructor(
        private readonly path: string | null,
        options: ParseOptions
    ) {
        this.locations = options.locations ?? true;
    }

    mapBlock(node: Program | BlockStatement): Block {
        return this.located(ast.block([
            ...node.directives.map(directive => this.mapDirective(directive)),
            ...node.body.map(statement => this.mapStatement(statement))
        ]), node);
    }

    mapDirective(directive: Directive): Statement {
        const expression = this.located(ast.literal(stringValue(directive.value.value)), directive.value);

        return this.located(ast.expressionStatement(expression), directive);
    }

    mapStatement(statement: BabelStatement): Statement {
        switch (statement.type) {
            case 'BlockStatement':
                return this.mapBlock(statement);
            case 'VariableDeclaration':
                return this.mapVariableDeclaration(statement);
            case 'EmptyStatement':
                return this.located(ast.emptyStatement(), statement);
            case 'ExpressionStatement':
                return this.located(ast.expressionStatement(this.mapExpression(statement.expression)), statement);
            case 'IfStatement':
                return this.located(ast.ifStatement(
                    this.mapExpression(statement.test),
                    this.mapStatement(statement.consequent),
                    statement.alternate ? this.mapStatement(statement.alternate) : null
                ), statement);
            case 'WhileStatement':
                return this.located(ast.whileStatement(this.mapExpression(statement.test), this.mapStatement(statement.body)), statement);
            case 'DoWhileStatement':
                return this.located(ast.doWhileStatement(this.mapExpression(statement.test), this.mapStatement(statement.body)), statement);
            case 'ContinueStatement':
                if (statement.label) {
                    throw this.unsupported('labelled continue', statement);
                }

                return this.located(ast.continueStatement(), statement);
            case 'BreakStatement':
                if (statement.label) {
                    throw this.unsupported('labelled break', statement);
                }

                return this.located(ast.breakStatement(), statement);
            case 'ReturnStatement':
                return this.located(ast.returnStatement(statement.argument ? this.mapExpression(statement.argument) : null), statement);
            case 'DebuggerStatement':
                return this.located(ast.debuggerStatement(), statement);
            case 'FunctionDeclaration':
                return this.mapFunctionDeclaration(statement);
            default:
                throw this.unsupported('statement type ' + statement.type, statement);
        }
    }

    mapVariableDeclaration(statement: BabelVariableDeclaration): Statement {
        if (statement.kind !== 'var') {
            throw this.unsupported('variable declaration kind ' + statement.kind, statement);
        }

        const declarations = statement.declarations.map(declarator => {
            if (declarator.id.type !== 'Identifier') {
                throw this.unsupported('variable declaration type ' + declarator.id.type, declarator);
            }

            const initializer = declarator.init ? this.mapExpression(declarator.init) : null;

            return this.located(ast.variableDeclaration(this.mapIdentifier(declarator.id), initializer), declarator);
        });

        return this.located(ast.variableDeclarationList(declarations), statement);
    }

    mapFunctionDeclaration(statement: BabelFunctionDeclaration): Statement {
        if (!statement.id) {
            throw this.unsupported('anonymous function declaration', statement);
        }

        const name = statement.id.name;

        return this.located(ast.functionDeclaration(name, this.mapFunction(statement, name)), statement);
    }

    mapExpression(expression: BabelExpression): Expression {
        switch (expression.type) {
            case 'NumericLiteral':
                return this.located(ast.literal(numberValue(expression.value)), expression);
            case 'StringLiteral':
                return this.located(ast.literal(stringValue(expression.value)), expression);
            case 'BooleanLiteral':
                return this.located(ast.literal(booleanValue(expression.value)), expression);
            case 'NullLiteral':
                return this.located(ast.literal(nullValue), expression);
            case 'Identifier':
                return this.mapIdentifier(expression);
            case 'ThisExpression':
                return this.located(ast.thisExpression(), expression);
            case 'ArrayExpression':
                return this.mapArrayExpression(expression);
            case 'ObjectExpression':
                return this.mapObjectExpression(expression);
            case 'MemberExpression': {
                const property = expression.property;

                if (property.type === 'PrivateName') {
                    throw this.unsupported('private name', property);
                }

                const key = expression.computed ?
                    this.mapExpression(property) :
                    this.located(ast.literal(stringValue(this.propertyName(property))), property);

                return this.located(ast.propertyAccess(this.mapExpression(expression.object), key), expression);
            }
            case 'CallExpression': {
                const callee = expression.callee;

                if (!isExpression(callee)) {
                    throw this.unsupported('callee type ' + callee.type, callee);
                }

                const args = expression.arguments.map(arg => {
                    if (!isExpression(arg)) {
                        throw this.unsupported('argument type ' + arg.type, arg);
                    }

                    return this.mapExpression(arg);
                });

                return this.located(ast.functionCall(this.mapExpression(callee), args), expression);
            }
            case 'UnaryExpression':
                return this.located(ast.unaryOp(expression.operator, this.mapExpression(expression.argument)), expression);
            case 'UpdateExpression': {
                const op = expression.prefix ? expression.operator : 'postfix' + expression.operator;

                return this.located(ast.unaryOp(op, this.mapExpression(expression.argument)), expression);
            }
            case 'BinaryExpression': {
                const left = expression.left;

                if (!isExpression(left)) {
                    throw this.unsupported('binary operand type ' + left.type, left);
                }

                return this.located(ast.binaryOp(expression.operator, this.mapExpression(left), this.mapExpression(expression.right)), expression);
            }
            case 'LogicalExpression':
                return this.located(ast.binaryOp(expression.operator, this.mapExpression(expression.left), this.mapExpression(expression.right)), expression);
            case 'ConditionalExpression':
                return this.located(ast.conditionalOp(
                    this.mapExpression(expression.test),
                    this.mapExpression(expression.consequent),
                    this.mapExpression(expression.alternate)
                ), expression);
            case 'AssignmentExpression': {
                const left = expression.left;

                if (left.type !== 'Identifier' && left.type !== 'MemberExpression') {
                    throw this.unsupported('assignment target type ' + left.type, left);
                }

                return this.located(ast.assignment(expression.operator, this.mapExpression(left), this.mapExpression(expression.right)), expression);
            }
            case 'SequenceExpression': {
                const [first, ...rest] = expression.expressions.map(item => this.mapExpression(item));

                return rest.reduce<Expression>((left, right) => this.located(ast.multiExpression(left, right), expression), first);
            }
            case 'FunctionExpression':
                return this.mapFunction(expression, expression.id ? expression.id.name : null);
            case 'ParenthesizedExpression':
                return this.mapExpression(expression.expression);
            default:
                throw this.unsupported('expression type ' + expression.type, expression);
        }
    }

    mapIdentifier(identifier: BabelIdentifier): Identifier {
        return this.located(ast.identifier(identifier.name), identifier);
    }

    mapArrayExpression(expression: ArrayExpression): Expression {
        const items = expression.elements.map(element => {
            if (element === null) {
                return null;
            }

            if (!isExpression(element)) {
                throw this.unsupported('array element type ' + element.type, element);
            }

            return this.mapExpression(element);
        });

        // a trailing comma counts as one more elision; evaluation drops it again
        return this.located(ast.arrayLiteral(this.hasTrailingComma(expression) ? [...items, null] : items), expression);
    }

    mapObjectExpression(expression: ObjectExpression): Expression {
        const properties = expression.properties.map((property): PropertyAssignment => {
            if (property.type !== 'ObjectProperty') {
                throw this.unsupported('object member type ' + property.type, property);
            }

            if (property.computed) {
                throw this.unsupported('computed property name', property);
            }

            if (!isExpression(property.value)) {
                throw this.unsupported('property value type ' + property.value.type, property.value);
            }

            return {
                key: this.propertyName(property.key),
                value: this.mapExpression(property.value)
            };
        });

        return this.located(ast.objectLiteral(properties), expression);
    }

    mapFunction(node: FunctionExpression | BabelFunctionDeclaration, name: string | null): FunctionDefinition {
        if (node.generator || node.async) {
            throw this.unsupported(node.generator ? 'generator function' : 'async function', node);
        }

        const parameters = node.params.map(param => {
            if (param.type !== 'Identifier') {
                throw this.unsupported('parameter type ' + param.type, param);
            }

            return this.mapIdentifier(param);
        });

        return this.located(ast.functionDefinition(parameters, this.mapBlock(node.body), name), node);
    }

    propertyName(key: BabelNode): string {
        switch (key.type) {
            case 'Identifier':
                return key.name;
            case 'StringLiteral':
                return key.value;
            case 'NumericLiteral':
                return String(key.value);
            default:
                throw this.unsupported('property name type ' + key.type, key);
        }
    }

    hasTrailingComma(expression: ArrayExpression): boolean {
        return expression.extra?.trailingComma !== undefined;
    }

    located<T extends Node>(node: T, source: BabelNode): T {
        const loc = this.locationOf(source);

        return loc === null ? node : { ...node, loc };
    }

    locationOf(source: BabelNode): SourceLocation | null {
        if (!this.locations || !source.loc) {
            return null;
        }

        return {
            line: source.loc.start.line,
            column: source.loc.start.column
        };
    }

    unsupported(details: string, source: BabelNode): NotImplementedError {
        const loc = source.loc ? { line: source.loc.start.line, column: source.loc.start.column } : null;

        return new NotImplementedError('unsupported ' + details, this.path, loc);
    }
}
