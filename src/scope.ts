import { ArrayLiteral, Assignment, BinaryOp, Block, ConditionalOp, DoWhileStatement, Expression, FunctionCall, FunctionDefinition, getDeclaredVars, getFunctionDeclarations, IfStatement, Node, ObjectLiteral, PropertyAccess, ReturnStatement, Statement, UnaryOp, VariableDeclaration, WhileStatement } from './ast';
import { Context } from './context';
import type { Engine } from './engine';
import { Environment } from './environment';
import { arrayValue, booleanValue, breakCompletion, continueCompletion, emptyCompletion, emptyValue, functionValue, isAbrupt, isReference, normalCompletion, numberValue, objectValue, ParsedScript, reference, returnCompletion, stringValue, undefinedValue, unresolvable } from './factories';
import { printExpression } from './printer';
import { CallStackEntry, Completion, EmptyValue, FunctionValue, Reference, Value } from './types';

/**
 * Walks the tree for one activation: the program itself or a single function
 * call. Blocks share the activation's environment, since `var` is function scoped.
 */
export class Scope {
    constructor(
        readonly engine: Engine,
        readonly callStackEntry: CallStackEntry | null,
        readonly environment: Environment,
        readonly script: ParsedScript | null
    ) { }

    evaluateProgram(program: Block): Completion {
        // host bindings win over hoisted names
        for (const name of getDeclaredVars(program)) {
            if (!this.environment.hasOwn(name)) {
                this.environment.declare(name, undefinedValue);
            }
        }

        this.instantiateFunctionDeclarations(program);

        return this.evaluateBlock(program);
    }

    instantiateFunctionDeclarations(body: Block): void {
        for (const declaration of getFunctionDeclarations(body)) {
            this.environment.declare(declaration.name, this.functionValue(declaration.definition, false));
        }
    }

    evaluateStatement(statement: Statement): Completion {
        switch (statement.type) {
            case 'Block':
                return this.evaluateBlock(statement);
            case 'VariableDeclarationList':
                statement.declarations.forEach(declaration => this.evaluateVariableDeclaration(declaration));
                return emptyCompletion;
            case 'VariableDeclaration':
                this.evaluateVariableDeclaration(statement);
                return emptyCompletion;
            case 'EmptyStatement':
                return emptyCompletion;
            case 'ExpressionStatement':
                return normalCompletion(this.getValue(statement.expression));
            case 'IfStatement':
                return this.evaluateIfStatement(statement);
            case 'WhileStatement':
                return this.evaluateWhileStatement(statement);
            case 'DoWhileStatement':
                return this.evaluateDoWhileStatement(statement);
            case 'ContinueStatement':
                return continueCompletion;
            case 'BreakStatement':
                return breakCompletion;
            case 'ReturnStatement':
                return this.evaluateReturnStatement(statement);
            case 'DebuggerStatement':
                return emptyCompletion;
            case 'FunctionDeclaration':
                // instantiated when the enclosing body was entered
                return emptyCompletion;
        }
    }

    evaluateBlock(block: Block): Completion {
        let value: Value | EmptyValue = emptyValue;

        for (const statement of block.statements) {
            const result = this.evaluateStatement(statement);

            if (isAbrupt(result)) {
                return result;
            }

            if (result.value.type !== 'empty') {
                value = result.value;
            }
        }

        return normalCompletion(value);
    }

    evaluateVariableDeclaration(declaration: VariableDeclaration): void {
        if (declaration.initializer === null) {
            return;
        }

        const value = this.getValue(declaration.initializer);

        this.createContext(declaration).putValue(this.evaluateExpression(declaration.identifier), value);
    }

    evaluateIfStatement(statement: IfStatement): Completion {
        if (this.createContext(statement.condition).toBoolean(this.getValue(statement.condition))) {
            return this.evaluateStatement(statement.consequent);
        } else if (statement.alternate !== null) {
            return this.evaluateStatement(statement.alternate);
        }

        return emptyCompletion;
    }

    evaluateWhileStatement(statement: WhileStatement): Completion {
        const testContext = this.createContext(statement.condition);
        let value: Value | EmptyValue = emptyValue;

        while (testContext.toBoolean(this.getValue(statement.condition))) {
            const result = this.evaluateStatement(statement.body);

            if (result.value.type !== 'empty') {
                value = result.value;
            }

            if (result.type === 'break') {
                break;
            }

            if (result.type === 'return') {
                return result;
            }
        }

        return normalCompletion(value);
    }

    evaluateDoWhileStatement(statement: DoWhileStatement): Completion {
        const testContext = this.createContext(statement.condition);
        let value: Value | EmptyValue = emptyValue;

        do {
            const result = this.evaluateStatement(statement.body);

            if (result.value.type !== 'empty') {
                value = result.value;
            }

            if (result.type === 'break') {
                break;
            }

            if (result.type === 'return') {
                return result;
            }
        } while (testContext.toBoolean(this.getValue(statement.condition)));

        return normalCompletion(value);
    }

    evaluateReturnStatement(statement: ReturnStatement): Completion {
        if (statement.expression === null) {
            return returnCompletion(undefinedValue);
        }

        return returnCompletion(this.getValue(statement.expression));
    }

    getValue(expression: Expression): Value {
        return this.createContext(expression).getValue(this.evaluateExpression(expression));
    }

    evaluateExpression(expression: Expression): Value | Reference {
        switch (expression.type) {
            case 'Literal':
                return expression.value;
            case 'Identifier':
                return reference(expression.name, this.environment);
            case 'This':
                return this.environment.getThis() ?? undefinedValue;
            case 'ArrayLiteral':
                return this.evaluateArrayLiteral(expression);
            case 'ObjectLiteral':
                return this.evaluateObjectLiteral(expression);
            case 'PropertyAccess':
                return this.evaluatePropertyAccess(expression);
            case 'FunctionCall':
                return this.evaluateFunctionCall(expression);
            case 'UnaryOp':
                return this.evaluateUnaryOp(expression);
            case 'BinaryOp':
                return this.evaluateBinaryOp(expression);
            case 'ConditionalOp':
                return this.evaluateConditionalOp(expression);
            case 'Assignment':
                return this.evaluateAssignment(expression);
            case 'MultiExpression':
                this.getValue(expression.left);
                return this.evaluateExpression(expression.right);
            case 'FunctionDefinition':
                return this.functionValue(expression, true);
        }
    }

    evaluateArrayLiteral(expression: ArrayLiteral): Value {
        const items = expression.items.map(item => item === null ? undefinedValue : this.getValue(item));

        // only a single trailing elision is dropped
        if (expression.items.length > 0 && expression.items[expression.items.length - 1] === null) {
            items.pop();
        }

        return arrayValue(items);
    }

    evaluateObjectLiteral(expression: ObjectLiteral): Value {
        return objectValue(expression.properties.map((property): [string, Value] => [property.key, this.getValue(property.value)]));
    }

    evaluatePropertyAccess(expression: PropertyAccess): Reference {
        const object = this.getValue(expression.object);
        const propertyName = this.createContext(expression.key).toPropertyKey(this.getValue(expression.key));

        if (object.type === 'undefined' || object.type === 'null') {
            return reference(propertyName, unresolvable);
        }

        return reference(propertyName, object);
    }

    evaluateFunctionCall(expression: FunctionCall): Value {
        const context = this.createContext(expression);
        const calleeReference = this.evaluateExpression(expression.callee);
        const callee = context.getValue(calleeReference);
        const thisArg = this.getThisArg(calleeReference);
        const args = expression.args.map(arg => this.getValue(arg));

        if (callee.type !== 'function' && callee.type !== 'native-function') {
            throw context.newTypeError(printExpression(expression.callee) + ' is not a function');
        }

        return context.executeFunction(callee, thisArg, args);
    }

    getThisArg(callee: Value | Reference): Value {
        if (!isReference(callee)) {
            return undefinedValue;
        }

        const base = callee.base;

        if (base instanceof Environment || base.type === 'unresolvable') {
            return undefinedValue;
        }

        return base;
    }

    evaluateUnaryOp(expression: UnaryOp): Value {
        switch (expression.op) {
            case '++':
            case '--':
            case 'postfix++':
            case 'postfix--':
                return this.evaluateUpdate(expression);
        }

        const context = this.createContext(expression);
        const operand = this.getValue(expression.operand);

        switch (expression.op) {
            case '+':
                return numberValue(context.toNumber(operand));
            case '-':
                return numberValue(-context.toNumber(operand));
            case '~':
                return numberValue(~context.toNumber(operand));
            case '!':
                return booleanValue(!context.toBoolean(operand));
            // placeholders: nothing is deleted and every type reads as an object
            case 'delete':
                return booleanValue(true);
            case 'void':
                return undefinedValue;
            case 'typeof':
                return stringValue('object');
        }

        throw context.newSyntaxError(`Unknown unary operator: ${expression.op}`);
    }

    evaluateUpdate(expression: UnaryOp): Value {
        const context = this.createContext(expression);
        const target = this.evaluateExpression(expression.operand);

        if (!isReference(target)) {
            throw context.newReferenceError(`Invalid left-hand side expression in ${expression.op.startsWith('postfix') ? 'postfix' : 'prefix'} operation`);
        }

        const oldValue = context.toNumber(context.getValue(target));
        const newValue = expression.op.endsWith('++') ? oldValue + 1 : oldValue - 1;

        context.putValue(target, numberValue(newValue));

        return numberValue(expression.op.startsWith('postfix') ? oldValue : newValue);
    }

    evaluateBinaryOp(expression: BinaryOp): Value {
        const context = this.createContext(expression);
        const left = this.getValue(expression.left);

        switch (expression.op) {
            case '&&':
                return context.toBoolean(left) ? this.getValue(expression.right) : left;
            case '||':
                return context.toBoolean(left) ? left : this.getValue(expression.right);
        }

        return context.applyBinaryOperator(expression.op, left, this.getValue(expression.right));
    }

    evaluateConditionalOp(expression: ConditionalOp): Value {
        const selectedExpression = this.createContext(expression.condition).toBoolean(this.getValue(expression.condition)) ?
            expression.consequent :
            expression.alternate;

        return this.getValue(selectedExpression);
    }

    evaluateAssignment(expression: Assignment): Value {
        const context = this.createContext(expression);
        const target = this.evaluateExpression(expression.target);

        if (!isReference(target)) {
            throw context.newReferenceError('Invalid left-hand side in assignment');
        }

        if (expression.op === '=') {
            const value = this.getValue(expression.value);
            context.putValue(target, value);
            return value;
        }

        const operand = this.getValue(expression.value);
        const value = context.applyBinaryOperator(expression.op.slice(0, -1), context.getValue(target), operand);

        context.putValue(target, value);

        return value;
    }

    functionValue(definition: FunctionDefinition, bindsOwnName: boolean): FunctionValue {
        return functionValue({
            name: definition.name,
            parameters: definition.parameters.map(parameter => parameter.name),
            body: definition.body,
            declaredVars: getDeclaredVars(definition.body),
            environment: this.environment,
            script: this.script,
            bindsOwnName
        });
    }

    callFunction(callee: FunctionValue, thisArg: Value, args: Value[], caller: Context): Value {
        const bindings = new Map<string, Value>();

        if (callee.bindsOwnName && callee.name !== null) {
            bindings.set(callee.name, callee);
        }

        for (const name of callee.declaredVars) {
            bindings.set(name, undefinedValue);
        }

        bindings.set('arguments', arrayValue(args));
        bindings.set('this', thisArg);

        callee.parameters.forEach((name, index) => {
            bindings.set(name, index < args.length ? args[index] : undefinedValue);
        });

        const functionScope = new Scope(this.engine, { caller, callee }, callee.environment.createChild(bindings), callee.script);

        functionScope.instantiateFunctionDeclarations(callee.body);

        const result = functionScope.evaluateBlock(callee.body);
        const value = result.value;

        return result.type === 'return' && value.type !== 'empty' ? value : undefinedValue;
    }

    createContext(node: Node | null): Context {
        return new Context(node, this);
    }
}
