import * as Shift from 'shift-parser';
import { parseScriptWithLocation } from 'shift-parser';

import * as S from './schema';

function operatorTable<Op extends string>(ops: Array<Op>): ReadonlyMap<string, Op> {
    return new Map(ops.map((op): [string, Op] => [op, op]));
}

const BINARY_OPERATORS = operatorTable(Object.values(S.BinaryOperator));
const UNARY_OPERATORS = operatorTable(Object.values(S.UnaryOperator));
const ASSIGNMENT_OPERATORS = operatorTable(Object.values(S.AssignmentOperator));
const UPDATE_OPERATORS = operatorTable(Object.values(S.UpdateOperator));

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// Raised for syntax that has no counterpart in the node model.
export class UnsupportedSyntaxError extends Error {
    readonly nodeType: string;

    constructor(nodeType: string, detail?: string) {
        super(`Unsupported syntax: ${nodeType}${detail ? ` (${detail})` : ''}`);
        this.name = 'UnsupportedSyntaxError';
        this.nodeType = nodeType;
    }
}

function lookupOperator<Op>(table: ReadonlyMap<string, Op>, nodeType: string, operator: string): Op {
    const op = table.get(operator);
    if (op === undefined) {
        throw new UnsupportedSyntaxError(nodeType, `operator ${operator}`);
    }
    return op;
}

function regexpFlags(node: Shift.LiteralRegExpExpression): string {
    let flags = '';
    if (node.global) flags += 'g';
    if (node.ignoreCase) flags += 'i';
    if (node.multiLine) flags += 'm';
    if (node.dotAll) flags += 's';
    if (node.unicode) flags += 'u';
    if (node.sticky) flags += 'y';
    return flags;
}

/**
 * Lifts a Shift script into the node model. Parent pointers are wired by the
 * node constructors; spans and lines come from the parser's location map.
 */
export class Importer {
    private readonly source: string;
    private readonly locations: WeakMap<object, Shift.SourceSpan>;

    constructor(params: {source: string,
                         locations?: WeakMap<object, Shift.SourceSpan>})
    {
        this.source = params.source;
        this.locations = params.locations ?? new WeakMap();
    }

    liftScript(script: Shift.Script, filename?: string | null): S.Program {
        const body: Array<S.Statement> = [
            ...script.directives.map(d => this.liftDirective(d)),
            ...script.statements.map(s => this.liftStatement(s)),
        ];
        return this.at(new S.Program({body, filename}), script);
    }

    // Copies the span of `from` onto `node`.
    private at<N extends S.Node>(node: N, from: object): N {
        const span = this.locations.get(from);
        if (span !== undefined) {
            node.start = span.start.offset;
            node.end = span.end.offset;
            node.line = span.start.line;
        }
        return node;
    }

    // The source text of `from`, or null when its span is unknown.
    private rawText(from: object): string | null {
        const span = this.locations.get(from);
        if (span === undefined) {
            return null;
        }
        return this.source.slice(span.start.offset, span.end.offset);
    }

    private name(value: string, from?: object): S.Name {
        const name = new S.Name({value});
        return from !== undefined ? this.at(name, from) : name;
    }

    // `"use strict";` and friends become string expression statements.
    liftDirective(directive: Shift.Directive): S.Statement {
        const text = this.rawText(directive);
        const literal = this.at(new S.LiteralExpression({
            value: directive.rawValue,
            raw: text !== null ? text.replace(/\s*;$/, '') : `"${directive.rawValue}"`,
        }), directive);
        return this.at(new S.ExpressionStatement({expression: literal}), directive);
    }

    liftStatement(node: Shift.Statement): S.Statement {
        switch (node.type) {
            case 'BlockStatement':
                return this.at(this.liftBlock(node.block), node);
            case 'BreakStatement':
                return this.at(new S.BreakStatement({
                    label: node.label !== null ? this.name(node.label) : null,
                }), node);
            case 'ContinueStatement':
                return this.at(new S.ContinueStatement({
                    label: node.label !== null ? this.name(node.label) : null,
                }), node);
            case 'DebuggerStatement':
                return this.at(new S.DebuggerStatement(), node);
            case 'DoWhileStatement':
                return this.at(new S.DoWhileStatement({
                    body: this.liftStatement(node.body),
                    condition: this.liftExpression(node.test),
                }), node);
            case 'EmptyStatement':
                return this.at(new S.EmptyStatement(), node);
            case 'ExpressionStatement':
                return this.at(new S.ExpressionStatement({
                    expression: this.liftExpression(node.expression),
                }), node);
            case 'ForInStatement':
                return this.at(new S.ForInStatement({
                    left: node.left.type === 'VariableDeclaration'
                        ? this.liftVariableDeclaration(node.left)
                        : this.liftAssignmentTarget(node.left),
                    right: this.liftExpression(node.right),
                    body: this.liftStatement(node.body),
                }), node);
            case 'ForStatement':
                return this.at(new S.ForStatement({
                    init: this.liftForInit(node.init),
                    condition: node.test !== null ? this.liftExpression(node.test) : null,
                    update: node.update !== null ? this.liftExpression(node.update) : null,
                    body: this.liftStatement(node.body),
                }), node);
            case 'IfStatement':
                return this.at(new S.IfStatement({
                    condition: this.liftExpression(node.test),
                    then: this.liftStatement(node.consequent),
                    otherwise: node.alternate !== null ? this.liftStatement(node.alternate) : null,
                }), node);
            case 'LabeledStatement':
                return this.at(new S.LabeledStatement({
                    label: this.name(node.label),
                    body: this.liftStatement(node.body),
                }), node);
            case 'ReturnStatement':
                return this.at(new S.ReturnStatement({
                    argument: node.expression !== null ? this.liftExpression(node.expression) : null,
                }), node);
            case 'SwitchStatement':
                return this.at(new S.SwitchStatement({
                    argument: this.liftExpression(node.discriminant),
                    cases: node.cases.map(c => this.liftSwitchCase(c)),
                }), node);
            case 'SwitchStatementWithDefault': {
                const cases = [
                    ...node.preDefaultCases.map(c => this.liftSwitchCase(c)),
                    this.at(S.SwitchCase.defaultCase(
                        node.defaultCase.consequent.map(s => this.liftStatement(s))),
                        node.defaultCase),
                    ...node.postDefaultCases.map(c => this.liftSwitchCase(c)),
                ];
                return this.at(new S.SwitchStatement({
                    argument: this.liftExpression(node.discriminant),
                    cases,
                }), node);
            }
            case 'ThrowStatement':
                return this.at(new S.ThrowStatement({
                    argument: this.liftExpression(node.expression),
                }), node);
            case 'TryCatchStatement':
                return this.at(new S.TryStatement({
                    block: this.liftBlock(node.body),
                    handler: this.liftCatchClause(node.catchClause),
                }), node);
            case 'TryFinallyStatement':
                return this.at(new S.TryStatement({
                    block: this.liftBlock(node.body),
                    handler: node.catchClause !== null ? this.liftCatchClause(node.catchClause) : null,
                    finalizer: this.liftBlock(node.finalizer),
                }), node);
            case 'VariableDeclarationStatement':
                return this.at(this.liftVariableDeclaration(node.declaration), node);
            case 'WhileStatement':
                return this.at(new S.WhileStatement({
                    condition: this.liftExpression(node.test),
                    body: this.liftStatement(node.body),
                }), node);
            case 'WithStatement':
                return this.at(new S.WithStatement({
                    object: this.liftExpression(node.object),
                    body: this.liftStatement(node.body),
                }), node);
            case 'FunctionDeclaration':
                if (node.isAsync || node.isGenerator) {
                    throw new UnsupportedSyntaxError(node.type, node.isAsync ? 'async' : 'generator');
                }
                return this.at(new S.FunctionDeclaration({
                    function: this.at(this.liftFunction(node.name, node.params, node.body), node),
                }), node);
            case 'ForOfStatement':
            case 'ForAwaitStatement':
            case 'ClassDeclaration':
                throw new UnsupportedSyntaxError(node.type);
        }
    }

    liftBlock(block: Shift.Block): S.BlockStatement {
        return this.at(new S.BlockStatement({
            body: block.statements.map(s => this.liftStatement(s)),
        }), block);
    }

    liftSwitchCase(node: Shift.SwitchCase): S.SwitchCase {
        return this.at(new S.SwitchCase({
            expression: this.liftExpression(node.test),
            body: node.consequent.map(s => this.liftStatement(s)),
        }), node);
    }

    liftCatchClause(node: Shift.CatchClause): S.CatchClause {
        return this.at(new S.CatchClause({
            param: this.liftBindingName(node.binding),
            body: this.liftBlock(node.body),
        }), node);
    }

    liftForInit(init: Shift.VariableDeclaration | Shift.Expression | null): S.ForBinding | null {
        if (init === null) {
            return null;
        }
        if (init.type === 'VariableDeclaration') {
            return this.liftVariableDeclaration(init);
        }
        return this.liftExpression(init);
    }

    liftVariableDeclaration(node: Shift.VariableDeclaration): S.VariableDeclaration {
        if (node.kind !== 'var') {
            throw new UnsupportedSyntaxError(node.type, node.kind);
        }
        return this.at(new S.VariableDeclaration({
            declarations: node.declarators.map(d => this.at(new S.VariableDeclarator({
                name: this.liftBindingName(d.binding),
                init: d.init !== null ? this.liftExpression(d.init) : null,
            }), d)),
        }), node);
    }

    liftBindingName(binding: Shift.Parameter): S.Name {
        if (binding.type !== 'BindingIdentifier') {
            throw new UnsupportedSyntaxError(binding.type);
        }
        return this.name(binding.name, binding);
    }

    liftParams(params: Shift.FormalParameters): Array<S.Name> {
        if (params.rest !== null) {
            throw new UnsupportedSyntaxError(params.type, 'rest parameter');
        }
        return params.items.map(p => this.liftBindingName(p));
    }

    // Function bodies become blocks, directives included.
    liftFunctionBody(body: Shift.FunctionBody): S.BlockStatement {
        return this.at(new S.BlockStatement({
            body: [
                ...body.directives.map(d => this.liftDirective(d)),
                ...body.statements.map(s => this.liftStatement(s)),
            ],
        }), body);
    }

    liftFunction(name: Shift.BindingIdentifier | null,
                 params: Shift.FormalParameters,
                 body: Shift.FunctionBody): S.FunctionNode
    {
        return new S.FunctionNode({
            name: name !== null ? this.liftBindingName(name) : null,
            params: this.liftParams(params),
            body: this.liftFunctionBody(body),
        });
    }

    liftAssignmentTarget(node: Shift.AssignmentTarget): S.Expression {
        switch (node.type) {
            case 'AssignmentTargetIdentifier':
                return this.at(new S.IdentifierExpression({
                    name: this.name(node.name, node),
                }), node);
            case 'StaticMemberAssignmentTarget':
                return this.at(new S.StaticMemberExpression({
                    object: this.liftObject(node.type, node.object),
                    property: this.name(node.property),
                }), node);
            case 'ComputedMemberAssignmentTarget':
                return this.at(new S.ComputedMemberExpression({
                    object: this.liftObject(node.type, node.object),
                    property: this.liftExpression(node.expression),
                }), node);
            case 'ArrayAssignmentTarget':
            case 'ObjectAssignmentTarget':
                throw new UnsupportedSyntaxError(node.type);
        }
    }

    private liftObject(nodeType: string, object: Shift.Expression | Shift.Super): S.Expression {
        if (object.type === 'Super') {
            throw new UnsupportedSyntaxError(nodeType, 'super');
        }
        return this.liftExpression(object);
    }

    private liftArguments(nodeType: string,
                          args: Array<Shift.SpreadElement | Shift.Expression>): Array<S.Expression>
    {
        return args.map(arg => {
            if (arg.type === 'SpreadElement') {
                throw new UnsupportedSyntaxError(nodeType, 'spread argument');
            }
            return this.liftExpression(arg);
        });
    }

    // Flattens left-nested comma operators into one list.
    private liftSequence(node: Shift.BinaryExpression): Array<S.Expression> {
        const expressions: Array<S.Expression> = [];
        let left: Shift.Expression = node.left;
        const rights: Array<Shift.Expression> = [node.right];
        while (left.type === 'BinaryExpression' && left.operator === ',') {
            rights.unshift(left.right);
            left = left.left;
        }
        expressions.push(this.liftExpression(left));
        for (const right of rights) {
            expressions.push(this.liftExpression(right));
        }
        return expressions;
    }

    // Keys written as identifiers become Names, quoted and numeric keys
    // literals. Without source text the decoded value decides.
    liftPropertyKey(name: Shift.PropertyName): S.PropertyKey {
        if (name.type === 'ComputedPropertyName') {
            throw new UnsupportedSyntaxError(name.type);
        }
        const value = name.value;
        const raw = this.rawText(name);
        if (raw !== null) {
            const first = raw.charAt(0);
            if (first === '"' || first === "'") {
                return this.at(new S.LiteralExpression({value, raw}), name);
            }
            if (/^[0-9.]$/.test(first)) {
                return this.at(new S.LiteralExpression({value: Number(value), raw}), name);
            }
            return this.name(value, name);
        }
        if (IDENTIFIER_RE.test(value)) {
            return this.name(value, name);
        }
        const numeric = Number(value);
        if (value !== '' && String(numeric) === value) {
            return this.at(new S.LiteralExpression({value: numeric, raw: value}), name);
        }
        return this.at(new S.LiteralExpression({value, raw: JSON.stringify(value)}), name);
    }

    liftProperty(node: Shift.ObjectProperty): S.Property {
        switch (node.type) {
            case 'DataProperty':
                return this.at(new S.Property({
                    key: this.liftPropertyKey(node.name),
                    value: this.liftExpression(node.expression),
                }), node);
            case 'Getter':
                return this.at(new S.Property({
                    key: this.liftPropertyKey(node.name),
                    value: this.at(new S.FunctionNode({
                        params: [],
                        body: this.liftFunctionBody(node.body),
                    }), node),
                    kind: 'get',
                }), node);
            case 'Setter':
                return this.at(new S.Property({
                    key: this.liftPropertyKey(node.name),
                    value: this.at(new S.FunctionNode({
                        params: [this.liftBindingName(node.param)],
                        body: this.liftFunctionBody(node.body),
                    }), node),
                    kind: 'set',
                }), node);
            case 'Method':
            case 'ShorthandProperty':
            case 'SpreadProperty':
                throw new UnsupportedSyntaxError(node.type);
        }
    }

    liftExpression(node: Shift.Expression): S.Expression {
        switch (node.type) {
            case 'ArrayExpression':
                return this.at(new S.ArrayExpression({
                    elements: node.elements.map(element => {
                        if (element === null) {
                            return null;
                        }
                        if (element.type === 'SpreadElement') {
                            throw new UnsupportedSyntaxError(node.type, 'spread element');
                        }
                        return this.liftExpression(element);
                    }),
                }), node);
            case 'ArrowExpression': {
                if (node.isAsync) {
                    throw new UnsupportedSyntaxError(node.type, 'async');
                }
                // A concise body `x => e` is kept as `return e`.
                const body: S.Statement = node.body.type === 'FunctionBody'
                    ? this.liftFunctionBody(node.body)
                    : this.at(new S.ReturnStatement({
                        argument: this.liftExpression(node.body),
                    }), node.body);
                return this.at(new S.ArrowFunctionNode({
                    params: this.liftParams(node.params),
                    body,
                }), node);
            }
            case 'AssignmentExpression':
                return this.at(new S.AssignmentExpression({
                    left: this.liftAssignmentTarget(node.binding),
                    operator: S.AssignmentOperator.Assign,
                    right: this.liftExpression(node.expression),
                }), node);
            case 'BinaryExpression':
                if (node.operator === ',') {
                    return this.at(new S.SequenceExpression({
                        expressions: this.liftSequence(node),
                    }), node);
                }
                return this.at(new S.BinaryExpression({
                    left: this.liftExpression(node.left),
                    operator: lookupOperator(BINARY_OPERATORS, node.type, node.operator),
                    right: this.liftExpression(node.right),
                }), node);
            case 'CallExpression':
                return this.at(new S.CallExpression({
                    callee: this.liftObject(node.type, node.callee),
                    arguments: this.liftArguments(node.type, node.arguments),
                }), node);
            case 'CompoundAssignmentExpression':
                return this.at(new S.AssignmentExpression({
                    left: this.liftAssignmentTarget(node.binding),
                    operator: lookupOperator(ASSIGNMENT_OPERATORS, node.type, node.operator),
                    right: this.liftExpression(node.expression),
                }), node);
            case 'ComputedMemberExpression':
                return this.at(new S.ComputedMemberExpression({
                    object: this.liftObject(node.type, node.object),
                    property: this.liftExpression(node.expression),
                }), node);
            case 'ConditionalExpression':
                return this.at(new S.ConditionalExpression({
                    condition: this.liftExpression(node.test),
                    then: this.liftExpression(node.consequent),
                    otherwise: this.liftExpression(node.alternate),
                }), node);
            case 'FunctionExpression':
                if (node.isAsync || node.isGenerator) {
                    throw new UnsupportedSyntaxError(node.type, node.isAsync ? 'async' : 'generator');
                }
                return this.at(new S.FunctionExpression({
                    function: this.at(this.liftFunction(node.name, node.params, node.body), node),
                }), node);
            case 'IdentifierExpression':
                return this.at(new S.IdentifierExpression({
                    name: this.name(node.name, node),
                }), node);
            case 'LiteralBooleanExpression':
                return this.at(new S.LiteralExpression({
                    value: node.value,
                    raw: this.rawText(node) ?? String(node.value),
                }), node);
            case 'LiteralInfinityExpression':
                return this.at(new S.LiteralExpression({
                    value: Infinity,
                    raw: this.rawText(node),
                }), node);
            case 'LiteralNullExpression':
                return this.at(new S.LiteralExpression({
                    value: null,
                    raw: this.rawText(node) ?? 'null',
                }), node);
            case 'LiteralNumericExpression':
                return this.at(new S.LiteralExpression({
                    value: node.value,
                    raw: this.rawText(node) ?? String(node.value),
                }), node);
            case 'LiteralStringExpression':
                return this.at(new S.LiteralExpression({
                    value: node.value,
                    raw: this.rawText(node) ?? JSON.stringify(node.value),
                }), node);
            case 'LiteralRegExpExpression':
                return this.at(new S.LiteralRegExpExpression({
                    regexp: this.rawText(node) ?? `/${node.pattern}/${regexpFlags(node)}`,
                }), node);
            case 'NewExpression':
                return this.at(S.CallExpression.newCall(
                    this.liftExpression(node.callee),
                    this.liftArguments(node.type, node.arguments)), node);
            case 'ObjectExpression':
                return this.at(new S.ObjectExpression({
                    properties: node.properties.map(p => this.liftProperty(p)),
                }), node);
            case 'StaticMemberExpression':
                return this.at(new S.StaticMemberExpression({
                    object: this.liftObject(node.type, node.object),
                    property: this.name(node.property),
                }), node);
            case 'ThisExpression':
                return this.at(new S.ThisExpression(), node);
            case 'UnaryExpression':
                return this.at(new S.UnaryExpression({
                    operator: lookupOperator(UNARY_OPERATORS, node.type, node.operator),
                    argument: this.liftExpression(node.operand),
                }), node);
            case 'UpdateExpression':
                return this.at(new S.UpdateExpression({
                    operator: lookupOperator(UPDATE_OPERATORS, node.type, node.operator),
                    argument: this.liftAssignmentTarget(node.operand),
                    isPrefix: node.isPrefix,
                }), node);
            case 'ClassExpression':
            case 'NewTargetExpression':
            case 'TemplateExpression':
            case 'YieldExpression':
            case 'YieldGeneratorExpression':
            case 'AwaitExpression':
                throw new UnsupportedSyntaxError(node.type);
        }
    }
}

// Parses `source` as a script and lifts it into a Program.
export function parseProgram(source: string, filename: string | null = null): S.Program {
    const { tree, locations } = parseScriptWithLocation(source);
    const importer = new Importer({source, locations});
    return importer.liftScript(tree, filename);
}
