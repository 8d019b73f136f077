import { describe, it } from 'mocha';
import { expect } from 'chai';

import * as S from './schema';
import { BaseVisitor, RecursiveVisitor, RecursiveVisitor1, Visitor, Visitor1 } from './visitor';
import { pre_order } from './tree_iterator';

// Every node type; the compiler rejects this if a type is missing.
const ALL_TYPES: Record<S.NodeType, true> = {
    Programs: true, Program: true, FunctionNode: true, ArrowFunctionNode: true,
    Name: true, EmptyStatement: true, BlockStatement: true,
    ExpressionStatement: true, IfStatement: true, LabeledStatement: true,
    BreakStatement: true, ContinueStatement: true, WithStatement: true,
    SwitchStatement: true, SwitchCase: true, ReturnStatement: true,
    ThrowStatement: true, TryStatement: true, CatchClause: true,
    WhileStatement: true, DoWhileStatement: true, ForStatement: true,
    ForInStatement: true, FunctionDeclaration: true, VariableDeclaration: true,
    VariableDeclarator: true, DebuggerStatement: true, ThisExpression: true,
    ArrayExpression: true, ObjectExpression: true, Property: true,
    FunctionExpression: true, SequenceExpression: true, UnaryExpression: true,
    BinaryExpression: true, AssignmentExpression: true, UpdateExpression: true,
    ConditionalExpression: true, CallExpression: true,
    StaticMemberExpression: true, ComputedMemberExpression: true,
    IdentifierExpression: true, LiteralExpression: true,
    LiteralRegExpExpression: true,
};

function name(value: string): S.Name {
    return new S.Name({value});
}

function id(value: string): S.IdentifierExpression {
    return new S.IdentifierExpression({name: name(value)});
}

function lit(value: S.LiteralValue): S.LiteralExpression {
    return new S.LiteralExpression({value});
}

function block(...body: Array<S.Statement>): S.BlockStatement {
    return new S.BlockStatement({body});
}

// A tree holding at least one node of every type.
function everyVariant(): S.Programs {
    const fn = new S.FunctionNode({name: name('f'), params: [name('a')], body: block(
        new S.EmptyStatement(),
        new S.IfStatement({
            condition: id('a'),
            then: new S.ReturnStatement({argument: new S.ThisExpression()}),
        }),
        new S.LabeledStatement({label: name('outer'), body: new S.WhileStatement({
            condition: lit(true),
            body: block(new S.BreakStatement({label: name('outer')}), new S.ContinueStatement()),
        })}),
        new S.WithStatement({object: id('o'), body: new S.EmptyStatement()}),
        new S.SwitchStatement({argument: id('a'), cases: [
            new S.SwitchCase({expression: lit(1), body: [new S.BreakStatement()]}),
            S.SwitchCase.defaultCase([]),
        ]}),
        new S.TryStatement({
            block: block(new S.ThrowStatement({
                argument: new S.LiteralRegExpExpression({regexp: '/x/g'}),
            })),
            handler: new S.CatchClause({param: name('e'), body: block()}),
            finalizer: block(new S.DebuggerStatement()),
        }),
        new S.DoWhileStatement({body: new S.EmptyStatement(), condition: lit(false)}),
        new S.ForStatement({
            init: new S.VariableDeclaration({declarations: [
                new S.VariableDeclarator({name: name('i'), init: lit(0)}),
            ]}),
            condition: new S.BinaryExpression({
                left: id('i'), operator: S.BinaryOperator.Less, right: lit(3),
            }),
            update: S.UpdateExpression.prefix(S.UpdateOperator.Incr, id('i')),
            body: new S.EmptyStatement(),
        }),
        new S.ForInStatement({
            left: id('k'),
            right: new S.ObjectExpression({properties: [
                new S.Property({key: name('p'), value: lit(null)}),
                new S.Property({
                    key: lit('q'),
                    value: new S.FunctionNode({params: [], body: block()}),
                    kind: 'get',
                }),
            ]}),
            body: new S.EmptyStatement(),
        }),
    )});
    const expression = new S.SequenceExpression({expressions: [
        new S.AssignmentExpression({
            left: new S.StaticMemberExpression({object: id('o'), property: name('p')}),
            right: new S.ArrayExpression({elements: [lit(1), null]}),
        }),
        new S.UnaryExpression({
            operator: S.UnaryOperator.Typeof,
            argument: new S.ComputedMemberExpression({object: id('o'), property: lit('k')}),
        }),
        new S.ConditionalExpression({condition: id('a'), then: lit(1), otherwise: lit(2)}),
        new S.CallExpression({
            callee: new S.FunctionExpression({
                function: new S.FunctionNode({params: [], body: block()}),
            }),
            arguments: [new S.ArrowFunctionNode({
                params: [name('x')],
                body: new S.ReturnStatement({argument: id('x')}),
            })],
        }),
    ]});
    return new S.Programs({programs: [new S.Program({filename: 'all.js', body: [
        new S.FunctionDeclaration({function: fn}),
        new S.ExpressionStatement({expression}),
    ]})]});
}

// Answers with the name of the handler it was routed to.
class HandlerName implements Visitor<string> {
    visitPrograms(node: S.Programs) { return 'Programs'; }
    visitProgram(node: S.Program) { return 'Program'; }
    visitFunctionNode(node: S.FunctionNode) { return 'FunctionNode'; }
    visitArrowFunctionNode(node: S.ArrowFunctionNode) { return 'ArrowFunctionNode'; }
    visitName(node: S.Name) { return 'Name'; }
    visitEmptyStatement(node: S.EmptyStatement) { return 'EmptyStatement'; }
    visitBlockStatement(node: S.BlockStatement) { return 'BlockStatement'; }
    visitExpressionStatement(node: S.ExpressionStatement) { return 'ExpressionStatement'; }
    visitIfStatement(node: S.IfStatement) { return 'IfStatement'; }
    visitLabeledStatement(node: S.LabeledStatement) { return 'LabeledStatement'; }
    visitBreakStatement(node: S.BreakStatement) { return 'BreakStatement'; }
    visitContinueStatement(node: S.ContinueStatement) { return 'ContinueStatement'; }
    visitWithStatement(node: S.WithStatement) { return 'WithStatement'; }
    visitSwitchStatement(node: S.SwitchStatement) { return 'SwitchStatement'; }
    visitSwitchCase(node: S.SwitchCase) { return 'SwitchCase'; }
    visitReturnStatement(node: S.ReturnStatement) { return 'ReturnStatement'; }
    visitThrowStatement(node: S.ThrowStatement) { return 'ThrowStatement'; }
    visitTryStatement(node: S.TryStatement) { return 'TryStatement'; }
    visitCatchClause(node: S.CatchClause) { return 'CatchClause'; }
    visitWhileStatement(node: S.WhileStatement) { return 'WhileStatement'; }
    visitDoWhileStatement(node: S.DoWhileStatement) { return 'DoWhileStatement'; }
    visitForStatement(node: S.ForStatement) { return 'ForStatement'; }
    visitForInStatement(node: S.ForInStatement) { return 'ForInStatement'; }
    visitFunctionDeclaration(node: S.FunctionDeclaration) { return 'FunctionDeclaration'; }
    visitVariableDeclaration(node: S.VariableDeclaration) { return 'VariableDeclaration'; }
    visitVariableDeclarator(node: S.VariableDeclarator) { return 'VariableDeclarator'; }
    visitDebuggerStatement(node: S.DebuggerStatement) { return 'DebuggerStatement'; }
    visitThisExpression(node: S.ThisExpression) { return 'ThisExpression'; }
    visitArrayExpression(node: S.ArrayExpression) { return 'ArrayExpression'; }
    visitObjectExpression(node: S.ObjectExpression) { return 'ObjectExpression'; }
    visitProperty(node: S.Property) { return 'Property'; }
    visitFunctionExpression(node: S.FunctionExpression) { return 'FunctionExpression'; }
    visitSequenceExpression(node: S.SequenceExpression) { return 'SequenceExpression'; }
    visitUnaryExpression(node: S.UnaryExpression) { return 'UnaryExpression'; }
    visitBinaryExpression(node: S.BinaryExpression) { return 'BinaryExpression'; }
    visitAssignmentExpression(node: S.AssignmentExpression) { return 'AssignmentExpression'; }
    visitUpdateExpression(node: S.UpdateExpression) { return 'UpdateExpression'; }
    visitConditionalExpression(node: S.ConditionalExpression) { return 'ConditionalExpression'; }
    visitCallExpression(node: S.CallExpression) { return 'CallExpression'; }
    visitStaticMemberExpression(node: S.StaticMemberExpression) { return 'StaticMemberExpression'; }
    visitComputedMemberExpression(node: S.ComputedMemberExpression) { return 'ComputedMemberExpression'; }
    visitIdentifierExpression(node: S.IdentifierExpression) { return 'IdentifierExpression'; }
    visitLiteralExpression(node: S.LiteralExpression) { return 'LiteralExpression'; }
    visitLiteralRegExpExpression(node: S.LiteralRegExpExpression) { return 'LiteralRegExpExpression'; }
}

// Appends the name of the handler it was routed to onto the argument.
class HandlerLog implements Visitor1<void, Array<string>> {
    visitPrograms(node: S.Programs, log: Array<string>) { log.push('Programs'); }
    visitProgram(node: S.Program, log: Array<string>) { log.push('Program'); }
    visitFunctionNode(node: S.FunctionNode, log: Array<string>) { log.push('FunctionNode'); }
    visitArrowFunctionNode(node: S.ArrowFunctionNode, log: Array<string>) { log.push('ArrowFunctionNode'); }
    visitName(node: S.Name, log: Array<string>) { log.push('Name'); }
    visitEmptyStatement(node: S.EmptyStatement, log: Array<string>) { log.push('EmptyStatement'); }
    visitBlockStatement(node: S.BlockStatement, log: Array<string>) { log.push('BlockStatement'); }
    visitExpressionStatement(node: S.ExpressionStatement, log: Array<string>) { log.push('ExpressionStatement'); }
    visitIfStatement(node: S.IfStatement, log: Array<string>) { log.push('IfStatement'); }
    visitLabeledStatement(node: S.LabeledStatement, log: Array<string>) { log.push('LabeledStatement'); }
    visitBreakStatement(node: S.BreakStatement, log: Array<string>) { log.push('BreakStatement'); }
    visitContinueStatement(node: S.ContinueStatement, log: Array<string>) { log.push('ContinueStatement'); }
    visitWithStatement(node: S.WithStatement, log: Array<string>) { log.push('WithStatement'); }
    visitSwitchStatement(node: S.SwitchStatement, log: Array<string>) { log.push('SwitchStatement'); }
    visitSwitchCase(node: S.SwitchCase, log: Array<string>) { log.push('SwitchCase'); }
    visitReturnStatement(node: S.ReturnStatement, log: Array<string>) { log.push('ReturnStatement'); }
    visitThrowStatement(node: S.ThrowStatement, log: Array<string>) { log.push('ThrowStatement'); }
    visitTryStatement(node: S.TryStatement, log: Array<string>) { log.push('TryStatement'); }
    visitCatchClause(node: S.CatchClause, log: Array<string>) { log.push('CatchClause'); }
    visitWhileStatement(node: S.WhileStatement, log: Array<string>) { log.push('WhileStatement'); }
    visitDoWhileStatement(node: S.DoWhileStatement, log: Array<string>) { log.push('DoWhileStatement'); }
    visitForStatement(node: S.ForStatement, log: Array<string>) { log.push('ForStatement'); }
    visitForInStatement(node: S.ForInStatement, log: Array<string>) { log.push('ForInStatement'); }
    visitFunctionDeclaration(node: S.FunctionDeclaration, log: Array<string>) { log.push('FunctionDeclaration'); }
    visitVariableDeclaration(node: S.VariableDeclaration, log: Array<string>) { log.push('VariableDeclaration'); }
    visitVariableDeclarator(node: S.VariableDeclarator, log: Array<string>) { log.push('VariableDeclarator'); }
    visitDebuggerStatement(node: S.DebuggerStatement, log: Array<string>) { log.push('DebuggerStatement'); }
    visitThisExpression(node: S.ThisExpression, log: Array<string>) { log.push('ThisExpression'); }
    visitArrayExpression(node: S.ArrayExpression, log: Array<string>) { log.push('ArrayExpression'); }
    visitObjectExpression(node: S.ObjectExpression, log: Array<string>) { log.push('ObjectExpression'); }
    visitProperty(node: S.Property, log: Array<string>) { log.push('Property'); }
    visitFunctionExpression(node: S.FunctionExpression, log: Array<string>) { log.push('FunctionExpression'); }
    visitSequenceExpression(node: S.SequenceExpression, log: Array<string>) { log.push('SequenceExpression'); }
    visitUnaryExpression(node: S.UnaryExpression, log: Array<string>) { log.push('UnaryExpression'); }
    visitBinaryExpression(node: S.BinaryExpression, log: Array<string>) { log.push('BinaryExpression'); }
    visitAssignmentExpression(node: S.AssignmentExpression, log: Array<string>) { log.push('AssignmentExpression'); }
    visitUpdateExpression(node: S.UpdateExpression, log: Array<string>) { log.push('UpdateExpression'); }
    visitConditionalExpression(node: S.ConditionalExpression, log: Array<string>) { log.push('ConditionalExpression'); }
    visitCallExpression(node: S.CallExpression, log: Array<string>) { log.push('CallExpression'); }
    visitStaticMemberExpression(node: S.StaticMemberExpression, log: Array<string>) { log.push('StaticMemberExpression'); }
    visitComputedMemberExpression(node: S.ComputedMemberExpression, log: Array<string>) { log.push('ComputedMemberExpression'); }
    visitIdentifierExpression(node: S.IdentifierExpression, log: Array<string>) { log.push('IdentifierExpression'); }
    visitLiteralExpression(node: S.LiteralExpression, log: Array<string>) { log.push('LiteralExpression'); }
    visitLiteralRegExpExpression(node: S.LiteralRegExpExpression, log: Array<string>) { log.push('LiteralRegExpExpression'); }
}

describe('accept', () => {
    it('should build a tree holding every node type', () => {
        const types = new Set(Array.from(pre_order(everyVariant()), node => node.type));
        expect(Array.from(types).sort()).to.deep.equal(Object.keys(ALL_TYPES).sort());
    });

    it('should route each node to the handler for its own type', () => {
        const nodes = Array.from(pre_order(everyVariant()));
        const visitor = new HandlerName();
        expect(nodes.map(node => node.accept(visitor))).to.deep.equal(nodes.map(node => node.type));
    });
});

describe('accept1', () => {
    it('should route each node to its handler and pass the argument along', () => {
        const nodes = Array.from(pre_order(everyVariant()));
        const log: Array<string> = [];
        const visitor = new HandlerLog();
        for (const node of nodes) {
            node.accept1(visitor, log);
        }
        expect(log).to.deep.equal(nodes.map(node => node.type));
    });
});

describe('BaseVisitor', () => {
    class NameOrOther extends BaseVisitor<string> {
        defaultNode(node: S.Node) {
            return 'other';
        }
        visitName(node: S.Name) {
            return node.value;
        }
    }

    it('should send handlers that are not overridden to defaultNode', () => {
        const v = new NameOrOther();
        expect(v.visit(new S.ThisExpression())).to.equal('other');
        expect(v.visit(name('n'))).to.equal('n');
    });
});

describe('RecursiveVisitor', () => {
    it('should walk the tree in the same order as pre_order', () => {
        const tree = everyVariant();
        const seen: Array<S.Node> = [];
        class Collect extends RecursiveVisitor {
            defaultNode(node: S.Node) {
                seen.push(node);
                super.defaultNode(node);
            }
        }
        new Collect().visit(tree);
        expect(seen).to.have.ordered.members(Array.from(pre_order(tree)));
    });

    it('should keep descending from overridden handlers that call defaultNode', () => {
        let functions = 0;
        class CountFunctions extends RecursiveVisitor {
            visitFunctionNode(node: S.FunctionNode) {
                functions++;
                this.defaultNode(node);
            }
        }
        new CountFunctions().visit(everyVariant());
        // The declared function, the getter and the function expression.
        expect(functions).to.equal(3);
    });
});

describe('RecursiveVisitor1', () => {
    it('should thread its argument to every node', () => {
        class CollectLabels extends RecursiveVisitor1<Array<string>> {
            visitName(node: S.Name, labels: Array<string>) {
                if (node.isLabel) {
                    labels.push(node.value);
                }
            }
        }
        const labels: Array<string> = [];
        new CollectLabels().visit(everyVariant(), labels);
        expect(labels).to.deep.equal(['outer', 'outer']);
    });
});
