"use strict";

import type * as S from './schema';

/**
 * One handler per node class. A node's `accept` calls the handler named
 * after its class, so implementing this interface means handling every
 * variant; a missing handler is a compile error.
 */
export interface Visitor<T> {
    visitPrograms(node: S.Programs): T;
    visitProgram(node: S.Program): T;
    visitFunctionNode(node: S.FunctionNode): T;
    visitArrowFunctionNode(node: S.ArrowFunctionNode): T;
    visitName(node: S.Name): T;
    visitEmptyStatement(node: S.EmptyStatement): T;
    visitBlockStatement(node: S.BlockStatement): T;
    visitExpressionStatement(node: S.ExpressionStatement): T;
    visitIfStatement(node: S.IfStatement): T;
    visitLabeledStatement(node: S.LabeledStatement): T;
    visitBreakStatement(node: S.BreakStatement): T;
    visitContinueStatement(node: S.ContinueStatement): T;
    visitWithStatement(node: S.WithStatement): T;
    visitSwitchStatement(node: S.SwitchStatement): T;
    visitSwitchCase(node: S.SwitchCase): T;
    visitReturnStatement(node: S.ReturnStatement): T;
    visitThrowStatement(node: S.ThrowStatement): T;
    visitTryStatement(node: S.TryStatement): T;
    visitCatchClause(node: S.CatchClause): T;
    visitWhileStatement(node: S.WhileStatement): T;
    visitDoWhileStatement(node: S.DoWhileStatement): T;
    visitForStatement(node: S.ForStatement): T;
    visitForInStatement(node: S.ForInStatement): T;
    visitFunctionDeclaration(node: S.FunctionDeclaration): T;
    visitVariableDeclaration(node: S.VariableDeclaration): T;
    visitVariableDeclarator(node: S.VariableDeclarator): T;
    visitDebuggerStatement(node: S.DebuggerStatement): T;
    visitThisExpression(node: S.ThisExpression): T;
    visitArrayExpression(node: S.ArrayExpression): T;
    visitObjectExpression(node: S.ObjectExpression): T;
    visitProperty(node: S.Property): T;
    visitFunctionExpression(node: S.FunctionExpression): T;
    visitSequenceExpression(node: S.SequenceExpression): T;
    visitUnaryExpression(node: S.UnaryExpression): T;
    visitBinaryExpression(node: S.BinaryExpression): T;
    visitAssignmentExpression(node: S.AssignmentExpression): T;
    visitUpdateExpression(node: S.UpdateExpression): T;
    visitConditionalExpression(node: S.ConditionalExpression): T;
    visitCallExpression(node: S.CallExpression): T;
    visitStaticMemberExpression(node: S.StaticMemberExpression): T;
    visitComputedMemberExpression(node: S.ComputedMemberExpression): T;
    visitIdentifierExpression(node: S.IdentifierExpression): T;
    visitLiteralExpression(node: S.LiteralExpression): T;
    visitLiteralRegExpExpression(node: S.LiteralRegExpExpression): T;
}

// As `Visitor`, with one extra argument threaded through every handler.
export interface Visitor1<T, A> {
    visitPrograms(node: S.Programs, arg: A): T;
    visitProgram(node: S.Program, arg: A): T;
    visitFunctionNode(node: S.FunctionNode, arg: A): T;
    visitArrowFunctionNode(node: S.ArrowFunctionNode, arg: A): T;
    visitName(node: S.Name, arg: A): T;
    visitEmptyStatement(node: S.EmptyStatement, arg: A): T;
    visitBlockStatement(node: S.BlockStatement, arg: A): T;
    visitExpressionStatement(node: S.ExpressionStatement, arg: A): T;
    visitIfStatement(node: S.IfStatement, arg: A): T;
    visitLabeledStatement(node: S.LabeledStatement, arg: A): T;
    visitBreakStatement(node: S.BreakStatement, arg: A): T;
    visitContinueStatement(node: S.ContinueStatement, arg: A): T;
    visitWithStatement(node: S.WithStatement, arg: A): T;
    visitSwitchStatement(node: S.SwitchStatement, arg: A): T;
    visitSwitchCase(node: S.SwitchCase, arg: A): T;
    visitReturnStatement(node: S.ReturnStatement, arg: A): T;
    visitThrowStatement(node: S.ThrowStatement, arg: A): T;
    visitTryStatement(node: S.TryStatement, arg: A): T;
    visitCatchClause(node: S.CatchClause, arg: A): T;
    visitWhileStatement(node: S.WhileStatement, arg: A): T;
    visitDoWhileStatement(node: S.DoWhileStatement, arg: A): T;
    visitForStatement(node: S.ForStatement, arg: A): T;
    visitForInStatement(node: S.ForInStatement, arg: A): T;
    visitFunctionDeclaration(node: S.FunctionDeclaration, arg: A): T;
    visitVariableDeclaration(node: S.VariableDeclaration, arg: A): T;
    visitVariableDeclarator(node: S.VariableDeclarator, arg: A): T;
    visitDebuggerStatement(node: S.DebuggerStatement, arg: A): T;
    visitThisExpression(node: S.ThisExpression, arg: A): T;
    visitArrayExpression(node: S.ArrayExpression, arg: A): T;
    visitObjectExpression(node: S.ObjectExpression, arg: A): T;
    visitProperty(node: S.Property, arg: A): T;
    visitFunctionExpression(node: S.FunctionExpression, arg: A): T;
    visitSequenceExpression(node: S.SequenceExpression, arg: A): T;
    visitUnaryExpression(node: S.UnaryExpression, arg: A): T;
    visitBinaryExpression(node: S.BinaryExpression, arg: A): T;
    visitAssignmentExpression(node: S.AssignmentExpression, arg: A): T;
    visitUpdateExpression(node: S.UpdateExpression, arg: A): T;
    visitConditionalExpression(node: S.ConditionalExpression, arg: A): T;
    visitCallExpression(node: S.CallExpression, arg: A): T;
    visitStaticMemberExpression(node: S.StaticMemberExpression, arg: A): T;
    visitComputedMemberExpression(node: S.ComputedMemberExpression, arg: A): T;
    visitIdentifierExpression(node: S.IdentifierExpression, arg: A): T;
    visitLiteralExpression(node: S.LiteralExpression, arg: A): T;
    visitLiteralRegExpExpression(node: S.LiteralRegExpExpression, arg: A): T;
}

/**
 * Routes every handler to `defaultNode`. Subclasses override the handlers
 * for the variants they care about.
 */
export abstract class BaseVisitor<T> implements Visitor<T> {
    abstract defaultNode(node: S.Node): T;

    visit(node: S.Node): T {
        return node.accept(this);
    }

    visitPrograms(node: S.Programs): T { return this.defaultNode(node); }
    visitProgram(node: S.Program): T { return this.defaultNode(node); }
    visitFunctionNode(node: S.FunctionNode): T { return this.defaultNode(node); }
    visitArrowFunctionNode(node: S.ArrowFunctionNode): T { return this.defaultNode(node); }
    visitName(node: S.Name): T { return this.defaultNode(node); }
    visitEmptyStatement(node: S.EmptyStatement): T { return this.defaultNode(node); }
    visitBlockStatement(node: S.BlockStatement): T { return this.defaultNode(node); }
    visitExpressionStatement(node: S.ExpressionStatement): T { return this.defaultNode(node); }
    visitIfStatement(node: S.IfStatement): T { return this.defaultNode(node); }
    visitLabeledStatement(node: S.LabeledStatement): T { return this.defaultNode(node); }
    visitBreakStatement(node: S.BreakStatement): T { return this.defaultNode(node); }
    visitContinueStatement(node: S.ContinueStatement): T { return this.defaultNode(node); }
    visitWithStatement(node: S.WithStatement): T { return this.defaultNode(node); }
    visitSwitchStatement(node: S.SwitchStatement): T { return this.defaultNode(node); }
    visitSwitchCase(node: S.SwitchCase): T { return this.defaultNode(node); }
    visitReturnStatement(node: S.ReturnStatement): T { return this.defaultNode(node); }
    visitThrowStatement(node: S.ThrowStatement): T { return this.defaultNode(node); }
    visitTryStatement(node: S.TryStatement): T { return this.defaultNode(node); }
    visitCatchClause(node: S.CatchClause): T { return this.defaultNode(node); }
    visitWhileStatement(node: S.WhileStatement): T { return this.defaultNode(node); }
    visitDoWhileStatement(node: S.DoWhileStatement): T { return this.defaultNode(node); }
    visitForStatement(node: S.ForStatement): T { return this.defaultNode(node); }
    visitForInStatement(node: S.ForInStatement): T { return this.defaultNode(node); }
    visitFunctionDeclaration(node: S.FunctionDeclaration): T { return this.defaultNode(node); }
    visitVariableDeclaration(node: S.VariableDeclaration): T { return this.defaultNode(node); }
    visitVariableDeclarator(node: S.VariableDeclarator): T { return this.defaultNode(node); }
    visitDebuggerStatement(node: S.DebuggerStatement): T { return this.defaultNode(node); }
    visitThisExpression(node: S.ThisExpression): T { return this.defaultNode(node); }
    visitArrayExpression(node: S.ArrayExpression): T { return this.defaultNode(node); }
    visitObjectExpression(node: S.ObjectExpression): T { return this.defaultNode(node); }
    visitProperty(node: S.Property): T { return this.defaultNode(node); }
    visitFunctionExpression(node: S.FunctionExpression): T { return this.defaultNode(node); }
    visitSequenceExpression(node: S.SequenceExpression): T { return this.defaultNode(node); }
    visitUnaryExpression(node: S.UnaryExpression): T { return this.defaultNode(node); }
    visitBinaryExpression(node: S.BinaryExpression): T { return this.defaultNode(node); }
    visitAssignmentExpression(node: S.AssignmentExpression): T { return this.defaultNode(node); }
    visitUpdateExpression(node: S.UpdateExpression): T { return this.defaultNode(node); }
    visitConditionalExpression(node: S.ConditionalExpression): T { return this.defaultNode(node); }
    visitCallExpression(node: S.CallExpression): T { return this.defaultNode(node); }
    visitStaticMemberExpression(node: S.StaticMemberExpression): T { return this.defaultNode(node); }
    visitComputedMemberExpression(node: S.ComputedMemberExpression): T { return this.defaultNode(node); }
    visitIdentifierExpression(node: S.IdentifierExpression): T { return this.defaultNode(node); }
    visitLiteralExpression(node: S.LiteralExpression): T { return this.defaultNode(node); }
    visitLiteralRegExpExpression(node: S.LiteralRegExpExpression): T { return this.defaultNode(node); }
}

export abstract class BaseVisitor1<T, A> implements Visitor1<T, A> {
    abstract defaultNode(node: S.Node, arg: A): T;

    visit(node: S.Node, arg: A): T {
        return node.accept1(this, arg);
    }

    visitPrograms(node: S.Programs, arg: A): T { return this.defaultNode(node, arg); }
    visitProgram(node: S.Program, arg: A): T { return this.defaultNode(node, arg); }
    visitFunctionNode(node: S.FunctionNode, arg: A): T { return this.defaultNode(node, arg); }
    visitArrowFunctionNode(node: S.ArrowFunctionNode, arg: A): T { return this.defaultNode(node, arg); }
    visitName(node: S.Name, arg: A): T { return this.defaultNode(node, arg); }
    visitEmptyStatement(node: S.EmptyStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitBlockStatement(node: S.BlockStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitExpressionStatement(node: S.ExpressionStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitIfStatement(node: S.IfStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitLabeledStatement(node: S.LabeledStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitBreakStatement(node: S.BreakStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitContinueStatement(node: S.ContinueStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitWithStatement(node: S.WithStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitSwitchStatement(node: S.SwitchStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitSwitchCase(node: S.SwitchCase, arg: A): T { return this.defaultNode(node, arg); }
    visitReturnStatement(node: S.ReturnStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitThrowStatement(node: S.ThrowStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitTryStatement(node: S.TryStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitCatchClause(node: S.CatchClause, arg: A): T { return this.defaultNode(node, arg); }
    visitWhileStatement(node: S.WhileStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitDoWhileStatement(node: S.DoWhileStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitForStatement(node: S.ForStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitForInStatement(node: S.ForInStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitFunctionDeclaration(node: S.FunctionDeclaration, arg: A): T { return this.defaultNode(node, arg); }
    visitVariableDeclaration(node: S.VariableDeclaration, arg: A): T { return this.defaultNode(node, arg); }
    visitVariableDeclarator(node: S.VariableDeclarator, arg: A): T { return this.defaultNode(node, arg); }
    visitDebuggerStatement(node: S.DebuggerStatement, arg: A): T { return this.defaultNode(node, arg); }
    visitThisExpression(node: S.ThisExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitArrayExpression(node: S.ArrayExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitObjectExpression(node: S.ObjectExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitProperty(node: S.Property, arg: A): T { return this.defaultNode(node, arg); }
    visitFunctionExpression(node: S.FunctionExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitSequenceExpression(node: S.SequenceExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitUnaryExpression(node: S.UnaryExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitBinaryExpression(node: S.BinaryExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitAssignmentExpression(node: S.AssignmentExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitUpdateExpression(node: S.UpdateExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitConditionalExpression(node: S.ConditionalExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitCallExpression(node: S.CallExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitStaticMemberExpression(node: S.StaticMemberExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitComputedMemberExpression(node: S.ComputedMemberExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitIdentifierExpression(node: S.IdentifierExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitLiteralExpression(node: S.LiteralExpression, arg: A): T { return this.defaultNode(node, arg); }
    visitLiteralRegExpExpression(node: S.LiteralRegExpExpression, arg: A): T { return this.defaultNode(node, arg); }
}

// Walks the whole subtree. Override a handler to intercept a variant, and
// call `defaultNode` from it to keep descending.
export class RecursiveVisitor extends BaseVisitor<void> {
    defaultNode(node: S.Node): void {
        node.forEach(child => {
            this.visit(child);
        });
    }
}

// As `RecursiveVisitor`, passing the same argument down to every child.
export class RecursiveVisitor1<A> extends BaseVisitor1<void, A> {
    defaultNode(node: S.Node, arg: A): void {
        node.forEach(child => {
            this.visit(child, arg);
        });
    }
}
