import { describe, it } from 'mocha';
import { expect } from 'chai';
import { AssertionError } from 'assert';

import * as S from './schema';
import { attach, checkTree, detach, replaceNode, rewriteAst, setParentPointers } from './ast_util';

function id(value: string): S.IdentifierExpression {
    return new S.IdentifierExpression({name: new S.Name({value})});
}

function num(value: number): S.LiteralExpression {
    return new S.LiteralExpression({value});
}

function add(left: S.Expression, right: S.Expression): S.BinaryExpression {
    return new S.BinaryExpression({left, operator: S.BinaryOperator.Add, right});
}

// Folds additions and multiplications of two number literals.
function fold(node: S.Node): S.Node {
    if (node instanceof S.BinaryExpression &&
        node.left instanceof S.LiteralExpression && node.left.isNumber &&
        node.right instanceof S.LiteralExpression && node.right.isNumber)
    {
        const left = node.left.numberValue;
        const right = node.right.numberValue;
        switch (node.operator) {
          case S.BinaryOperator.Add:
            return num(left + right);
          case S.BinaryOperator.Mul:
            return num(left * right);
        }
    }
    return node;
}

describe('replaceNode', () => {
    it('should replace a node held in a field', () => {
        const a = id('a');
        const sum = add(a, num(1));
        const b = id('b');
        expect(replaceNode(a, b)).to.equal(b);
        expect(sum.left).to.equal(b);
        expect(b.parent).to.equal(sum);
        expect(a.parent).to.equal(null);
        checkTree(sum);
    });

    it('should replace a node held in a list', () => {
        const first = new S.EmptyStatement();
        const second = new S.EmptyStatement();
        const program = new S.Program({body: [first, second]});
        const debug = new S.DebuggerStatement();
        replaceNode(second, debug);
        expect(program.body).to.have.ordered.members([first, debug]);
        expect(debug.parent).to.equal(program);
        checkTree(program);
    });

    it('should refuse an orphan', () => {
        expect(() => replaceNode(new S.ThisExpression(), new S.ThisExpression()))
            .to.throw(AssertionError, 'ThisExpression has no parent');
    });

    it('should refuse a node its parent does not hold', () => {
        const program = new S.Program({body: []});
        const stray = attach(program, new S.EmptyStatement());
        expect(stray.parent).to.equal(program);
        expect(() => replaceNode(stray, new S.EmptyStatement()))
            .to.throw(AssertionError, 'EmptyStatement is not a child of its parent Program');
    });

    it('should refuse a replacement that encloses the node', () => {
        const a = id('a');
        const sum = add(a, num(1));
        const stmt = new S.ExpressionStatement({expression: sum});
        expect(() => replaceNode(a, sum))
            .to.throw(AssertionError, 'BinaryExpression(+) encloses IdentifierExpression(a) and cannot replace it');
        expect(() => replaceNode(a, stmt))
            .to.throw(AssertionError, 'ExpressionStatement encloses IdentifierExpression(a) and cannot replace it');
        expect(sum.left).to.equal(a);
        checkTree(stmt);
    });

    it('should move a node out of the list that held it', () => {
        const target = new S.EmptyStatement();
        const block = new S.BlockStatement({body: [target]});
        const first = new S.ExpressionStatement({expression: id('a')});
        const moved = new S.DebuggerStatement();
        const program = new S.Program({body: [first, moved]});
        replaceNode(target, moved);
        expect(block.body).to.have.ordered.members([moved]);
        expect(program.body).to.have.ordered.members([first]);
        expect(moved.parent).to.equal(block);
        checkTree(block);
        checkTree(program);
    });

    it('should move a node within the list that holds it', () => {
        const p = new S.EmptyStatement();
        const q = new S.DebuggerStatement();
        const r = new S.ExpressionStatement({expression: id('r')});
        const program = new S.Program({body: [p, q, r]});
        replaceNode(p, r);
        expect(program.body).to.have.ordered.members([r, q]);
        expect(p.parent).to.equal(null);
        checkTree(program);
    });

    it('should not move a node out of a required slot', () => {
        const x = id('x');
        const y = id('y');
        const s1 = new S.ExpressionStatement({expression: x});
        const s2 = new S.ExpressionStatement({expression: y});
        const program = new S.Program({body: [s1, s2]});
        expect(() => replaceNode(x, y))
            .to.throw(AssertionError, 'ExpressionStatement.expression cannot be left empty');
        expect(s1.expression).to.equal(x);
        expect(s2.expression).to.equal(y);
        checkTree(program);
    });
});

describe('detach', () => {
    it('should remove a list element', () => {
        const first = new S.EmptyStatement();
        const second = new S.DebuggerStatement();
        const program = new S.Program({body: [first, second]});
        detach(first);
        expect(program.body).to.have.ordered.members([second]);
        expect(first.parent).to.equal(null);
    });

    it('should empty an optional slot', () => {
        const otherwise = new S.EmptyStatement();
        const stmt = new S.IfStatement({condition: id('c'), then: new S.EmptyStatement(), otherwise});
        detach(otherwise);
        expect(stmt.otherwise).to.equal(null);
        expect(otherwise.parent).to.equal(null);
        checkTree(stmt);
    });

    it('should refuse to empty a required slot', () => {
        const condition = id('c');
        const stmt = new S.IfStatement({condition, then: new S.EmptyStatement()});
        expect(() => detach(condition))
            .to.throw(AssertionError, 'IfStatement.condition cannot be left empty');
        expect(stmt.condition).to.equal(condition);
        expect(condition.parent).to.equal(stmt);
    });

    it('should keep a try statement with a catch clause or a finally block', () => {
        const handler = new S.CatchClause({param: new S.Name({value: 'e'}),
                                           body: new S.BlockStatement({body: []})});
        const finalizer = new S.BlockStatement({body: []});
        const stmt = new S.TryStatement({block: new S.BlockStatement({body: []}), handler, finalizer});
        detach(handler);
        expect(stmt.handler).to.equal(null);
        expect(() => detach(finalizer))
            .to.throw(AssertionError, 'try statement needs a catch clause or a finally block');
    });
});

describe('setParentPointers', () => {
    it('should repair pointers after raw field assignment', () => {
        const stmt = new S.ExpressionStatement({expression: id('a')});
        const program = new S.Program({body: [stmt]});
        const sum = add(id('b'), num(2));
        stmt.expression = sum;
        expect(sum.parent).to.equal(null);
        setParentPointers(program);
        expect(sum.parent).to.equal(stmt);
        checkTree(program);
    });
});

describe('checkTree', () => {
    it('should report a child whose parent pointer is wrong', () => {
        const sum = add(id('a'), num(1));
        sum.left = id('b');
        expect(() => checkTree(sum))
            .to.throw('IdentifierExpression(b) is a child of BinaryExpression(+) but has parent null');
    });

    it('should report a node reachable twice', () => {
        const one = num(1);
        const array = new S.ArrayExpression({elements: [one, one]});
        expect(() => checkTree(array)).to.throw('Lit(1) is reachable twice');
    });

    it('should accept a tree built by constructors', () => {
        const program = new S.Program({body: [
            new S.ExpressionStatement({expression: add(id('a'), num(1))}),
        ]});
        expect(() => checkTree(program)).not.to.throw();
    });
});

describe('rewriteAst', () => {
    it('should rewrite children before their parents', () => {
        // (1 + 2) * 3;
        const product = new S.BinaryExpression({
            left: add(num(1), num(2)),
            operator: S.BinaryOperator.Mul,
            right: num(3),
        });
        const stmt = new S.ExpressionStatement({expression: product});
        expect(rewriteAst(stmt, fold)).to.equal(stmt);
        expect(stmt.expression).to.be.instanceOf(S.LiteralExpression);
        expect(stmt.expression.type === 'LiteralExpression' && stmt.expression.value).to.equal(9);
        expect(stmt.expression.parent).to.equal(stmt);
        checkTree(stmt);
    });

    it('should return the replacement of the root', () => {
        const result = rewriteAst(add(num(4), num(5)), fold);
        expect(result).to.be.instanceOf(S.LiteralExpression);
        expect(result.parent).to.equal(null);
        expect(result.toString()).to.equal('Lit(9)');
    });

    it('should put a wrapper where the wrapped node was', () => {
        const a = id('a');
        const stmt = new S.ExpressionStatement({expression: a});
        rewriteAst(stmt, node => node instanceof S.IdentifierExpression
            ? new S.UnaryExpression({operator: S.UnaryOperator.LogicalNot, argument: node})
            : node);
        const negation = stmt.expression;
        if (!(negation instanceof S.UnaryExpression)) {
            throw new Error(`expected a unary expression, got ${negation}`);
        }
        expect(negation.argument).to.equal(a);
        expect(a.parent).to.equal(negation);
        expect(negation.parent).to.equal(stmt);
        checkTree(stmt);
    });

    it('should return a wrapper of the root', () => {
        const a = id('a');
        const result = rewriteAst(a, node => node === a
            ? new S.UnaryExpression({operator: S.UnaryOperator.Neg, argument: a})
            : node);
        expect(result.toString()).to.equal('UnaryExpression');
        expect(result.parent).to.equal(null);
        expect(a.parent).to.equal(result);
        checkTree(result);
    });

    it('should leave nodes alone when the function returns them', () => {
        const sum = add(id('a'), num(1));
        const left = sum.left;
        expect(rewriteAst(sum, fold)).to.equal(sum);
        expect(sum.left).to.equal(left);
    });
});
