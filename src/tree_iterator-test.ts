import { describe, it } from 'mocha';
import { expect } from 'chai';
import { AssertionError } from 'assert';

import * as S from './schema';
import { DfsIter, IterKind, childrenOf, post_order, pre_order } from './tree_iterator';

// a + 1; return;
function sample(): S.Program {
    return new S.Program({body: [
        new S.ExpressionStatement({expression: new S.BinaryExpression({
            left: new S.IdentifierExpression({name: new S.Name({value: 'a'})}),
            operator: S.BinaryOperator.Add,
            right: new S.LiteralExpression({value: 1}),
        })}),
        new S.ReturnStatement(),
    ]});
}

describe('childrenOf', () => {
    it('should list immediate children in source order', () => {
        const program = sample();
        expect(childrenOf(program)).to.have.ordered.members(program.body);
        expect(childrenOf(new S.ReturnStatement())).to.deep.equal([]);
    });
});

describe('pre_order', () => {
    it('should yield parents before children', () => {
        const types = Array.from(pre_order(sample()), node => node.type);
        expect(types).to.deep.equal([
            'Program',
            'ExpressionStatement',
            'BinaryExpression',
            'IdentifierExpression',
            'Name',
            'LiteralExpression',
            'ReturnStatement',
        ]);
    });
});

describe('post_order', () => {
    it('should yield children before parents', () => {
        const types = Array.from(post_order(sample()), node => node.type);
        expect(types).to.deep.equal([
            'Name',
            'IdentifierExpression',
            'LiteralExpression',
            'BinaryExpression',
            'ExpressionStatement',
            'ReturnStatement',
            'Program',
        ]);
    });

    it('should yield a leaf root alone', () => {
        const leaf = new S.ThisExpression();
        expect(Array.from(post_order(leaf))).to.have.ordered.members([leaf]);
    });
});

describe('DfsIter', () => {
    it('should visit every node with its depth when always stepping', () => {
        const iter = new DfsIter(sample());
        const seen: Array<string> = [];
        for (let result = iter.next(); !result.isDone(); result = iter.next()) {
            seen.push(`${result.depth} ${result.getChild().type}`);
            iter.step();
        }
        expect(seen).to.deep.equal([
            '0 Program',
            '1 ExpressionStatement',
            '2 BinaryExpression',
            '3 IdentifierExpression',
            '4 Name',
            '3 LiteralExpression',
            '1 ReturnStatement',
        ]);
    });

    it('should skip the subtree of a node that is cut', () => {
        const iter = new DfsIter(sample());
        const seen: Array<string> = [];
        let result = iter.next();
        while (result.isChild()) {
            const node = result.getChild();
            seen.push(node.type);
            if (node instanceof S.BinaryExpression) {
                iter.cut();
            } else {
                iter.step();
            }
            result = iter.next();
        }
        expect(seen).to.deep.equal([
            'Program',
            'ExpressionStatement',
            'BinaryExpression',
            'ReturnStatement',
        ]);
        expect(result.kind).to.equal(IterKind.Done);
        expect(result.stepNo).to.equal(4);
    });

    it('should number steps from zero', () => {
        const iter = new DfsIter(sample());
        expect(iter.next().stepNo).to.equal(0);
        iter.step();
        expect(iter.next().stepNo).to.equal(1);
    });

    it('should enforce the next/step protocol', () => {
        const iter = new DfsIter(sample());
        expect(() => iter.step()).to.throw(AssertionError, 'step() without next()');
        expect(() => iter.cut()).to.throw(AssertionError, 'cut() without next()');
        iter.next();
        expect(() => iter.next()).to.throw(AssertionError, 'step() or cut() must follow next()');
    });

    it('should refuse to hand out a node from a Done result', () => {
        const iter = new DfsIter(new S.ThisExpression());
        iter.next();
        iter.cut();
        const done = iter.next();
        expect(done.isDone()).to.equal(true);
        expect(() => done.getChild()).to.throw(AssertionError, 'not a child entry');
    });
});
