import { describe, it } from 'mocha';
import { expect } from 'chai';

import * as S from './schema';
import { debugPrint, nodeStats } from './debug_print';
import { parseProgram } from './parse_js';

// a + 1;
function sample(): S.Program {
    const a = new S.Name({value: 'a'});
    const program = new S.Program({body: [
        new S.ExpressionStatement({expression: new S.BinaryExpression({
            left: new S.IdentifierExpression({name: a}),
            operator: S.BinaryOperator.Add,
            right: new S.LiteralExpression({value: 1, raw: '1'}),
        })}),
    ]});
    a.scope = program;
    return program;
}

describe('debugPrint', () => {
    it('should print one indented line per node', () => {
        expect(debugPrint(sample()).split('\n')).to.deep.equal([
            'Program',
            '  ExpressionStatement',
            '    BinaryExpression(+)',
            '      IdentifierExpression(a)',
            '        a -> Program',
            '      Lit(1)',
        ]);
    });

    it('should print parsed programs', () => {
        expect(debugPrint(parseProgram('f(x);'))).to.equal([
            'Program',
            '  ExpressionStatement',
            '    CallExpression',
            '      IdentifierExpression(f)',
            '        f',
            '      IdentifierExpression(x)',
            '        x',
        ].join('\n'));
    });

    it('should leave out array holes', () => {
        const array = new S.ArrayExpression({elements: [null, new S.ThisExpression()]});
        expect(debugPrint(array)).to.equal('ArrayExpression\n  ThisExpression');
    });
});

describe('nodeStats', () => {
    it('should count nodes by type in sorted order', () => {
        expect(nodeStats(sample())).to.deep.equal([
            ['BinaryExpression', 1],
            ['ExpressionStatement', 1],
            ['IdentifierExpression', 1],
            ['LiteralExpression', 1],
            ['Name', 1],
            ['Program', 1],
        ]);
    });

    it('should add up repeated types', () => {
        const stats = nodeStats(parseProgram('a; b; c;'));
        expect(stats).to.deep.equal([
            ['ExpressionStatement', 3],
            ['IdentifierExpression', 3],
            ['Name', 3],
            ['Program', 1],
        ]);
    });
});
