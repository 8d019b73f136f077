import { AssertionError } from 'assert';

import { describe, it } from 'mocha';
import { expect } from 'chai';

import * as S from './schema';

function name(value: string): S.Name {
    return new S.Name({value});
}

function id(value: string): S.IdentifierExpression {
    return new S.IdentifierExpression({name: name(value)});
}

function num(value: number): S.LiteralExpression {
    return new S.LiteralExpression({value, raw: String(value)});
}

function children(node: S.Node): Array<S.Node> {
    const result: Array<S.Node> = [];
    node.forEach(child => result.push(child));
    return result;
}

describe('Node construction', () => {
    it('should point every child at the node built from it', () => {
        const condition = id('a');
        const then = new S.ExpressionStatement({expression: id('b')});
        const otherwise = new S.EmptyStatement();
        const node = new S.IfStatement({condition, then, otherwise});
        for (const child of children(node)) {
            expect(child.parent).to.equal(node);
        }
        expect(children(node)).to.deep.equal([condition, then, otherwise]);
    });

    it('should leave fresh nodes orphaned', () => {
        const node = new S.ThisExpression();
        expect(node.parent).to.equal(null);
        expect(node.start).to.equal(null);
        expect(node.end).to.equal(null);
        expect(node.line).to.equal(null);
    });

    it('should tag each node with its class name', () => {
        expect(new S.DebuggerStatement().type).to.equal('DebuggerStatement');
        expect(new S.Programs({programs: []}).type).to.equal('Programs');
        expect(id('x').type).to.equal('IdentifierExpression');
    });

    it('should refuse a try statement with neither catch nor finally', () => {
        const block = new S.BlockStatement({body: []});
        expect(() => new S.TryStatement({block})).to.throw(
            AssertionError, 'try statement needs a catch clause or a finally block');
    });

    it('should accept a try statement with only a finally block', () => {
        const node = new S.TryStatement({
            block: new S.BlockStatement({body: []}),
            finalizer: new S.BlockStatement({body: []}),
        });
        expect(node.handler).to.equal(null);
        expect(children(node)).to.deep.equal([node.block, node.finalizer]);
    });
});

describe('forEach', () => {
    it('should visit for loop parts in source order', () => {
        const init = new S.VariableDeclaration({declarations: [
            new S.VariableDeclarator({name: name('i'), init: num(0)}),
        ]});
        const condition = new S.BinaryExpression({
            left: id('i'), operator: S.BinaryOperator.Less, right: id('n'),
        });
        const update = S.UpdateExpression.postfix(S.UpdateOperator.Incr, id('i'));
        const body = new S.ExpressionStatement({expression: new S.CallExpression({
            callee: id('f'), arguments: [id('i')],
        })});
        const node = new S.ForStatement({init, condition, update, body});
        expect(children(node)).to.deep.equal([init, condition, update, body]);
        // Repeated enumeration gives the same order.
        expect(children(node)).to.deep.equal(children(node));
    });

    it('should skip the parts of a for loop that are absent', () => {
        const body = new S.EmptyStatement();
        const node = new S.ForStatement({body});
        expect(children(node)).to.deep.equal([body]);
    });

    it('should not call back for a bare return', () => {
        let calls = 0;
        new S.ReturnStatement().forEach(() => calls++);
        expect(calls).to.equal(0);
    });

    it('should call back once with the returned value', () => {
        const x = id('x');
        expect(children(new S.ReturnStatement({argument: x}))).to.deep.equal([x]);
    });

    it('should skip array holes but keep them in the elements', () => {
        const one = num(1);
        const three = num(3);
        const array = new S.ArrayExpression({elements: [one, null, three]});
        expect(array.elements.length).to.equal(3);
        expect(array.elements[1]).to.equal(null);
        expect(children(array)).to.deep.equal([one, three]);
    });

    it('should visit a function name, its parameters, then its body', () => {
        const fname = name('f');
        const a = name('a');
        const b = name('b');
        const body = new S.BlockStatement({body: []});
        const fn = new S.FunctionNode({name: fname, params: [a, b], body});
        expect(children(fn)).to.deep.equal([fname, a, b, body]);
    });

    it('should visit a default case body without an expression', () => {
        const stmt = new S.BreakStatement();
        const node = S.SwitchCase.defaultCase([stmt]);
        expect(node.isDefault).to.equal(true);
        expect(children(node)).to.deep.equal([stmt]);
    });

    it('should visit the callee before the arguments', () => {
        const callee = id('f');
        const a = num(1);
        const b = num(2);
        const call = S.CallExpression.newCall(callee, [a, b]);
        expect(call.isNew).to.equal(true);
        expect(children(call)).to.deep.equal([callee, a, b]);
    });

    it('should visit the body of a do-while before its condition', () => {
        const body = new S.EmptyStatement();
        const condition = id('c');
        const node = new S.DoWhileStatement({body, condition});
        expect(children(node)).to.deep.equal([body, condition]);
    });
});

describe('Ancestor queries', () => {
    function nested() {
        const x = id('x');
        const ret = new S.ReturnStatement({argument: x});
        const fn = new S.FunctionNode({
            name: name('f'),
            params: [],
            body: new S.BlockStatement({body: [ret]}),
        });
        const program = new S.Program({
            filename: 'main.js',
            body: [new S.FunctionDeclaration({function: fn})],
        });
        return {x, ret, fn, program};
    }

    it('should find the enclosing function and program', () => {
        const {x, fn, program} = nested();
        expect(x.enclosingFunction).to.equal(fn);
        expect(x.enclosingProgram).to.equal(program);
        expect(x.name.enclosingFunction).to.equal(fn);
    });

    it('should count a node as enclosing itself', () => {
        const {fn, program} = nested();
        expect(fn.enclosingFunction).to.equal(fn);
        expect(program.enclosingProgram).to.equal(program);
    });

    it('should find no function at the top level', () => {
        const {program} = nested();
        expect(program.body[0].enclosingFunction).to.equal(null);
    });

    it('should find nothing above an orphan', () => {
        const orphan = id('y');
        expect(orphan.enclosingFunction).to.equal(null);
        expect(orphan.enclosingProgram).to.equal(null);
        expect(orphan.filename).to.equal(null);
    });

    it('should format the location from the program filename and the line', () => {
        const {ret} = nested();
        ret.line = 3;
        expect(ret.filename).to.equal('main.js');
        expect(ret.location).to.equal('main.js:3');
    });

    it('should find an arrow function body has no enclosing FunctionNode', () => {
        const x = id('x');
        new S.ArrowFunctionNode({params: [], body: new S.ReturnStatement({argument: x})});
        expect(x.enclosingFunction).to.equal(null);
    });
});

describe('Role queries', () => {
    it('should classify function nodes by their parent', () => {
        const fn = () => new S.FunctionNode({params: [], body: new S.BlockStatement({body: []})});
        const decl = new S.FunctionDeclaration({function: fn()});
        const expr = new S.FunctionExpression({function: fn()});
        const getter = new S.Property({key: name('x'), value: fn(), kind: 'get'});
        expect(decl.function.isDeclaration).to.equal(true);
        expect(decl.function.isExpression).to.equal(false);
        expect(expr.function.isExpression).to.equal(true);
        expect(expr.function.isAccessor).to.equal(false);
        expect(getter.function.isAccessor).to.equal(true);
        expect(fn().isDeclaration).to.equal(false);
    });

    it('should always classify arrow functions as expressions', () => {
        const arrow = new S.ArrowFunctionNode({params: [], body: new S.EmptyStatement()});
        expect(arrow.isExpression).to.equal(true);
        expect(arrow.isDeclaration).to.equal(false);
        expect(arrow.isAccessor).to.equal(false);
    });

    it('should classify names by their parent', () => {
        const variable = id('v');
        const member = new S.StaticMemberExpression({object: id('o'), property: name('p')});
        const key = name('k');
        new S.Property({key, value: num(1)});
        const label = name('outer');
        new S.BreakStatement({label});
        const param = name('e');
        new S.CatchClause({param, body: new S.BlockStatement({body: []})});

        expect(variable.name.isVariable).to.equal(true);
        expect(variable.name.isProperty).to.equal(false);
        expect(member.property.isProperty).to.equal(true);
        expect(member.property.isVariable).to.equal(false);
        expect(key.isProperty).to.equal(true);
        expect(label.isLabel).to.equal(true);
        expect(label.isVariable).to.equal(false);
        expect(param.isVariable).to.equal(true);
        expect(name('orphan').isVariable).to.equal(false);
    });

    it('should expose a plain property value as an expression', () => {
        const value = num(1);
        const prop = new S.Property({key: new S.LiteralExpression({value: 2, raw: '2'}), value});
        expect(prop.isInit).to.equal(true);
        expect(prop.isAccessor).to.equal(false);
        expect(prop.nameString).to.equal('2');
        expect(prop.expression).to.equal(value);
    });

    it('should fail fast when a plain property value is read as a function', () => {
        const prop = new S.Property({key: name('x'), value: num(1)});
        expect(() => prop.function).to.throw(AssertionError, "property 'x' does not hold a function");
    });

    it('should fail fast when an accessor is read as an expression', () => {
        const prop = new S.Property({
            key: name('y'),
            value: new S.FunctionNode({params: [name('v')], body: new S.BlockStatement({body: []})}),
            kind: 'set',
        });
        expect(prop.isSetter).to.equal(true);
        expect(() => prop.expression).to.throw(AssertionError, "property 'y' is an accessor");
    });

    it('should refuse an accessor whose value is not a function', () => {
        expect(() => new S.Property({key: name('z'), value: num(1), kind: 'get'})).to.throw(
            AssertionError, 'get property needs a function value');
    });

    it('should tell compound assignments from plain ones', () => {
        const plain = new S.AssignmentExpression({left: id('a'), right: num(1)});
        const compound = new S.AssignmentExpression({
            left: id('a'), operator: S.AssignmentOperator.SarAssign, right: num(1),
        });
        expect(plain.operator).to.equal('=');
        expect(plain.isCompound).to.equal(false);
        expect(compound.isCompound).to.equal(true);
    });
});

describe('LiteralExpression', () => {
    it('should report the kind of its value', () => {
        expect(new S.LiteralExpression({value: 'a'}).isString).to.equal(true);
        expect(num(4).isNumber).to.equal(true);
        expect(new S.LiteralExpression({value: false}).isBool).to.equal(true);
        expect(new S.LiteralExpression({value: null}).isNull).to.equal(true);
    });

    it('should return typed values', () => {
        expect(new S.LiteralExpression({value: 'a'}).stringValue).to.equal('a');
        expect(num(4).numberValue).to.equal(4);
        expect(new S.LiteralExpression({value: true}).boolValue).to.equal(true);
    });

    it('should fail fast on a mismatched value', () => {
        expect(() => num(4).stringValue).to.throw(AssertionError, 'Lit(4) is not a string');
    });

    it('should convert its value to a name', () => {
        expect(new S.LiteralExpression({value: null}).toName).to.equal('null');
        expect(num(12).toName).to.equal('12');
    });

    it('should print the raw text when it has one', () => {
        expect(new S.LiteralExpression({value: 'a', raw: "'a'"}).toString()).to.equal("Lit('a')");
        expect(new S.LiteralExpression({value: 'a'}).toString()).to.equal('Lit(a)');
    });
});

describe('Scope', () => {
    it('should start without an environment', () => {
        const program = new S.Program({body: []});
        expect(program.environment).to.equal(null);
        expect(program.declares('x')).to.equal(false);
    });

    it('should record declared names', () => {
        const fn = new S.FunctionNode({params: [], body: new S.BlockStatement({body: []})});
        fn.declare('arguments');
        fn.declare('x');
        fn.declare('x');
        expect(fn.declares('x')).to.equal(true);
        expect(fn.declares('y')).to.equal(false);
        expect(Array.from(fn.environment ?? [])).to.deep.equal(['arguments', 'x']);
    });

    it('should hold a resolved scope on a name', () => {
        const program = new S.Program({body: [new S.ExpressionStatement({expression: id('g')})]});
        const stmt = program.body[0];
        if (!(stmt instanceof S.ExpressionStatement) || !(stmt.expression instanceof S.IdentifierExpression)) {
            throw new Error('unexpected tree');
        }
        stmt.expression.name.scope = program;
        expect(stmt.expression.name.scope).to.equal(program);
    });
});
