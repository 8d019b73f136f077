import type * as Shift from 'shift-parser';
import { Importer, UnsupportedSyntaxError, parseProgram } from './parse_js';
import { checkTree } from './ast_util';
import * as S from './schema';

import { describe, it } from 'mocha';
import { expect } from 'chai';

// Parses `js_text` and returns the expression of its only statement.
function parseExpression(js_text: string): S.Expression {
    const program = parseProgram(js_text);
    expect(program.body).to.have.lengthOf(1);
    const stmt = program.body[0];
    if (!(stmt instanceof S.ExpressionStatement)) {
        throw new Error(`expected an expression statement, got ${stmt}`);
    }
    return stmt.expression;
}

function identifierNames(nodes: Array<S.Node | null>): Array<string | null> {
    return nodes.map(node => node instanceof S.IdentifierExpression ? node.name.value : null);
}

describe('parseProgram', () => {
    it('should build a program with consistent parent pointers', () => {
        const program = parseProgram('var x = 1; function f(a, b) { return a + b; }', 'main.js');
        expect(program.filename).to.equal('main.js');
        expect(program.body.map(stmt => stmt.type))
            .to.deep.equal(['VariableDeclaration', 'FunctionDeclaration']);
        expect(() => checkTree(program)).not.to.throw();
    });

    it('should record offsets and lines', () => {
        const program = parseProgram('a;\nb;');
        const [first, second] = program.body;
        expect(first.start).to.equal(0);
        expect(second.start).to.equal(3);
        expect(first.line).to.be.a('number');
        expect(second.line).to.equal((first.line ?? 0) + 1);
        expect(second.location).to.equal(`null:${second.line}`);
    });

    it('should lift var declarations', () => {
        const program = parseProgram('var x = 1, y;');
        const decl = program.body[0];
        expect(decl).to.be.instanceOf(S.VariableDeclaration);
        if (!(decl instanceof S.VariableDeclaration)) return;
        expect(decl.declarations.map(d => d.name.value)).to.deep.equal(['x', 'y']);
        expect(decl.declarations[0].init).to.be.instanceOf(S.LiteralExpression);
        expect(decl.declarations[1].init).to.equal(null);
        expect(decl.declarations[0].name.isVariable).to.equal(true);
    });

    it('should lift function declarations', () => {
        const program = parseProgram('function f(a, b) { return a; }');
        const decl = program.body[0];
        if (!(decl instanceof S.FunctionDeclaration)) {
            throw new Error(`expected a function declaration, got ${decl}`);
        }
        const fn = decl.function;
        expect(fn.isDeclaration).to.equal(true);
        expect(fn.name?.value).to.equal('f');
        expect(fn.params.map(p => p.value)).to.deep.equal(['a', 'b']);
        expect(fn.body).to.be.instanceOf(S.BlockStatement);
        expect(fn.params[0].enclosingFunction).to.equal(fn);
    });

    it('should keep directives as string statements', () => {
        const program = parseProgram('"use strict"; x;');
        const stmt = program.body[0];
        if (!(stmt instanceof S.ExpressionStatement) ||
            !(stmt.expression instanceof S.LiteralExpression)) {
            throw new Error(`expected a directive, got ${stmt}`);
        }
        expect(stmt.expression.value).to.equal('use strict');
        expect(stmt.expression.raw).to.equal('"use strict"');
        expect(program.body[1].type).to.equal('ExpressionStatement');
    });

    it('should keep the quotes a directive was written with', () => {
        const program = parseProgram("'use strict';\nx;");
        const stmt = program.body[0];
        if (!(stmt instanceof S.ExpressionStatement) ||
            !(stmt.expression instanceof S.LiteralExpression)) {
            throw new Error(`expected a directive, got ${stmt}`);
        }
        expect(stmt.expression.value).to.equal('use strict');
        expect(stmt.expression.raw).to.equal("'use strict'");
    });

    it('should keep array holes as null', () => {
        const array = parseExpression('[1,,3];');
        if (!(array instanceof S.ArrayExpression)) {
            throw new Error(`expected an array, got ${array}`);
        }
        expect(array.elements).to.have.lengthOf(3);
        expect(array.elements[1]).to.equal(null);
        let visited = 0;
        array.forEach(() => visited++);
        expect(visited).to.equal(2);
    });

    it('should flatten comma operators into one sequence', () => {
        const seq = parseExpression('a, b, c;');
        if (!(seq instanceof S.SequenceExpression)) {
            throw new Error(`expected a sequence, got ${seq}`);
        }
        expect(identifierNames(seq.expressions)).to.deep.equal(['a', 'b', 'c']);
    });

    it('should lift literals', () => {
        const program = parseProgram('null; true; 0x10; "s"; /ab+c/gi;');
        const values = program.body.map(stmt => {
            if (!(stmt instanceof S.ExpressionStatement)) return undefined;
            const e = stmt.expression;
            if (e instanceof S.LiteralExpression) return e.value;
            if (e instanceof S.LiteralRegExpExpression) return e.regexp;
            return undefined;
        });
        expect(values).to.deep.equal([null, true, 16, 's', '/ab+c/gi']);
    });

    it('should keep the source text of number literals', () => {
        const literal = parseExpression('0x10;');
        expect(literal.toString()).to.equal('Lit(0x10)');
    });

    it('should lift operators', () => {
        const compound = parseExpression('x += 2;');
        expect(compound).to.be.instanceOf(S.AssignmentExpression);
        if (compound instanceof S.AssignmentExpression) {
            expect(compound.operator).to.equal(S.AssignmentOperator.AddAssign);
            expect(compound.isCompound).to.equal(true);
        }

        const update = parseExpression('i++;');
        expect(update).to.be.instanceOf(S.UpdateExpression);
        if (update instanceof S.UpdateExpression) {
            expect(update.operator).to.equal(S.UpdateOperator.Incr);
            expect(update.isPrefix).to.equal(false);
        }

        const unary = parseExpression('typeof x;');
        expect(unary).to.be.instanceOf(S.UnaryExpression);
        if (unary instanceof S.UnaryExpression) {
            expect(unary.operator).to.equal(S.UnaryOperator.Typeof);
        }

        const binary = parseExpression('a instanceof b;');
        expect(binary.toString()).to.equal('BinaryExpression(instanceof)');
    });

    it('should lift member expressions', () => {
        const member = parseExpression('a.b[c];');
        if (!(member instanceof S.ComputedMemberExpression)) {
            throw new Error(`expected a computed member, got ${member}`);
        }
        expect(member.object.toString()).to.equal('StaticMemberExpression(.b)');
        expect(member.property.toString()).to.equal('IdentifierExpression(c)');
        if (member.object instanceof S.StaticMemberExpression) {
            expect(member.object.property.isProperty).to.equal(true);
        }
    });

    it('should lift new as a call with isNew set', () => {
        const call = parseExpression('new Foo(1, 2);');
        if (!(call instanceof S.CallExpression)) {
            throw new Error(`expected a call, got ${call}`);
        }
        expect(call.isNew).to.equal(true);
        expect(call.callee.toString()).to.equal('IdentifierExpression(Foo)');
        expect(call.arguments).to.have.lengthOf(2);

        const plain = parseExpression('f();');
        expect(plain instanceof S.CallExpression && plain.isNew).to.equal(false);
    });

    it('should lift object literals with accessors', () => {
        const object = parseExpression('({get a() { return 1; }, set a(v) {}, b: 2, "c d": 3, 4: 5});');
        if (!(object instanceof S.ObjectExpression)) {
            throw new Error(`expected an object, got ${object}`);
        }
        const props = object.properties;
        expect(props.map(p => p.kind)).to.deep.equal(['get', 'set', 'init', 'init', 'init']);
        expect(props.map(p => p.nameString)).to.deep.equal(['a', 'a', 'b', 'c d', '4']);
        expect(props[0].function.isAccessor).to.equal(true);
        expect(props[1].function.params.map(p => p.value)).to.deep.equal(['v']);
        expect(props[2].key.type).to.equal('Name');
        expect(props[3].key.type).to.equal('LiteralExpression');
        expect(props[4].key instanceof S.LiteralExpression && props[4].key.value).to.equal(4);
    });

    it('should classify property keys by how they are written', () => {
        const object = parseExpression('({ caf\u00e9: 1, "foo": 2, "1": 3, 1: 4, \\u0062: 5 });');
        if (!(object instanceof S.ObjectExpression)) {
            throw new Error(`expected an object, got ${object}`);
        }
        const keys = object.properties.map(p => p.key);
        expect(keys.map(k => k.type)).to.deep.equal(
            ['Name', 'LiteralExpression', 'LiteralExpression', 'LiteralExpression', 'Name']);
        expect(keys.map(k => k.value))
            .to.deep.equal(['caf\u00e9', 'foo', '1', 1, 'b']);
        expect(keys[0] instanceof S.Name && keys[0].isProperty).to.equal(true);
        expect(keys[1].toString()).to.equal('Lit("foo")');
    });

    it('should keep a concise arrow body as a return', () => {
        const assign = parseExpression('f = x => x + 1;');
        if (!(assign instanceof S.AssignmentExpression) ||
            !(assign.right instanceof S.ArrowFunctionNode)) {
            throw new Error(`expected an arrow assignment, got ${assign}`);
        }
        const arrow = assign.right;
        expect(arrow.params.map(p => p.value)).to.deep.equal(['x']);
        expect(arrow.body).to.be.instanceOf(S.ReturnStatement);
        expect(arrow.body.toString()).to.equal('ReturnStatement');
        expect(arrow.body.enclosingFunction).to.equal(null);
    });

    it('should merge the default case into the case list', () => {
        const program = parseProgram('switch (x) { case 1: break; default: y; case 2: }');
        const stmt = program.body[0];
        if (!(stmt instanceof S.SwitchStatement)) {
            throw new Error(`expected a switch, got ${stmt}`);
        }
        expect(stmt.cases.map(c => c.isDefault)).to.deep.equal([false, true, false]);
        expect(stmt.cases[1].body).to.have.lengthOf(1);
        expect(stmt.cases[2].body).to.have.lengthOf(0);
    });

    it('should lift every form of try', () => {
        const program = parseProgram(
            'try {} catch (e) {}\ntry {} finally {}\ntry {} catch (e) {} finally {}');
        const shapes = program.body.map(stmt => stmt instanceof S.TryStatement
            ? [stmt.handler !== null, stmt.finalizer !== null]
            : null);
        expect(shapes).to.deep.equal([[true, false], [false, true], [true, true]]);
        const first = program.body[0];
        if (first instanceof S.TryStatement && first.handler !== null) {
            expect(first.handler.param.value).to.equal('e');
            expect(first.handler.param.isVariable).to.equal(true);
        }
    });

    it('should lift loops and labels', () => {
        const program = parseProgram(
            'outer: for (;;) { break outer; }\n' +
            'for (var k in o) {}\n' +
            'for (k in o) {}\n' +
            'do {} while (x);\n' +
            'with (o) {}');
        expect(program.body.map(stmt => stmt.type)).to.deep.equal([
            'LabeledStatement',
            'ForInStatement',
            'ForInStatement',
            'DoWhileStatement',
            'WithStatement',
        ]);
        const labeled = program.body[0];
        if (labeled instanceof S.LabeledStatement && labeled.body instanceof S.ForStatement) {
            const loop = labeled.body;
            expect([loop.init, loop.condition, loop.update]).to.deep.equal([null, null, null]);
            expect(labeled.label.isLabel).to.equal(true);
        } else {
            throw new Error(`expected a labeled for loop, got ${labeled}`);
        }
        const [, withVar, withoutVar] = program.body;
        expect(withVar instanceof S.ForInStatement && withVar.left.type).to.equal('VariableDeclaration');
        expect(withoutVar instanceof S.ForInStatement && withoutVar.left.type).to.equal('IdentifierExpression');
    });

    it('should reject syntax the node model cannot hold', () => {
        expect(() => parseProgram('let x = 1;'))
            .to.throw(UnsupportedSyntaxError, 'Unsupported syntax: VariableDeclaration (let)');
        expect(() => parseProgram('class A {}'))
            .to.throw(UnsupportedSyntaxError, 'Unsupported syntax: ClassDeclaration');
        expect(() => parseProgram('function* g() {}'))
            .to.throw(UnsupportedSyntaxError, 'Unsupported syntax: FunctionDeclaration (generator)');
        expect(() => parseProgram('f(...xs);'))
            .to.throw(UnsupportedSyntaxError, 'Unsupported syntax: CallExpression (spread argument)');
    });

    it('should name the offending node type', () => {
        try {
            parseProgram('x ** 2;');
        } catch (e) {
            expect(e).to.be.instanceOf(UnsupportedSyntaxError);
            if (e instanceof UnsupportedSyntaxError) {
                expect(e.nodeType).to.equal('BinaryExpression');
                expect(e.message).to.equal('Unsupported syntax: BinaryExpression (operator **)');
            }
            return;
        }
        expect.fail('x ** 2 should not be accepted');
    });

    it('should pass parse errors through', () => {
        expect(() => parseProgram('var = ;')).to.throw();
    });
});

describe('Importer', () => {
    it('should fall back to printed literals without locations', () => {
        const script: Shift.Script = {
            type: 'Script',
            directives: [],
            statements: [
                {type: 'ExpressionStatement',
                 expression: {type: 'LiteralStringExpression', value: 'hi'}},
                {type: 'ExpressionStatement',
                 expression: {type: 'LiteralRegExpExpression', pattern: 'a',
                              global: true, ignoreCase: false, multiLine: false,
                              dotAll: false, unicode: false, sticky: true}},
            ],
        };
        const program = new Importer({source: ''}).liftScript(script, 'gen.js');
        const [str, re] = program.body;
        expect(str.start).to.equal(null);
        expect(str.line).to.equal(null);
        expect(str instanceof S.ExpressionStatement && str.expression.toString()).to.equal('Lit("hi")');
        expect(re instanceof S.ExpressionStatement &&
               re.expression instanceof S.LiteralRegExpExpression &&
               re.expression.regexp).to.equal('/a/gy');
        expect(program.filename).to.equal('gen.js');
    });
});
