import * as assert from 'assert';

import type { Visitor, Visitor1 } from './visitor';

export type ChildCallback = (node: Node) => void;

export type LiteralValue = string | number | boolean | null;

export enum UnaryOperator {
    Pos        = "+",
    Neg        = "-",
    LogicalNot = "!",
    BitNot     = "~",
    Typeof     = "typeof",
    Void       = "void",
    Delete     = "delete"
}

export enum BinaryOperator {
    LogicalOr     = "||",
    LogicalAnd    = "&&",
    BitOr         = "|",
    BitXor        = "^",
    BitAnd        = "&",
    Equal         = "==",
    NotEqual      = "!=",
    StrictEqual   = "===",
    StrictNotEqual= "!==",
    Less          = "<",
    LessEqual     = "<=",
    Greater       = ">",
    GreaterEqual  = ">=",
    In            = "in",
    Instanceof    = "instanceof",
    Shl           = "<<",
    Shr           = ">>",
    Sar           = ">>>",
    Add           = "+",
    Sub           = "-",
    Mul           = "*",
    Div           = "/",
    Mod           = "%"
}

export enum AssignmentOperator {
    Assign       = "=",
    AddAssign    = "+=",
    SubAssign    = "-=",
    MulAssign    = "*=",
    DivAssign    = "/=",
    ModAssign    = "%=",
    ShlAssign    = "<<=",
    ShrAssign    = ">>=",
    SarAssign    = ">>>=",
    BitOrAssign  = "|=",
    BitXorAssign = "^=",
    BitAndAssign = "&="
}

export enum UpdateOperator {
    Incr = "++",
    Decr = "--"
}

//
// Base classes
//

/**
 * A node in the syntax tree of a program.
 *
 * Constructors set the parent pointer of every child they are given. If you
 * move subtrees around by assigning fields directly, keeping the parent
 * pointers right is up to you; the helpers in `ast_util` do it for you.
 */
export abstract class Node {
    // The parent of this node, or null for a root or an orphan.
    parent: Node | null = null;

    // Source offsets, when known.
    start: number | null = null;
    end: number | null = null;

    // 1-based line number, when known.
    line: number | null = null;

    // The variant tag; always the name of the concrete class.
    abstract readonly type: string;

    // The filename of the enclosing program, or null if the node is orphaned.
    get filename(): string | null {
        const program = this.enclosingProgram;
        return program !== null ? program.filename : null;
    }

    // `filename:line`, for diagnostics.
    get location(): string {
        return `${this.filename}:${this.line}`;
    }

    // The closest Program at or above this node.
    get enclosingProgram(): Program | null {
        let node: Node | null = this;
        while (node !== null) {
            if (node instanceof Program) {
                return node;
            }
            node = node.parent;
        }
        return null;
    }

    // The closest FunctionNode at or above this node.
    get enclosingFunction(): FunctionNode | null {
        let node: Node | null = this;
        while (node !== null) {
            if (node instanceof FunctionNode) {
                return node;
            }
            node = node.parent;
        }
        return null;
    }

    // Calls `callback` on each immediate child, in source order. Absent
    // optional children are skipped.
    abstract forEach(callback: ChildCallback): void;

    // Calls the `visit` method of `visitor` matching this node's class.
    abstract accept<T>(visitor: Visitor<T>): T;

    // As `accept`, threading `arg` through to the handler.
    abstract accept1<T, A>(visitor: Visitor1<T, A>, arg: A): T;

    toString(): string {
        return this.type;
    }

    protected adopt<C extends Node>(child: C): C {
        child.parent = this;
        return child;
    }

    protected adoptOptional<C extends Node>(child: C | null | undefined): C | null {
        if (child === null || child === undefined) {
            return null;
        }
        return this.adopt(child);
    }

    protected adoptAll<C extends Node | null>(children: Array<C>): Array<C> {
        for (const child of children) {
            if (child instanceof Node) {
                child.parent = this;
            }
        }
        return children;
    }
}

/**
 * A node that can host local variables: Program, FunctionNode,
 * ArrowFunctionNode and CatchClause.
 */
export abstract class Scope extends Node {
    // Names declared directly in this scope, including the implicit
    // `arguments` of functions. Left null until a resolver fills it in.
    environment: Set<string> | null = null;

    declare(name: string): void {
        if (this.environment === null) {
            this.environment = new Set();
        }
        this.environment.add(name);
    }

    declares(name: string): boolean {
        return this.environment !== null && this.environment.has(name);
    }
}

export type Statement =
    (EmptyStatement      |
     BlockStatement      |
     ExpressionStatement |
     IfStatement         |
     LabeledStatement    |
     BreakStatement      |
     ContinueStatement   |
     WithStatement       |
     SwitchStatement     |
     ReturnStatement     |
     ThrowStatement      |
     TryStatement        |
     WhileStatement      |
     DoWhileStatement    |
     ForStatement        |
     ForInStatement      |
     FunctionDeclaration |
     VariableDeclaration |
     DebuggerStatement);

export type Expression =
    (ThisExpression           |
     ArrayExpression          |
     ObjectExpression         |
     FunctionExpression       |
     ArrowFunctionNode        |
     SequenceExpression       |
     UnaryExpression          |
     BinaryExpression         |
     AssignmentExpression     |
     UpdateExpression         |
     ConditionalExpression    |
     CallExpression           |
     StaticMemberExpression   |
     ComputedMemberExpression |
     IdentifierExpression     |
     LiteralExpression        |
     LiteralRegExpExpression);

// The `init` of a for loop and the `left` of a for-in loop.
export type ForBinding = (VariableDeclaration | Expression);

// Identifier keys are Names; string and number keys are literals.
export type PropertyKey = (Name | LiteralExpression);

export type PropertyKind = 'init' | 'get' | 'set';

export type AnyNode =
    (Programs          |
     Program           |
     FunctionNode      |
     Name              |
     SwitchCase        |
     CatchClause       |
     VariableDeclarator|
     Property          |
     Statement         |
     Expression);

export type NodeType = AnyNode['type'];

//
// Programs and functions
//

// A batch of programs. Never produced by the importer; use it to hold
// several compiled units in one tree.
export class Programs extends Node {
    readonly type = 'Programs';
    programs: Array<Program>;

    constructor(params: {programs: Array<Program>}) {
        super();
        this.programs = this.adoptAll(params.programs);
    }

    forEach(callback: ChildCallback) {
        this.programs.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitPrograms(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitPrograms(this, arg);
    }
}

// The root of one compilation unit.
export class Program extends Scope {
    readonly type = 'Program';
    // Where the program came from. Any string will do; it only shows up in
    // diagnostics.
    filename: string | null;
    body: Array<Statement>;

    constructor(params: {body: Array<Statement>, filename?: string | null}) {
        super();
        this.filename = params.filename ?? null;
        this.body = this.adoptAll(params.body);
    }

    forEach(callback: ChildCallback) {
        this.body.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitProgram(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitProgram(this, arg);
    }
}

/**
 * A function. Whether it is an expression, a declaration or an accessor is
 * decided by the node holding it.
 */
export class FunctionNode extends Scope {
    readonly type = 'FunctionNode';
    // Absent for anonymous function expressions and accessors.
    name: Name | null;
    params: Array<Name>;
    body: Statement;

    constructor(params: {name?: Name | null, params: Array<Name>, body: Statement}) {
        super();
        this.name = this.adoptOptional(params.name);
        this.params = this.adoptAll(params.params);
        this.body = this.adopt(params.body);
    }

    get isExpression(): boolean {
        return this.parent instanceof FunctionExpression;
    }

    get isDeclaration(): boolean {
        return this.parent instanceof FunctionDeclaration;
    }

    get isAccessor(): boolean {
        return this.parent instanceof Property && this.parent.isAccessor;
    }

    forEach(callback: ChildCallback) {
        if (this.name !== null) {
            callback(this.name);
        }
        this.params.forEach(callback);
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitFunctionNode(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitFunctionNode(this, arg);
    }
}

// `(params) => body`. Always an expression.
export class ArrowFunctionNode extends Scope {
    readonly type = 'ArrowFunctionNode';
    params: Array<Name>;
    body: Statement;

    constructor(params: {params: Array<Name>, body: Statement}) {
        super();
        this.params = this.adoptAll(params.params);
        this.body = this.adopt(params.body);
    }

    get isExpression(): boolean {
        return true;
    }

    get isDeclaration(): boolean {
        return false;
    }

    get isAccessor(): boolean {
        return false;
    }

    forEach(callback: ChildCallback) {
        this.params.forEach(callback);
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitArrowFunctionNode(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitArrowFunctionNode(this, arg);
    }
}

/**
 * An occurrence of a variable, property or label name.
 */
export class Name extends Node {
    readonly type = 'Name';
    // The identifier, with unicode escapes resolved.
    value: string;
    // The scope declaring this variable, set by a resolver. A variable that
    // is never declared resolves to the outermost Program, where an
    // assignment would create it. Stays null for property and label names.
    scope: Scope | null = null;

    constructor(params: {value: string}) {
        super();
        this.value = params.value;
    }

    get isVariable(): boolean {
        const parent = this.parent;
        return parent instanceof IdentifierExpression ||
               parent instanceof FunctionNode ||
               parent instanceof ArrowFunctionNode ||
               parent instanceof VariableDeclarator ||
               parent instanceof CatchClause;
    }

    get isProperty(): boolean {
        const parent = this.parent;
        return (parent instanceof StaticMemberExpression && parent.property === this) ||
               (parent instanceof Property && parent.key === this);
    }

    get isLabel(): boolean {
        const parent = this.parent;
        return parent instanceof BreakStatement ||
               parent instanceof ContinueStatement ||
               parent instanceof LabeledStatement;
    }

    forEach(callback: ChildCallback) {}

    accept<T>(v: Visitor<T>): T {
        return v.visitName(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitName(this, arg);
    }

    toString(): string {
        return this.value;
    }
}

//
// Statements
//

// `;`
export class EmptyStatement extends Node {
    readonly type = 'EmptyStatement';

    forEach(callback: ChildCallback) {}

    accept<T>(v: Visitor<T>): T {
        return v.visitEmptyStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitEmptyStatement(this, arg);
    }
}

// `{ body }`
export class BlockStatement extends Node {
    readonly type = 'BlockStatement';
    body: Array<Statement>;

    constructor(params: {body: Array<Statement>}) {
        super();
        this.body = this.adoptAll(params.body);
    }

    forEach(callback: ChildCallback) {
        this.body.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitBlockStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitBlockStatement(this, arg);
    }
}

// `expression;`
export class ExpressionStatement extends Node {
    readonly type = 'ExpressionStatement';
    expression: Expression;

    constructor(params: {expression: Expression}) {
        super();
        this.expression = this.adopt(params.expression);
    }

    forEach(callback: ChildCallback) {
        callback(this.expression);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitExpressionStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitExpressionStatement(this, arg);
    }
}

// `if (condition) then else otherwise`
export class IfStatement extends Node {
    readonly type = 'IfStatement';
    condition: Expression;
    then: Statement;
    otherwise: Statement | null;

    constructor(params: {condition: Expression,
                         then: Statement,
                         otherwise?: Statement | null})
    {
        super();
        this.condition = this.adopt(params.condition);
        this.then = this.adopt(params.then);
        this.otherwise = this.adoptOptional(params.otherwise);
    }

    forEach(callback: ChildCallback) {
        callback(this.condition);
        callback(this.then);
        if (this.otherwise !== null) {
            callback(this.otherwise);
        }
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitIfStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitIfStatement(this, arg);
    }
}

// `label: body`
export class LabeledStatement extends Node {
    readonly type = 'LabeledStatement';
    label: Name;
    body: Statement;

    constructor(params: {label: Name, body: Statement}) {
        super();
        this.label = this.adopt(params.label);
        this.body = this.adopt(params.body);
    }

    forEach(callback: ChildCallback) {
        callback(this.label);
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitLabeledStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitLabeledStatement(this, arg);
    }
}

// `break;` or `break label;`
export class BreakStatement extends Node {
    readonly type = 'BreakStatement';
    label: Name | null;

    constructor(params: {label?: Name | null} = {}) {
        super();
        this.label = this.adoptOptional(params.label);
    }

    forEach(callback: ChildCallback) {
        if (this.label !== null) {
            callback(this.label);
        }
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitBreakStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitBreakStatement(this, arg);
    }
}

// `continue;` or `continue label;`
export class ContinueStatement extends Node {
    readonly type = 'ContinueStatement';
    label: Name | null;

    constructor(params: {label?: Name | null} = {}) {
        super();
        this.label = this.adoptOptional(params.label);
    }

    forEach(callback: ChildCallback) {
        if (this.label !== null) {
            callback(this.label);
        }
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitContinueStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitContinueStatement(this, arg);
    }
}

// `with (object) body`
export class WithStatement extends Node {
    readonly type = 'WithStatement';
    object: Expression;
    body: Statement;

    constructor(params: {object: Expression, body: Statement}) {
        super();
        this.object = this.adopt(params.object);
        this.body = this.adopt(params.body);
    }

    forEach(callback: ChildCallback) {
        callback(this.object);
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitWithStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitWithStatement(this, arg);
    }
}

// `switch (argument) { cases }`
export class SwitchStatement extends Node {
    readonly type = 'SwitchStatement';
    argument: Expression;
    cases: Array<SwitchCase>;

    constructor(params: {argument: Expression, cases: Array<SwitchCase>}) {
        super();
        this.argument = this.adopt(params.argument);
        this.cases = this.adoptAll(params.cases);
    }

    forEach(callback: ChildCallback) {
        callback(this.argument);
        this.cases.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitSwitchStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitSwitchStatement(this, arg);
    }
}

// `case expression: body`, or `default: body` when there is no expression.
export class SwitchCase extends Node {
    readonly type = 'SwitchCase';
    expression: Expression | null;
    body: Array<Statement>;

    constructor(params: {expression?: Expression | null, body: Array<Statement>}) {
        super();
        this.expression = this.adoptOptional(params.expression);
        this.body = this.adoptAll(params.body);
    }

    static defaultCase(body: Array<Statement>): SwitchCase {
        return new SwitchCase({expression: null, body});
    }

    get isDefault(): boolean {
        return this.expression === null;
    }

    forEach(callback: ChildCallback) {
        if (this.expression !== null) {
            callback(this.expression);
        }
        this.body.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitSwitchCase(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitSwitchCase(this, arg);
    }
}

// `return;` or `return argument;`
export class ReturnStatement extends Node {
    readonly type = 'ReturnStatement';
    argument: Expression | null;

    constructor(params: {argument?: Expression | null} = {}) {
        super();
        this.argument = this.adoptOptional(params.argument);
    }

    forEach(callback: ChildCallback) {
        if (this.argument !== null) {
            callback(this.argument);
        }
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitReturnStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitReturnStatement(this, arg);
    }
}

// `throw argument;`
export class ThrowStatement extends Node {
    readonly type = 'ThrowStatement';
    argument: Expression;

    constructor(params: {argument: Expression}) {
        super();
        this.argument = this.adopt(params.argument);
    }

    forEach(callback: ChildCallback) {
        callback(this.argument);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitThrowStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitThrowStatement(this, arg);
    }
}

// `try block catch handler finally finalizer`. At least one of the handler
// and the finalizer is present.
export class TryStatement extends Node {
    readonly type = 'TryStatement';
    block: BlockStatement;
    handler: CatchClause | null;
    finalizer: BlockStatement | null;

    constructor(params: {block: BlockStatement,
                         handler?: CatchClause | null,
                         finalizer?: BlockStatement | null})
    {
        super();
        assert.ok(params.handler != null || params.finalizer != null,
                  'try statement needs a catch clause or a finally block');
        this.block = this.adopt(params.block);
        this.handler = this.adoptOptional(params.handler);
        this.finalizer = this.adoptOptional(params.finalizer);
    }

    forEach(callback: ChildCallback) {
        callback(this.block);
        if (this.handler !== null) {
            callback(this.handler);
        }
        if (this.finalizer !== null) {
            callback(this.finalizer);
        }
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitTryStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitTryStatement(this, arg);
    }
}

// `catch (param) body`
export class CatchClause extends Scope {
    readonly type = 'CatchClause';
    param: Name;
    body: BlockStatement;

    constructor(params: {param: Name, body: BlockStatement}) {
        super();
        this.param = this.adopt(params.param);
        this.body = this.adopt(params.body);
    }

    forEach(callback: ChildCallback) {
        callback(this.param);
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitCatchClause(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitCatchClause(this, arg);
    }
}

// `while (condition) body`
export class WhileStatement extends Node {
    readonly type = 'WhileStatement';
    condition: Expression;
    body: Statement;

    constructor(params: {condition: Expression, body: Statement}) {
        super();
        this.condition = this.adopt(params.condition);
        this.body = this.adopt(params.body);
    }

    forEach(callback: ChildCallback) {
        callback(this.condition);
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitWhileStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitWhileStatement(this, arg);
    }
}

// `do body while (condition);`
export class DoWhileStatement extends Node {
    readonly type = 'DoWhileStatement';
    body: Statement;
    condition: Expression;

    constructor(params: {body: Statement, condition: Expression}) {
        super();
        this.body = this.adopt(params.body);
        this.condition = this.adopt(params.condition);
    }

    forEach(callback: ChildCallback) {
        callback(this.body);
        callback(this.condition);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitDoWhileStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitDoWhileStatement(this, arg);
    }
}

// `for (init; condition; update) body`
export class ForStatement extends Node {
    readonly type = 'ForStatement';
    init: ForBinding | null;
    condition: Expression | null;
    update: Expression | null;
    body: Statement;

    constructor(params: {init?: ForBinding | null,
                         condition?: Expression | null,
                         update?: Expression | null,
                         body: Statement})
    {
        super();
        this.init = this.adoptOptional(params.init);
        this.condition = this.adoptOptional(params.condition);
        this.update = this.adoptOptional(params.update);
        this.body = this.adopt(params.body);
    }

    forEach(callback: ChildCallback) {
        if (this.init !== null) {
            callback(this.init);
        }
        if (this.condition !== null) {
            callback(this.condition);
        }
        if (this.update !== null) {
            callback(this.update);
        }
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitForStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitForStatement(this, arg);
    }
}

// `for (left in right) body`
export class ForInStatement extends Node {
    readonly type = 'ForInStatement';
    left: ForBinding;
    right: Expression;
    body: Statement;

    constructor(params: {left: ForBinding, right: Expression, body: Statement}) {
        super();
        this.left = this.adopt(params.left);
        this.right = this.adopt(params.right);
        this.body = this.adopt(params.body);
    }

    forEach(callback: ChildCallback) {
        callback(this.left);
        callback(this.right);
        callback(this.body);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitForInStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitForInStatement(this, arg);
    }
}

// `function name(params) { body }` in statement position.
export class FunctionDeclaration extends Node {
    readonly type = 'FunctionDeclaration';
    function: FunctionNode;

    constructor(params: {function: FunctionNode}) {
        super();
        this.function = this.adopt(params.function);
    }

    forEach(callback: ChildCallback) {
        callback(this.function);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitFunctionDeclaration(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitFunctionDeclaration(this, arg);
    }
}

// `var declarations;`
export class VariableDeclaration extends Node {
    readonly type = 'VariableDeclaration';
    declarations: Array<VariableDeclarator>;

    constructor(params: {declarations: Array<VariableDeclarator>}) {
        super();
        this.declarations = this.adoptAll(params.declarations);
    }

    forEach(callback: ChildCallback) {
        this.declarations.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitVariableDeclaration(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitVariableDeclaration(this, arg);
    }
}

// `name` or `name = init`
export class VariableDeclarator extends Node {
    readonly type = 'VariableDeclarator';
    name: Name;
    init: Expression | null;

    constructor(params: {name: Name, init?: Expression | null}) {
        super();
        this.name = this.adopt(params.name);
        this.init = this.adoptOptional(params.init);
    }

    forEach(callback: ChildCallback) {
        callback(this.name);
        if (this.init !== null) {
            callback(this.init);
        }
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitVariableDeclarator(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitVariableDeclarator(this, arg);
    }
}

// `debugger;`
export class DebuggerStatement extends Node {
    readonly type = 'DebuggerStatement';

    forEach(callback: ChildCallback) {}

    accept<T>(v: Visitor<T>): T {
        return v.visitDebuggerStatement(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitDebuggerStatement(this, arg);
    }
}

//
// Expressions
//

// `this`
export class ThisExpression extends Node {
    readonly type = 'ThisExpression';

    forEach(callback: ChildCallback) {}

    accept<T>(v: Visitor<T>): T {
        return v.visitThisExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitThisExpression(this, arg);
    }
}

// `[elements]`
export class ArrayExpression extends Node {
    readonly type = 'ArrayExpression';
    // A null entry is an elision, as in `[1,,3]`.
    elements: Array<Expression | null>;

    constructor(params: {elements: Array<Expression | null>}) {
        super();
        this.elements = this.adoptAll(params.elements);
    }

    forEach(callback: ChildCallback) {
        for (const element of this.elements) {
            if (element !== null) {
                callback(element);
            }
        }
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitArrayExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitArrayExpression(this, arg);
    }
}

// `{ properties }`
export class ObjectExpression extends Node {
    readonly type = 'ObjectExpression';
    properties: Array<Property>;

    constructor(params: {properties: Array<Property>}) {
        super();
        this.properties = this.adoptAll(params.properties);
    }

    forEach(callback: ChildCallback) {
        this.properties.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitObjectExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitObjectExpression(this, arg);
    }
}

/**
 * `key: value`, `get key() {...}` or `set key(v) {...}`.
 *
 * For getters and setters the value is a FunctionNode; otherwise it is an
 * expression.
 */
export class Property extends Node {
    readonly type = 'Property';
    key: PropertyKey;
    value: Expression | FunctionNode;
    kind: PropertyKind;

    constructor(params: {key: PropertyKey,
                         value: Expression | FunctionNode,
                         kind?: PropertyKind})
    {
        super();
        const kind = params.kind ?? 'init';
        assert.ok(kind === 'init' || params.value instanceof FunctionNode,
                  `${kind} property needs a function value`);
        this.key = this.adopt(params.key);
        this.value = this.adopt(params.value);
        this.kind = kind;
    }

    get isInit(): boolean {
        return this.kind === 'init';
    }

    get isGetter(): boolean {
        return this.kind === 'get';
    }

    get isSetter(): boolean {
        return this.kind === 'set';
    }

    get isAccessor(): boolean {
        return this.isGetter || this.isSetter;
    }

    // The key as a string, whether it was written as a name or a literal.
    get nameString(): string {
        return this.key instanceof Name ? this.key.value : this.key.toName;
    }

    // The value of a getter or setter.
    get function(): FunctionNode {
        assert.ok(this.value instanceof FunctionNode,
                  `property '${this.nameString}' does not hold a function`);
        return this.value;
    }

    // The value of a plain property.
    get expression(): Expression {
        assert.ok(!(this.value instanceof FunctionNode),
                  `property '${this.nameString}' is an accessor`);
        return this.value;
    }

    forEach(callback: ChildCallback) {
        callback(this.key);
        callback(this.value);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitProperty(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitProperty(this, arg);
    }
}

// `function name(params) { body }` in expression position.
export class FunctionExpression extends Node {
    readonly type = 'FunctionExpression';
    function: FunctionNode;

    constructor(params: {function: FunctionNode}) {
        super();
        this.function = this.adopt(params.function);
    }

    forEach(callback: ChildCallback) {
        callback(this.function);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitFunctionExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitFunctionExpression(this, arg);
    }
}

// `a, b, c`; the value is that of the last expression.
export class SequenceExpression extends Node {
    readonly type = 'SequenceExpression';
    expressions: Array<Expression>;

    constructor(params: {expressions: Array<Expression>}) {
        super();
        this.expressions = this.adoptAll(params.expressions);
    }

    forEach(callback: ChildCallback) {
        this.expressions.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitSequenceExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitSequenceExpression(this, arg);
    }
}

// `operator argument`
export class UnaryExpression extends Node {
    readonly type = 'UnaryExpression';
    operator: UnaryOperator;
    argument: Expression;

    constructor(params: {operator: UnaryOperator, argument: Expression}) {
        super();
        this.operator = params.operator;
        this.argument = this.adopt(params.argument);
    }

    forEach(callback: ChildCallback) {
        callback(this.argument);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitUnaryExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitUnaryExpression(this, arg);
    }
}

// `left operator right`
export class BinaryExpression extends Node {
    readonly type = 'BinaryExpression';
    left: Expression;
    operator: BinaryOperator;
    right: Expression;

    constructor(params: {left: Expression,
                         operator: BinaryOperator,
                         right: Expression})
    {
        super();
        this.left = this.adopt(params.left);
        this.operator = params.operator;
        this.right = this.adopt(params.right);
    }

    forEach(callback: ChildCallback) {
        callback(this.left);
        callback(this.right);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitBinaryExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitBinaryExpression(this, arg);
    }

    toString(): string {
        return `BinaryExpression(${this.operator})`;
    }
}

// `left = right`, `left += right`, ...
export class AssignmentExpression extends Node {
    readonly type = 'AssignmentExpression';
    left: Expression;
    operator: AssignmentOperator;
    right: Expression;

    constructor(params: {left: Expression,
                         operator?: AssignmentOperator,
                         right: Expression})
    {
        super();
        this.left = this.adopt(params.left);
        this.operator = params.operator ?? AssignmentOperator.Assign;
        this.right = this.adopt(params.right);
    }

    get isCompound(): boolean {
        return this.operator.length > AssignmentOperator.Assign.length;
    }

    forEach(callback: ChildCallback) {
        callback(this.left);
        callback(this.right);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitAssignmentExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitAssignmentExpression(this, arg);
    }
}

// `++argument`, `argument--`, ...
export class UpdateExpression extends Node {
    readonly type = 'UpdateExpression';
    operator: UpdateOperator;
    argument: Expression;
    isPrefix: boolean;

    constructor(params: {operator: UpdateOperator,
                         argument: Expression,
                         isPrefix: boolean})
    {
        super();
        this.operator = params.operator;
        this.argument = this.adopt(params.argument);
        this.isPrefix = params.isPrefix;
    }

    static prefix(operator: UpdateOperator, argument: Expression): UpdateExpression {
        return new UpdateExpression({operator, argument, isPrefix: true});
    }

    static postfix(operator: UpdateOperator, argument: Expression): UpdateExpression {
        return new UpdateExpression({operator, argument, isPrefix: false});
    }

    forEach(callback: ChildCallback) {
        callback(this.argument);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitUpdateExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitUpdateExpression(this, arg);
    }
}

// `condition ? then : otherwise`
export class ConditionalExpression extends Node {
    readonly type = 'ConditionalExpression';
    condition: Expression;
    then: Expression;
    otherwise: Expression;

    constructor(params: {condition: Expression,
                         then: Expression,
                         otherwise: Expression})
    {
        super();
        this.condition = this.adopt(params.condition);
        this.then = this.adopt(params.then);
        this.otherwise = this.adopt(params.otherwise);
    }

    forEach(callback: ChildCallback) {
        callback(this.condition);
        callback(this.then);
        callback(this.otherwise);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitConditionalExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitConditionalExpression(this, arg);
    }
}

// `callee(arguments)`, or `new callee(arguments)` when `isNew` is set.
export class CallExpression extends Node {
    readonly type = 'CallExpression';
    callee: Expression;
    arguments: Array<Expression>;
    isNew: boolean;

    constructor(params: {callee: Expression,
                         arguments: Array<Expression>,
                         isNew?: boolean})
    {
        super();
        this.callee = this.adopt(params.callee);
        this.arguments = this.adoptAll(params.arguments);
        this.isNew = params.isNew ?? false;
    }

    static newCall(callee: Expression, args: Array<Expression>): CallExpression {
        return new CallExpression({callee, arguments: args, isNew: true});
    }

    forEach(callback: ChildCallback) {
        callback(this.callee);
        this.arguments.forEach(callback);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitCallExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitCallExpression(this, arg);
    }
}

// `object.property`
export class StaticMemberExpression extends Node {
    readonly type = 'StaticMemberExpression';
    object: Expression;
    property: Name;

    constructor(params: {object: Expression, property: Name}) {
        super();
        this.object = this.adopt(params.object);
        this.property = this.adopt(params.property);
    }

    forEach(callback: ChildCallback) {
        callback(this.object);
        callback(this.property);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitStaticMemberExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitStaticMemberExpression(this, arg);
    }

    toString(): string {
        return `StaticMemberExpression(.${this.property.value})`;
    }
}

// `object[property]`
export class ComputedMemberExpression extends Node {
    readonly type = 'ComputedMemberExpression';
    object: Expression;
    property: Expression;

    constructor(params: {object: Expression, property: Expression}) {
        super();
        this.object = this.adopt(params.object);
        this.property = this.adopt(params.property);
    }

    forEach(callback: ChildCallback) {
        callback(this.object);
        callback(this.property);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitComputedMemberExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitComputedMemberExpression(this, arg);
    }
}

// A Name used as a value. `undefined`, `NaN` and `Infinity` are these, not
// literals.
export class IdentifierExpression extends Node {
    readonly type = 'IdentifierExpression';
    name: Name;

    constructor(params: {name: Name}) {
        super();
        this.name = this.adopt(params.name);
    }

    forEach(callback: ChildCallback) {
        callback(this.name);
    }

    accept<T>(v: Visitor<T>): T {
        return v.visitIdentifierExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitIdentifierExpression(this, arg);
    }

    toString(): string {
        return `IdentifierExpression(${this.name.value})`;
    }
}

// A string, number, boolean or null constant.
export class LiteralExpression extends Node {
    readonly type = 'LiteralExpression';
    value: LiteralValue;
    // The literal as written in the source, if known.
    raw: string | null;

    constructor(params: {value: LiteralValue, raw?: string | null}) {
        super();
        this.value = params.value;
        this.raw = params.raw ?? null;
    }

    get isString(): boolean {
        return typeof this.value === 'string';
    }

    get isNumber(): boolean {
        return typeof this.value === 'number';
    }

    get isBool(): boolean {
        return typeof this.value === 'boolean';
    }

    get isNull(): boolean {
        return this.value === null;
    }

    get stringValue(): string {
        assert.ok(typeof this.value === 'string', `${this} is not a string`);
        return this.value;
    }

    get numberValue(): number {
        assert.ok(typeof this.value === 'number', `${this} is not a number`);
        return this.value;
    }

    get boolValue(): boolean {
        assert.ok(typeof this.value === 'boolean', `${this} is not a boolean`);
        return this.value;
    }

    get toName(): string {
        return String(this.value);
    }

    forEach(callback: ChildCallback) {}

    accept<T>(v: Visitor<T>): T {
        return v.visitLiteralExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitLiteralExpression(this, arg);
    }

    toString(): string {
        return `Lit(${this.raw ?? String(this.value)})`;
    }
}

// `/pattern/flags`, kept verbatim.
export class LiteralRegExpExpression extends Node {
    readonly type = 'LiteralRegExpExpression';
    // The whole literal, slashes and flags included.
    regexp: string;

    constructor(params: {regexp: string}) {
        super();
        this.regexp = params.regexp;
    }

    forEach(callback: ChildCallback) {}

    accept<T>(v: Visitor<T>): T {
        return v.visitLiteralRegExpExpression(this);
    }

    accept1<T, A>(v: Visitor1<T, A>, arg: A): T {
        return v.visitLiteralRegExpExpression(this, arg);
    }
}
