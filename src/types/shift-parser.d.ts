/**
 * Type declarations for shift-parser
 *
 * Covers `parseScriptWithLocation` and the Shift AST node types it can
 * produce for scripts. Node types the importer does not lift are listed with
 * just their tag.
 */
declare module 'shift-parser' {
    export interface SourcePosition {
        line: number;
        column: number;
        offset: number;
    }

    export interface SourceSpan {
        start: SourcePosition;
        end: SourcePosition;
    }

    export interface Directive { type: 'Directive'; rawValue: string; }

    export interface Script {
        type: 'Script';
        directives: Directive[];
        statements: Statement[];
    }

    export interface FunctionBody {
        type: 'FunctionBody';
        directives: Directive[];
        statements: Statement[];
    }

    export interface Block { type: 'Block'; statements: Statement[]; }

    export interface BindingIdentifier { type: 'BindingIdentifier'; name: string; }
    export interface ArrayBinding { type: 'ArrayBinding'; }
    export interface ObjectBinding { type: 'ObjectBinding'; }
    export interface BindingWithInitializer { type: 'BindingWithInitializer'; }
    export type Binding = BindingIdentifier | ArrayBinding | ObjectBinding;
    export type Parameter = Binding | BindingWithInitializer;

    export interface FormalParameters {
        type: 'FormalParameters';
        items: Parameter[];
        rest: Binding | null;
    }

    export interface AssignmentTargetIdentifier { type: 'AssignmentTargetIdentifier'; name: string; }
    export interface StaticMemberAssignmentTarget {
        type: 'StaticMemberAssignmentTarget';
        object: Expression | Super;
        property: string;
    }
    export interface ComputedMemberAssignmentTarget {
        type: 'ComputedMemberAssignmentTarget';
        object: Expression | Super;
        expression: Expression;
    }
    export interface ArrayAssignmentTarget { type: 'ArrayAssignmentTarget'; }
    export interface ObjectAssignmentTarget { type: 'ObjectAssignmentTarget'; }
    export type SimpleAssignmentTarget =
        AssignmentTargetIdentifier | StaticMemberAssignmentTarget | ComputedMemberAssignmentTarget;
    export type AssignmentTarget =
        SimpleAssignmentTarget | ArrayAssignmentTarget | ObjectAssignmentTarget;

    export interface VariableDeclarator {
        type: 'VariableDeclarator';
        binding: Binding;
        init: Expression | null;
    }
    export interface VariableDeclaration {
        type: 'VariableDeclaration';
        kind: 'var' | 'let' | 'const';
        declarators: VariableDeclarator[];
    }

    export interface SwitchCase { type: 'SwitchCase'; test: Expression; consequent: Statement[]; }
    export interface SwitchDefault { type: 'SwitchDefault'; consequent: Statement[]; }
    export interface CatchClause { type: 'CatchClause'; binding: Binding; body: Block; }

    export interface BlockStatement { type: 'BlockStatement'; block: Block; }
    export interface BreakStatement { type: 'BreakStatement'; label: string | null; }
    export interface ContinueStatement { type: 'ContinueStatement'; label: string | null; }
    export interface DebuggerStatement { type: 'DebuggerStatement'; }
    export interface DoWhileStatement { type: 'DoWhileStatement'; body: Statement; test: Expression; }
    export interface EmptyStatement { type: 'EmptyStatement'; }
    export interface ExpressionStatement { type: 'ExpressionStatement'; expression: Expression; }
    export interface ForInStatement {
        type: 'ForInStatement';
        left: VariableDeclaration | AssignmentTarget;
        right: Expression;
        body: Statement;
    }
    export interface ForOfStatement { type: 'ForOfStatement'; }
    export interface ForAwaitStatement { type: 'ForAwaitStatement'; }
    export interface ForStatement {
        type: 'ForStatement';
        init: VariableDeclaration | Expression | null;
        test: Expression | null;
        update: Expression | null;
        body: Statement;
    }
    export interface IfStatement {
        type: 'IfStatement';
        test: Expression;
        consequent: Statement;
        alternate: Statement | null;
    }
    export interface LabeledStatement { type: 'LabeledStatement'; label: string; body: Statement; }
    export interface ReturnStatement { type: 'ReturnStatement'; expression: Expression | null; }
    export interface SwitchStatement {
        type: 'SwitchStatement';
        discriminant: Expression;
        cases: SwitchCase[];
    }
    export interface SwitchStatementWithDefault {
        type: 'SwitchStatementWithDefault';
        discriminant: Expression;
        preDefaultCases: SwitchCase[];
        defaultCase: SwitchDefault;
        postDefaultCases: SwitchCase[];
    }
    export interface ThrowStatement { type: 'ThrowStatement'; expression: Expression; }
    export interface TryCatchStatement { type: 'TryCatchStatement'; body: Block; catchClause: CatchClause; }
    export interface TryFinallyStatement {
        type: 'TryFinallyStatement';
        body: Block;
        catchClause: CatchClause | null;
        finalizer: Block;
    }
    export interface VariableDeclarationStatement {
        type: 'VariableDeclarationStatement';
        declaration: VariableDeclaration;
    }
    export interface WhileStatement { type: 'WhileStatement'; test: Expression; body: Statement; }
    export interface WithStatement { type: 'WithStatement'; object: Expression; body: Statement; }
    export interface FunctionDeclaration {
        type: 'FunctionDeclaration';
        isAsync: boolean;
        isGenerator: boolean;
        name: BindingIdentifier;
        params: FormalParameters;
        body: FunctionBody;
    }
    export interface ClassDeclaration { type: 'ClassDeclaration'; }

    export type Statement =
        BlockStatement | BreakStatement | ContinueStatement | DebuggerStatement |
        DoWhileStatement | EmptyStatement | ExpressionStatement | ForInStatement |
        ForOfStatement | ForAwaitStatement | ForStatement | IfStatement |
        LabeledStatement | ReturnStatement | SwitchStatement |
        SwitchStatementWithDefault | ThrowStatement | TryCatchStatement |
        TryFinallyStatement | VariableDeclarationStatement | WhileStatement |
        WithStatement | FunctionDeclaration | ClassDeclaration;

    export interface StaticPropertyName { type: 'StaticPropertyName'; value: string; }
    export interface ComputedPropertyName { type: 'ComputedPropertyName'; expression: Expression; }
    export type PropertyName = StaticPropertyName | ComputedPropertyName;

    export interface DataProperty { type: 'DataProperty'; name: PropertyName; expression: Expression; }
    export interface Getter { type: 'Getter'; name: PropertyName; body: FunctionBody; }
    export interface Setter { type: 'Setter'; name: PropertyName; param: Parameter; body: FunctionBody; }
    export interface Method { type: 'Method'; }
    export interface ShorthandProperty { type: 'ShorthandProperty'; }
    export interface SpreadProperty { type: 'SpreadProperty'; }
    export type ObjectProperty =
        DataProperty | Getter | Setter | Method | ShorthandProperty | SpreadProperty;

    export interface SpreadElement { type: 'SpreadElement'; expression: Expression; }
    export interface Super { type: 'Super'; }

    export interface ArrayExpression {
        type: 'ArrayExpression';
        elements: Array<SpreadElement | Expression | null>;
    }
    export interface ArrowExpression {
        type: 'ArrowExpression';
        isAsync: boolean;
        params: FormalParameters;
        body: FunctionBody | Expression;
    }
    export interface AssignmentExpression {
        type: 'AssignmentExpression';
        binding: AssignmentTarget;
        expression: Expression;
    }
    export interface BinaryExpression {
        type: 'BinaryExpression';
        left: Expression;
        operator: string;
        right: Expression;
    }
    export interface CallExpression {
        type: 'CallExpression';
        callee: Expression | Super;
        arguments: Array<SpreadElement | Expression>;
    }
    export interface CompoundAssignmentExpression {
        type: 'CompoundAssignmentExpression';
        binding: SimpleAssignmentTarget;
        operator: string;
        expression: Expression;
    }
    export interface ComputedMemberExpression {
        type: 'ComputedMemberExpression';
        object: Expression | Super;
        expression: Expression;
    }
    export interface ConditionalExpression {
        type: 'ConditionalExpression';
        test: Expression;
        consequent: Expression;
        alternate: Expression;
    }
    export interface FunctionExpression {
        type: 'FunctionExpression';
        isAsync: boolean;
        isGenerator: boolean;
        name: BindingIdentifier | null;
        params: FormalParameters;
        body: FunctionBody;
    }
    export interface IdentifierExpression { type: 'IdentifierExpression'; name: string; }
    export interface LiteralBooleanExpression { type: 'LiteralBooleanExpression'; value: boolean; }
    export interface LiteralInfinityExpression { type: 'LiteralInfinityExpression'; }
    export interface LiteralNullExpression { type: 'LiteralNullExpression'; }
    export interface LiteralNumericExpression { type: 'LiteralNumericExpression'; value: number; }
    export interface LiteralRegExpExpression {
        type: 'LiteralRegExpExpression';
        pattern: string;
        global: boolean;
        ignoreCase: boolean;
        multiLine: boolean;
        dotAll: boolean;
        unicode: boolean;
        sticky: boolean;
    }
    export interface LiteralStringExpression { type: 'LiteralStringExpression'; value: string; }
    export interface NewExpression {
        type: 'NewExpression';
        callee: Expression;
        arguments: Array<SpreadElement | Expression>;
    }
    export interface ObjectExpression { type: 'ObjectExpression'; properties: ObjectProperty[]; }
    export interface StaticMemberExpression {
        type: 'StaticMemberExpression';
        object: Expression | Super;
        property: string;
    }
    export interface ThisExpression { type: 'ThisExpression'; }
    export interface UnaryExpression { type: 'UnaryExpression'; operator: string; operand: Expression; }
    export interface UpdateExpression {
        type: 'UpdateExpression';
        isPrefix: boolean;
        operator: string;
        operand: SimpleAssignmentTarget;
    }
    export interface ClassExpression { type: 'ClassExpression'; }
    export interface NewTargetExpression { type: 'NewTargetExpression'; }
    export interface TemplateExpression { type: 'TemplateExpression'; }
    export interface YieldExpression { type: 'YieldExpression'; }
    export interface YieldGeneratorExpression { type: 'YieldGeneratorExpression'; }
    export interface AwaitExpression { type: 'AwaitExpression'; }

    export type Expression =
        ArrayExpression | ArrowExpression | AssignmentExpression | BinaryExpression |
        CallExpression | CompoundAssignmentExpression | ComputedMemberExpression |
        ConditionalExpression | FunctionExpression | IdentifierExpression |
        LiteralBooleanExpression | LiteralInfinityExpression | LiteralNullExpression |
        LiteralNumericExpression | LiteralRegExpExpression | LiteralStringExpression |
        NewExpression | ObjectExpression | StaticMemberExpression | ThisExpression |
        UnaryExpression | UpdateExpression | ClassExpression | NewTargetExpression |
        TemplateExpression | YieldExpression | YieldGeneratorExpression | AwaitExpression;

    export interface ParseResult {
        tree: Script;
        locations: WeakMap<object, SourceSpan>;
    }

    export interface ParseOptions {
        earlyErrors?: boolean;
    }

    export function parseScriptWithLocation(source: string, options?: ParseOptions): ParseResult;
}
