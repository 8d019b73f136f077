
import * as assert from 'assert';
import * as S from './schema';

/**
 * Iteration over syntax trees with an explicit stack, for trees too deep
 * to walk with a recursive visitor.
 */

export function childrenOf(node: S.Node): Array<S.Node> {
    const children: Array<S.Node> = [];
    node.forEach(child => {
        children.push(child);
    });
    return children;
}

// Parents before children, children in source order.
export function* pre_order(root: S.Node): IterableIterator<S.Node> {
    const stack: Array<S.Node> = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) {
            break;
        }
        yield node;
        const children = childrenOf(node);
        for (let i = children.length - 1; i >= 0; i--) {
            stack.push(children[i]);
        }
    }
}

// Children before parents, children in source order.
export function* post_order(root: S.Node): IterableIterator<S.Node> {
    // Each entry holds a node and whether its children are already queued.
    const stack: Array<[S.Node, boolean]> = [[root, false]];
    while (stack.length > 0) {
        const top = stack.pop();
        if (top === undefined) {
            break;
        }
        const [node, expanded] = top;
        if (expanded) {
            yield node;
            continue;
        }
        stack.push([node, true]);
        const children = childrenOf(node);
        for (let i = children.length - 1; i >= 0; i--) {
            stack.push([children[i], false]);
        }
    }
}

export enum IterKind {
    Child = "Child",
    Done = "Done"
};

export class IterResult {
    kind: IterKind;
    node: S.Node | null;
    // Distance from the iteration root.
    depth: number;
    stepNo: number;

    constructor(params: {kind: IterKind, node: S.Node | null, depth: number}) {
        this.kind = params.kind;
        this.node = params.node;
        this.depth = params.depth;
        this.stepNo = -1;
    }

    static newChild(node: S.Node, depth: number): IterResult {
        return new IterResult({kind: IterKind.Child, node, depth});
    }
    static newDone(stepNo: number): IterResult {
        const result = new IterResult({kind: IterKind.Done,
                                       node: null, depth: -1});
        result.stepNo = stepNo;
        return result;
    }

    isChild(): boolean {
        return this.kind === IterKind.Child;
    }
    getChild(): S.Node {
        assert.ok(this.isChild() && this.node !== null, 'not a child entry');
        return this.node;
    }

    isDone(): boolean {
        return this.kind === IterKind.Done;
    }
}

export class DfsIter {
    readonly root: S.Node;
    curStack: Array<IterResult>;
    curEntry: IterResult | null;

    curStep: number;

    constructor(root: S.Node) {
        this.root = root;
        this.curStack = [IterResult.newChild(root, 0)];
        this.curEntry = null;
        this.curStep = 0;
    }

    // Protocol: call next(), then one of step() or cut() before
    // calling next() again.  Next pulls the next iteration item.
    // Step or Cut indicate whether to traverse the subtree under
    // the iteration element or not.
    next(): IterResult {
        assert.ok(this.curEntry === null, 'step() or cut() must follow next()');

        const entry = this.curStack.pop();
        if (entry === undefined) {
            return IterResult.newDone(this.curStep);
        }

        entry.stepNo = this.curStep++;
        this.curEntry = entry;
        return entry;
    }

    step() {
        assert.ok(this.curEntry !== null, 'step() without next()');
        const entry = this.curEntry;
        const children = childrenOf(entry.getChild());
        // Pushed in reverse so the first child is popped first.
        for (let i = children.length - 1; i >= 0; i--) {
            this.curStack.push(IterResult.newChild(children[i], entry.depth + 1));
        }
        this.curEntry = null;
    }

    cut() {
        assert.ok(this.curEntry !== null, 'cut() without next()');
        this.curEntry = null;
    }
}
