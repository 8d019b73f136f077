import * as assert from 'assert';
import * as S from './schema';
import { post_order } from './tree_iterator';

// Slots that may be emptied by `detach`, per node type. Array slots are
// always detachable.
const OPTIONAL_SLOTS: ReadonlyMap<string, ReadonlyArray<string>> = new Map([
    ['FunctionNode', ['name']],
    ['IfStatement', ['otherwise']],
    ['BreakStatement', ['label']],
    ['ContinueStatement', ['label']],
    ['SwitchCase', ['expression']],
    ['ReturnStatement', ['argument']],
    ['TryStatement', ['handler', 'finalizer']],
    ['ForStatement', ['init', 'condition', 'update']],
    ['VariableDeclarator', ['init']],
]);

export function attach<C extends S.Node>(parent: S.Node, child: C): C {
    child.parent = parent;
    return child;
}

// Where a child sits in its parent: a field, or an index into a list field.
interface Slot {
    key: string;
    index: number | null;
}

function requireParent(node: S.Node): S.Node {
    const parent = node.parent;
    assert.ok(parent !== null, `${node} has no parent`);
    return parent;
}

function findSlot(parent: S.Node, node: S.Node): Slot {
    for (const key of Object.keys(parent)) {
        if (key === 'parent') {
            continue;
        }
        const value: unknown = Reflect.get(parent, key);
        if (value === node) {
            return {key, index: null};
        }
        if (Array.isArray(value)) {
            const index = value.indexOf(node);
            if (index !== -1) {
                return {key, index};
            }
        }
    }
    return assert.fail(`${node} is not a child of its parent ${parent}`);
}

function fillSlot(parent: S.Node, slot: Slot, replacement: S.Node): void {
    const value: unknown = Reflect.get(parent, slot.key);
    if (slot.index !== null && Array.isArray(value)) {
        value[slot.index] = replacement;
    } else {
        Reflect.set(parent, slot.key, replacement);
    }
}

// True if `node` is `ancestor` or lies below it.
function isWithin(node: S.Node, ancestor: S.Node): boolean {
    for (let cur: S.Node | null = node; cur !== null; cur = cur.parent) {
        if (cur === ancestor) {
            return true;
        }
    }
    return false;
}

/**
 * Puts `replacement` in the slot of `parent` that holds `old`, and fixes
 * up both parent pointers. A replacement still attached elsewhere is
 * detached from there first. The caller is responsible for the
 * replacement being of a kind the slot accepts.
 */
export function replaceNode<N extends S.Node>(old: S.Node, replacement: N): N {
    const parent = requireParent(old);
    // Fails fast if `parent` does not hold `old`.
    findSlot(parent, old);
    if (replacement === old) {
        return replacement;
    }
    assert.ok(!isWithin(parent, replacement),
              `${replacement} encloses ${old} and cannot replace it`);
    if (replacement.parent !== null) {
        detach(replacement);
    }
    // Detaching a sibling can shift list indices, so look again.
    fillSlot(parent, findSlot(parent, old), replacement);
    old.parent = null;
    replacement.parent = parent;
    return replacement;
}

// Removes `node` from a list or optional slot of its parent.
export function detach(node: S.Node): void {
    const parent = requireParent(node);
    const slot = findSlot(parent, node);
    const value: unknown = Reflect.get(parent, slot.key);
    if (slot.index !== null && Array.isArray(value)) {
        value.splice(slot.index, 1);
    } else {
        const optional = OPTIONAL_SLOTS.get(parent.type) ?? [];
        assert.ok(optional.indexOf(slot.key) !== -1,
                  `${parent}.${slot.key} cannot be left empty`);
        if (parent instanceof S.TryStatement) {
            const other = slot.key === 'handler' ? parent.finalizer : parent.handler;
            assert.ok(other !== null,
                      'try statement needs a catch clause or a finally block');
        }
        Reflect.set(parent, slot.key, null);
    }
    node.parent = null;
}

// Points every child in the subtree at the node that encloses it.
export function setParentPointers(root: S.Node): void {
    const stack: Array<S.Node> = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) {
            break;
        }
        node.forEach(child => {
            child.parent = node;
            stack.push(child);
        });
    }
}

/**
 * Throws if a child's parent pointer is not the node enumerating it, or if
 * some node is reachable twice (a cycle, or a subtree shared between two
 * parents).
 */
export function checkTree(root: S.Node): void {
    const seen = new Set<S.Node>([root]);
    const stack: Array<S.Node> = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) {
            break;
        }
        node.forEach(child => {
            if (seen.has(child)) {
                throw Error(`${child} is reachable twice`);
            }
            if (child.parent !== node) {
                throw Error(`${child} is a child of ${node} but has parent ${child.parent}`);
            }
            seen.add(child);
            stack.push(child);
        });
    }
}

/**
 * Rewrites the tree bottom-up: `f` sees each node after all of its
 * children, and whatever it returns takes the node's place. `f` may wrap
 * the node it is given in a new parent; the wrapper goes where the node
 * was.
 */
export function rewriteAst(root: S.Node, f: (node: S.Node) => S.Node): S.Node {
    let result: S.Node = root;
    for (const node of post_order(root)) {
        // Recorded before `f` runs, since a wrapper takes over `node.parent`.
        const parent = node.parent;
        const slot = parent !== null ? findSlot(parent, node) : null;
        const replacement = f(node);
        if (node === root) {
            result = replacement;
        }
        if (replacement === node || parent === null || slot === null) {
            continue;
        }
        fillSlot(parent, slot, replacement);
        if (node.parent === parent) {
            node.parent = null;
        }
        replacement.parent = parent;
    }
    return result;
}
