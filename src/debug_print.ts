import * as S from './schema';
import { BaseVisitor1 } from './visitor';
import { pre_order } from './tree_iterator';

// Collects one indented line per node; the argument is the depth.
class OutlinePrinter extends BaseVisitor1<void, number> {
    readonly lines: Array<string> = [];

    defaultNode(node: S.Node, depth: number): void {
        this.lines.push('  '.repeat(depth) + node.toString());
        node.forEach(child => {
            this.visit(child, depth + 1);
        });
    }

    // Resolved variables show the scope they belong to.
    visitName(node: S.Name, depth: number): void {
        const scope = node.scope !== null ? ` -> ${node.scope}` : '';
        this.lines.push('  '.repeat(depth) + node.value + scope);
    }
}

export function debugPrint(root: S.Node): string {
    const printer = new OutlinePrinter();
    printer.visit(root, 0);
    return printer.lines.join('\n');
}

// Number of nodes of each type, sorted by type.
export function nodeStats(root: S.Node): Array<[string, number]> {
    const counts = new Map<string, number>();
    for (const node of pre_order(root)) {
        counts.set(node.type, (counts.get(node.type) ?? 0) + 1);
    }
    return Array.from(counts.entries()).sort((a, b) => a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0);
}
