export * from './schema';
export * from './visitor';
export { DfsIter, IterKind, IterResult, childrenOf, pre_order, post_order } from './tree_iterator';
export { attach, checkTree, detach, replaceNode, rewriteAst, setParentPointers } from './ast_util';
export { Importer, UnsupportedSyntaxError, parseProgram } from './parse_js';
export { debugPrint, nodeStats } from './debug_print';
