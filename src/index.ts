export type * from './types';

export {
  USE_RECURSIVE_PATTERNS_TITLE,
  getRefactoring,
  tryBuildRewrite
} from './rewrite';
export type { Refactoring, ReplacementFunc, RewriteRequest } from './rewrite';

export { normalizeOptions } from './options';
export type { ResolvedRewriteOptions, RewriteOptions } from './options';

export { DEFAULT_MAX_ENTRIES, LOG_LEVELS, Logger, isLogLevel } from './logger';
export type { LogContext, LogEntry, LogLevel } from './logger';

export { RewriteInvariantError } from './report';

export { classifyTerm } from './receiver/classify';
export type { ClassifiedTerm, ClassifyMode, Target } from './receiver/classify';
export { composeChain, decomposeChain } from './receiver/decompose';
export type { ChainDecomposition, ChainName } from './receiver/decompose';
export { resolveCommonReceiver } from './receiver/common-receiver';
export type { CommonReceiver } from './receiver/common-receiver';
export { createPattern, createSubpattern, wrapInSubpatterns } from './pattern/synthesize';
export { findVariableDesignation } from './pattern/designation';
export type { ContainingPattern, DesignationMatch } from './pattern/designation';
export { rewriteContainingPattern } from './pattern/merge';
export { canFoldNullSafeTest, matchesNull } from './pattern/null-match';
export { createSemanticSession } from './semantic/session';
export type { SemanticSession } from './semantic/session';

export { UNRESOLVED, resolved } from './semantic/constants';
export { createSymbolTableModel, memberSymbol } from './semantic/symbol-table-model';
export type { SymbolTable } from './semantic/symbol-table-model';

export * from './syntax/factory';
export { areEquivalent, findFirstDifference } from './syntax/equivalence';
export {
  getNodeAtPath,
  parentPath,
  replaceAtPath,
  stringifySyntaxPath
} from './syntax/path';
export { printExpression, printNode, printPattern, printStatement } from './syntax/print';
export { isLogicalAnd, isPattern, isPatternKind, isSyntaxNode } from './guards';
