import type { SemanticModel } from './types';

import { isRecord } from './guards';
import { Logger } from './logger';
import { reportInvalidOption } from './report';

/**
 * Options accepted by {@link tryBuildRewrite} and {@link getRefactoring}.
 */
export interface RewriteOptions {
  /** Answers constant-value and symbol questions about the tree. */
  semanticModel: SemanticModel;

  /**
   * Receives one entry per attempt: `debug` for each reason no rewrite was
   * produced, `info` for a produced rewrite.
   * Default: a silent logger at `warn`.
   */
  logger?: Logger;

  /** Checked once before any work starts. */
  signal?: AbortSignal;
}

export type ResolvedRewriteOptions = Required<Pick<RewriteOptions, 'semanticModel' | 'logger'>> &
  Pick<RewriteOptions, 'signal'>;

function isSemanticModel(value: unknown): value is SemanticModel {
  return (
    isRecord(value) &&
    typeof value.getConstantValue === 'function' &&
    typeof value.getSymbolInfo === 'function'
  );
}

/**
 * Validates options and fills in defaults.
 *
 * @throws {Error} When the semantic model is missing or malformed
 */
export function normalizeOptions(options: RewriteOptions): ResolvedRewriteOptions {
  if (!isSemanticModel(options.semanticModel)) {
    return reportInvalidOption(
      'semanticModel',
      'expected an object with getConstantValue and getSymbolInfo'
    );
  }
  if (options.logger !== undefined && !(options.logger instanceof Logger)) {
    return reportInvalidOption('logger', 'expected a Logger instance');
  }

  return {
    semanticModel: options.semanticModel,
    logger: options.logger ?? new Logger('warn'),
    signal: options.signal
  };
}
