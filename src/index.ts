/**
 * dataset-resolver
 *
 * Column-name and category resolution for agent-driven statistical tools.
 *
 * @example
 * ```typescript
 * import { alignFormula, loadRuleSet, cleanDataset } from 'dataset-resolver';
 *
 * // Formula terms written against drifting header names
 * alignFormula('Mass (G) ~ year + reclat', ['mass (g)', 'year', 'reclat']);
 * // "`mass (g)` ~ year + reclat"
 *
 * // Cleaning pass with a classification column
 * const ruleSet = loadRuleSet();
 * const { rows, columnMap } = cleanDataset(data, {
 *     naColumns: ['mass (g)'],
 *     classification: { column: 'recclass', ruleSet },
 * });
 * ```
 */

export { normalizeName } from './normalize.js';
export { buildColumnMap, cleanColumnNames, resolveColumn } from './columns.js';
export type { CleanedColumnNames } from './columns.js';
export {
    alignFormula,
    quoteIdentifier,
    resolveFormulaTokens,
    rewriteFormula,
    tokenizeFormula,
} from './formula.js';
export { classify, classifyColumn, compileRuleSet } from './classify.js';
export type { ClassifyColumnOptions } from './classify.js';
export { loadRuleSet, parseRuleFile, readRuleSetFile, resolveRuleSetPath } from './config.js';
export type { LoadRuleSetOptions, ValidatedRuleFile } from './config.js';
export { cleanDataset, filterByFrequency } from './clean.js';
export type {
    ClassificationStep,
    CleanDatasetOptions,
    CleanResult,
    FilterByFrequencyOptions,
    FrequencyResult,
} from './clean.js';
export {
    DEFAULT_LABEL,
    DEFAULT_LABEL_COLUMN,
    RULES_PATH_ENV,
    UNKNOWN_LABEL,
} from './constants.js';
export {
    ClassificationConfigMissingError,
    ColumnNotFoundError,
    InvalidArgumentsError,
    MalformedFormulaError,
    RuleSetValidationError,
    consoleLogger,
    silentLogger,
} from './types.js';
export type {
    ClassificationRule,
    ClassificationRuleConfig,
    ClassificationRuleSet,
    ColumnCollision,
    ColumnMap,
    ColumnMapOptions,
    Logger,
    ResolvedToken,
    Row,
    VariableToken,
} from './types.js';
