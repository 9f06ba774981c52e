/**
 * dataset-resolver - Constants & Patterns
 *
 * Labels, quoting rules and formula delimiters shared across modules.
 */

// ============================================================================
// Classification Labels
// ============================================================================

/** Returned for missing codes, distinct from any rule set's default */
export const UNKNOWN_LABEL = 'Unknown';

/** Fallback label when a rule set does not name its own */
export const DEFAULT_LABEL = 'Other';

/** Column appended to rows by classification */
export const DEFAULT_LABEL_COLUMN = 'scientific_type';

// ============================================================================
// Formula Syntax
// ============================================================================

export const QUOTE_CHAR = '`';

/** Formula operators that separate variable terms */
export const FORMULA_OPERATORS = new Set(['~', '+', '*', ':']);

/** Names made only of these characters are used unquoted */
export const SAFE_IDENTIFIER = /^[A-Za-z0-9_.]+$/;

/** Already wrapped in backticks */
export const QUOTED_IDENTIFIER = /^`.*`$/;

/** Characters that may not touch a substituted token on either side */
export const IDENTIFIER_CHAR_CLASS = '[A-Za-z0-9_.]';

/** A complete backtick-quoted segment inside a formula */
export const QUOTED_SEGMENT_SOURCE = '`[^`]*`';

// ============================================================================
// Configuration
// ============================================================================

/** Environment variable naming the classification rules file */
export const RULES_PATH_ENV = 'DATASET_RESOLVER_RULES';

/** Bundled rules, relative to the package root */
export const BUNDLED_RULES_FILE = 'rules/meteorite-classes.json';
