/**
 * Formula Alignment
 *
 * Rewrites model formulas so every term refers to a real dataset column.
 * Terms are split on the formula operators only; wrappers such as log(x) or
 * (a + b)^2 are not parsed and pass through as opaque terms.
 *
 * @example
 * ```typescript
 * const columns = buildColumnMap(['mass (g)', 'year', 'reclat']);
 *
 * rewriteFormula('Mass_G ~ year', columns);    // "`mass (g)` ~ year"
 * rewriteFormula('mass (g) ~ year', columns);  // "`mass (g)` ~ year"
 * rewriteFormula('mass ~ year', columns);      // throws ColumnNotFoundError
 * ```
 */

import _ from 'lodash';
import { buildColumnMap } from './columns.js';
import {
    FORMULA_OPERATORS,
    IDENTIFIER_CHAR_CLASS,
    QUOTE_CHAR,
    QUOTED_IDENTIFIER,
    QUOTED_SEGMENT_SOURCE,
    SAFE_IDENTIFIER,
} from './constants.js';
import { normalizeName } from './normalize.js';
import type { ColumnMap, ColumnMapOptions, ResolvedToken } from './types.js';
import { ColumnNotFoundError, MalformedFormulaError, consoleLogger } from './types.js';

// ============================================================================
// Tokenizing
// ============================================================================

/**
 * Extract the variable terms of a formula, in first-seen order
 *
 * @example
 * tokenizeFormula("y ~ a + b * a")          // ["y", "a", "b"]
 * tokenizeFormula("`a:b` ~ c")              // ["`a:b`", "c"]
 * tokenizeFormula("mass (g) ~ year:fall")   // ["mass (g)", "year", "fall"]
 */
export function tokenizeFormula(formula: string): string[] {
    const pieces: string[] = [];
    let current = '';
    let quoted = false;

    for (const char of formula) {
        if (char === QUOTE_CHAR) {
            quoted = !quoted;
        }

        if (!quoted && FORMULA_OPERATORS.has(char)) {
            pieces.push(current);
            current = '';
            continue;
        }

        current += char;
    }
    pieces.push(current);

    return _.uniq(pieces.map((piece) => piece.trim()).filter((piece) => piece !== ''));
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Quote a column name for use inside a formula when it is not a plain identifier
 *
 * @example
 * quoteIdentifier("year")        // "year"
 * quoteIdentifier("mass (g)")    // "`mass (g)`"
 * quoteIdentifier("`mass (g)`")  // "`mass (g)`"
 */
export function quoteIdentifier(name: string): string {
    if (SAFE_IDENTIFIER.test(name) || QUOTED_IDENTIFIER.test(name)) {
        return name;
    }
    return `${QUOTE_CHAR}${name}${QUOTE_CHAR}`;
}

/**
 * Resolve every formula term against the dataset's columns.
 * Fails on the first term with no matching column.
 */
export function resolveFormulaTokens(formula: string, columnMap: ColumnMap): ResolvedToken[] {
    const tokens = tokenizeFormula(formula);

    if (tokens.length === 0) {
        throw new MalformedFormulaError(formula);
    }

    return tokens.map((raw) => {
        const canonical = normalizeName(raw);
        const column = columnMap.resolve(canonical);

        if (column === undefined) {
            throw new ColumnNotFoundError(raw, canonical);
        }

        return { raw, canonical, column, replacement: quoteIdentifier(column) };
    });
}

// ============================================================================
// Rewriting
// ============================================================================

/** Replace whole-term occurrences of `token`, leaving other quoted segments alone */
function substituteToken(formula: string, token: string, replacement: string): string {
    const pattern = new RegExp(
        `${QUOTED_SEGMENT_SOURCE}|(?<!${IDENTIFIER_CHAR_CLASS})${_.escapeRegExp(token)}(?!${IDENTIFIER_CHAR_CLASS})`,
        'g'
    );

    return formula.replace(pattern, (match) => (match === token ? replacement : match));
}

export function rewriteFormula(formula: string, columnMap: ColumnMap): string {
    const tokens = resolveFormulaTokens(formula, columnMap);

    // Longest first, so "mass (g)" is quoted before "mass" can match inside it
    const ordered = _.sortBy(tokens, (token) => -token.raw.length);

    return ordered.reduce(
        (current, token) => substituteToken(current, token.raw, token.replacement),
        formula
    );
}

/**
 * Build the column map for `columnNames` and rewrite `formula` against it.
 * This is the entry point model-fitting tools call with their formula argument.
 */
export function alignFormula(
    formula: string,
    columnNames: readonly string[],
    options: ColumnMapOptions = {}
): string {
    const { logger = consoleLogger } = options;
    const aligned = rewriteFormula(formula, buildColumnMap(columnNames, { logger }));

    if (aligned !== formula) {
        logger.debug(`Aligned formula "${formula}" → "${aligned}"`);
    }

    return aligned;
}
