/**
 * Classification Rules
 *
 * Collapses raw categorical codes (e.g. meteorite classes such as "L6",
 * "H4/5", "Iron, IIAB") into a handful of stable labels.
 *
 * Rules are checked in order and the first match wins. A rule matches when the
 * code starts with one of its include patterns and contains none of its
 * exclude patterns. Patterns are regular expressions, compiled once and
 * matched case-insensitively.
 */

import _ from 'lodash';
import { buildColumnMap, resolveColumn } from './columns.js';
import { DEFAULT_LABEL, DEFAULT_LABEL_COLUMN, UNKNOWN_LABEL } from './constants.js';
import type {
    ClassificationRule,
    ClassificationRuleConfig,
    ClassificationRuleSet,
    Logger,
    Row,
} from './types.js';
import { RuleSetValidationError, consoleLogger } from './types.js';
import { isMissing } from './utils.js';

// ============================================================================
// Compilation
// ============================================================================

function compilePattern(
    source: string,
    anchored: boolean,
    location: string,
    issues: string[]
): RegExp | null {
    try {
        return new RegExp(anchored ? `^(?:${source})` : source, 'i');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        issues.push(`${location}: ${reason}`);
        return null;
    }
}

function compilePatterns(
    sources: readonly string[],
    anchored: boolean,
    location: string,
    issues: string[]
): RegExp[] {
    return sources
        .map((source, index) => compilePattern(source, anchored, `${location}.${index}`, issues))
        .filter((pattern): pattern is RegExp => pattern !== null);
}

export function compileRuleSet(
    configs: readonly ClassificationRuleConfig[],
    defaultLabel: string = DEFAULT_LABEL
): ClassificationRuleSet {
    const issues: string[] = [];

    const rules = configs.map((config, index): ClassificationRule => Object.freeze({
        include: compilePatterns(config.patterns, true, `${index}.patterns`, issues),
        exclude: compilePatterns(config.excludes ?? [], false, `${index}.excludes`, issues),
        label: config.scientific_type,
    }));

    if (issues.length > 0) {
        throw new RuleSetValidationError('Invalid classification pattern', issues);
    }

    return Object.freeze({ rules: Object.freeze(rules), defaultLabel });
}

// ============================================================================
// Matching
// ============================================================================

function ruleMatches(rule: ClassificationRule, code: string): boolean {
    return (
        rule.include.some((pattern) => pattern.test(code)) &&
        !rule.exclude.some((pattern) => pattern.test(code))
    );
}

/**
 * @example
 * classify("L6", meteoriteRules)         // "Chondrite (Ordinary)"
 * classify("Pallasite", meteoriteRules)  // rule set default
 * classify(null, meteoriteRules)         // "Unknown"
 */
export function classify(
    rawCode: string | null | undefined,
    ruleSet: ClassificationRuleSet
): string {
    if (_.isNil(rawCode) || rawCode.trim() === '') {
        return UNKNOWN_LABEL;
    }

    const code = rawCode.trim().toUpperCase();
    const match = ruleSet.rules.find((rule) => ruleMatches(rule, code));

    return match?.label ?? ruleSet.defaultLabel;
}

// ============================================================================
// Column Enrichment
// ============================================================================

export interface ClassifyColumnOptions {
    /** Column the labels are written to (default: scientific_type) */
    labelColumn?: string;
    logger?: Logger;
}

function toCode(value: unknown): string | null {
    if (isMissing(value)) return null;
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return null;
}

/**
 * Append a label column computed from `column` to every row.
 * Returns new row objects; with no rule set or no such column the rows pass
 * through unchanged.
 */
export function classifyColumn(
    rows: readonly Row[],
    column: string,
    ruleSet: ClassificationRuleSet | null,
    options: ClassifyColumnOptions = {}
): readonly Row[] {
    const { labelColumn = DEFAULT_LABEL_COLUMN, logger = consoleLogger } = options;

    if (ruleSet === null) {
        logger.warn(`No classification rules loaded, leaving "${column}" unclassified`);
        return rows;
    }

    const columnMap = buildColumnMap(_.uniq(rows.flatMap((row) => Object.keys(row))), { logger });
    const source = resolveColumn(column, columnMap);

    if (source === undefined) {
        logger.warn(`Column "${column}" not found, skipping classification`);
        return rows;
    }

    const labelled = rows.map((row) => ({
        ...row,
        [labelColumn]: classify(toCode(row[source]), ruleSet),
    }));

    const counts = _.countBy(labelled, (row) => row[labelColumn]);
    logger.debug(`Classified ${rows.length} rows from "${source}": ${JSON.stringify(counts)}`);

    return labelled;
}
