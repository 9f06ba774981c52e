/**
 * Dataset Cleaning
 *
 * The cleaning pass run before analysis: standardize headers, drop incomplete
 * or zero rows, keep a numeric range, and optionally append a classification
 * label column. Column arguments may use any spelling of a header.
 */

import _ from 'lodash';
import { z } from 'zod';
import { classifyColumn } from './classify.js';
import { buildColumnMap, cleanColumnNames, resolveColumn } from './columns.js';
import { normalizeName } from './normalize.js';
import type { ClassificationRuleSet, ColumnMap, Logger, Row } from './types.js';
import { ColumnNotFoundError, InvalidArgumentsError, consoleLogger } from './types.js';
import { isMissing } from './utils.js';

// ============================================================================
// Argument Validation
// ============================================================================

const CleanArgsSchema = z
    .object({
        cleanColumnNames: z.boolean().default(true),
        naColumns: z.array(z.string()).default([]),
        zeroColumns: z.array(z.string()).default([]),
        filterColumn: z.string().optional(),
        min: z.number().finite().optional(),
        max: z.number().finite().optional(),
    })
    .refine((args) => args.min === undefined || args.max === undefined || args.min <= args.max, {
        message: 'min must not be greater than max',
        path: ['min'],
    });

const FrequencyArgsSchema = z.object({
    minCount: z.number().int().min(0).optional(),
    topN: z.number().int().min(1).optional(),
});

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, context: string): T {
    const result = schema.safeParse(input);

    if (!result.success) {
        const issues = result.error.issues.map((issue) => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        });
        throw new InvalidArgumentsError(`Invalid ${context} arguments`, issues);
    }

    return result.data;
}

// ============================================================================
// Helpers
// ============================================================================

function collectHeaders(rows: readonly Row[]): string[] {
    return _.uniq(rows.flatMap((row) => Object.keys(row)));
}

function isNumericColumn(rows: readonly Row[], column: string): boolean {
    const present = rows.map((row) => row[column]).filter((value) => !isMissing(value));
    return present.length > 0 && present.every((value) => typeof value === 'number');
}

function resolveKnownColumns(names: readonly string[], columnMap: ColumnMap, logger: Logger): string[] {
    return names.flatMap((name) => {
        const column = resolveColumn(name, columnMap);
        if (column === undefined) {
            logger.debug(`Ignoring unknown column "${name}"`);
            return [];
        }
        return [column];
    });
}

// ============================================================================
// Cleaning
// ============================================================================

export interface ClassificationStep {
    /** Column holding the raw codes */
    column: string;
    /** `null` when the rules file was missing; rows then pass through */
    ruleSet: ClassificationRuleSet | null;
    labelColumn?: string;
}

export interface CleanDatasetOptions {
    /** Rename headers to canonical names (default: true) */
    cleanColumnNames?: boolean;
    /** Drop rows with a missing value in any of these columns */
    naColumns?: string[];
    /** Drop rows with a 0 or a missing value in any of these numeric columns */
    zeroColumns?: string[];
    /** Keep rows with min <= value <= max in this numeric column */
    filterColumn?: string;
    min?: number;
    max?: number;
    classification?: ClassificationStep;
    logger?: Logger;
}

export interface CleanResult {
    readonly rows: readonly Row[];
    readonly rowsRemoved: number;
    readonly finalShape: readonly [rows: number, columns: number];
    /** original → cleaned header, only for headers that changed */
    readonly columnMap: Readonly<Record<string, string>>;
}

export function cleanDataset(rows: readonly Row[], options: CleanDatasetOptions = {}): CleanResult {
    const { classification, logger = consoleLogger, ...rawArgs } = options;
    const args = parseArgs(CleanArgsSchema, rawArgs, 'clean');

    const headers = collectHeaders(rows);
    let names = headers;
    let renamed: Record<string, string> = {};
    let current: readonly Row[] = rows;

    if (args.cleanColumnNames) {
        ({ names, renamed } = cleanColumnNames(headers));
        current = rows.map((row) => _.zipObject(names, headers.map((header) => row[header])));
    }

    const columnMap = buildColumnMap(names, { logger });

    const naColumns = resolveKnownColumns(args.naColumns, columnMap, logger);
    if (naColumns.length > 0) {
        current = current.filter((row) => naColumns.every((column) => !isMissing(row[column])));
    }

    for (const column of resolveKnownColumns(args.zeroColumns, columnMap, logger)) {
        if (isNumericColumn(current, column)) {
            current = current.filter((row) => !isMissing(row[column]) && row[column] !== 0);
        }
    }

    const { filterColumn, min, max } = args;
    if (filterColumn !== undefined && min !== undefined && max !== undefined) {
        const column = resolveColumn(filterColumn, columnMap);

        if (column !== undefined && isNumericColumn(current, column)) {
            current = current.filter((row) => {
                const value = row[column];
                return typeof value === 'number' && value >= min && value <= max;
            });
        } else {
            logger.debug(`Skipping range filter on "${filterColumn}": not a numeric column`);
        }
    }

    const rowsRemoved = rows.length - current.length;

    if (classification !== undefined) {
        current = classifyColumn(current, classification.column, classification.ruleSet, {
            logger,
            ...(classification.labelColumn !== undefined && { labelColumn: classification.labelColumn }),
        });
    }

    const columnCount = current.length > 0 ? collectHeaders(current).length : names.length;
    logger.info(`Cleaned dataset: ${current.length} rows kept, ${rowsRemoved} removed`);

    return {
        rows: current,
        rowsRemoved,
        finalShape: [current.length, columnCount],
        columnMap: renamed,
    };
}

// ============================================================================
// Frequency Filter
// ============================================================================

export interface FilterByFrequencyOptions {
    /** Keep groups with at least this many rows */
    minCount?: number;
    /** Keep only the N most frequent groups */
    topN?: number;
    logger?: Logger;
}

export interface FrequencyResult {
    readonly rows: readonly Row[];
    readonly retainedGroups: readonly unknown[];
    readonly retainedRows: number;
}

/**
 * Keep rows whose group is among the most frequent. `topN` is applied before
 * `minCount`; groups with equal counts keep their order of first appearance,
 * whatever their values.
 */
export function filterByFrequency(
    rows: readonly Row[],
    groupColumn: string,
    options: FilterByFrequencyOptions = {}
): FrequencyResult {
    const { logger = consoleLogger, ...rawArgs } = options;
    const { minCount, topN } = parseArgs(FrequencyArgsSchema, rawArgs, 'frequency filter');
    const column = resolveColumn(groupColumn, buildColumnMap(collectHeaders(rows), { logger }));

    if (column === undefined) {
        throw new ColumnNotFoundError(groupColumn, normalizeName(groupColumn));
    }

    const counts = new Map<unknown, number>();
    for (const row of rows) {
        counts.set(row[column], (counts.get(row[column]) ?? 0) + 1);
    }

    let kept = _.orderBy([...counts.entries()], ([, count]) => count, 'desc');
    if (topN !== undefined) {
        kept = kept.slice(0, topN);
    }
    if (minCount !== undefined) {
        kept = kept.filter(([, count]) => count >= minCount);
    }

    const retainedGroups = kept.map(([group]) => group);
    const retained = new Set(retainedGroups);
    const filtered = rows.filter((row) => retained.has(row[column]));
    logger.info(`Kept ${retainedGroups.length} of ${counts.size} "${column}" groups (${filtered.length} rows)`);

    return { rows: filtered, retainedGroups, retainedRows: filtered.length };
}
