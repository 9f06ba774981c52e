/**
 * Column Map
 *
 * Canonical → raw header lookup for one dataset. The first header to claim a
 * canonical name keeps it; later ones are recorded as collisions.
 */

import { normalizeName } from './normalize.js';
import type { ColumnCollision, ColumnMap, ColumnMapOptions } from './types.js';
import { consoleLogger } from './types.js';

// ============================================================================
// Construction
// ============================================================================

export function buildColumnMap(
    rawNames: readonly string[],
    options: ColumnMapOptions = {}
): ColumnMap {
    const { logger = consoleLogger } = options;
    const entries = new Map<string, string>();
    const collisions: ColumnCollision[] = [];

    for (const raw of rawNames) {
        const canonical = normalizeName(raw);
        const kept = entries.get(canonical);

        if (kept === undefined) {
            entries.set(canonical, raw);
            continue;
        }

        collisions.push({ canonical, kept, dropped: raw });
        logger.warn(`Columns "${kept}" and "${raw}" both resolve to "${canonical}", using "${kept}"`);
    }

    return Object.freeze({
        entries: new Map(entries),
        collisions: Object.freeze(collisions),
        resolve: (canonical: string) => entries.get(canonical),
    });
}

/**
 * Resolve a user-supplied column name, whatever its spelling
 *
 * @example
 * resolveColumn("Mass (g)", buildColumnMap(["id", "mass_g"]))  // "mass_g"
 */
export function resolveColumn(name: string, columnMap: ColumnMap): string | undefined {
    return columnMap.resolve(normalizeName(name));
}

// ============================================================================
// Header Cleaning
// ============================================================================

export interface CleanedColumnNames {
    /** Cleaned headers, same order and length as the input */
    readonly names: string[];
    /** original → cleaned, only for headers that changed */
    readonly renamed: Record<string, string>;
}

/**
 * Standardize headers to canonical names, suffixing duplicates
 *
 * @example
 * cleanColumnNames(["Mass (g)", "mass_g", "year"]).names
 * // ["mass_g", "mass_g_2", "year"]
 */
export function cleanColumnNames(rawNames: readonly string[]): CleanedColumnNames {
    const used = new Set<string>();
    const names: string[] = [];
    const renamed: Record<string, string> = {};

    for (const raw of rawNames) {
        const base = normalizeName(raw) || 'x';
        let cleaned = base;

        for (let suffix = 2; used.has(cleaned); suffix++) {
            cleaned = `${base}_${suffix}`;
        }

        used.add(cleaned);
        names.push(cleaned);

        if (cleaned !== raw) {
            renamed[raw] = cleaned;
        }
    }

    return { names, renamed };
}
