/**
 * Rule Set Configuration
 *
 * Finds, reads and validates the classification rules file. The engine itself
 * never looks for files: callers resolve a path here and pass the compiled
 * rule set in.
 *
 * Accepted file shapes:
 * ```json
 * [{ "patterns": ["L", "H"], "excludes": ["LL"], "scientific_type": "Chondrite" }]
 * ```
 * or
 * ```json
 * { "defaultLabel": "Stony (Other)", "rules": [ ... ] }
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { compileRuleSet } from './classify.js';
import { BUNDLED_RULES_FILE, DEFAULT_LABEL, RULES_PATH_ENV } from './constants.js';
import type { ClassificationRuleSet, Logger } from './types.js';
import {
    ClassificationConfigMissingError,
    RuleSetValidationError,
    consoleLogger,
} from './types.js';

// ============================================================================
// Schema
// ============================================================================

const RuleSchema = z.object({
    patterns: z.array(z.string().min(1)).min(1),
    excludes: z.array(z.string().min(1)).optional().default([]),
    scientific_type: z.string().min(1),
});

const RuleListSchema = z.array(RuleSchema);

const RuleFileObjectSchema = z.object({
    defaultLabel: z.string().min(1).optional(),
    rules: RuleListSchema,
});

export type ValidatedRuleFile =
    | z.infer<typeof RuleListSchema>
    | z.infer<typeof RuleFileObjectSchema>;

function formatZodErrors(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

// ============================================================================
// Path Discovery
// ============================================================================

const packageRoot = join(dirname(fileURLToPath(import.meta.url)), '..');

/**
 * Rules path from the environment, else the rules bundled with the package
 */
export function resolveRuleSetPath(env: NodeJS.ProcessEnv = process.env): string {
    const configured = env[RULES_PATH_ENV];
    if (configured !== undefined && configured.trim() !== '') {
        return resolve(configured);
    }
    return join(packageRoot, BUNDLED_RULES_FILE);
}

// ============================================================================
// Loading
// ============================================================================

export function parseRuleFile(raw: string, source: string): ValidatedRuleFile {
    let parsed: unknown;

    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new RuleSetValidationError(`Invalid JSON in ${source}`, ['Failed to parse JSON']);
    }

    const result = Array.isArray(parsed)
        ? RuleListSchema.safeParse(parsed)
        : RuleFileObjectSchema.safeParse(parsed);

    if (!result.success) {
        throw new RuleSetValidationError(`${source} validation failed`, formatZodErrors(result.error));
    }

    return result.data;
}

/**
 * Read and compile a rules file. Throws ClassificationConfigMissingError when
 * the file does not exist.
 */
export function readRuleSetFile(path: string, defaultLabel?: string): ClassificationRuleSet {
    if (!existsSync(path)) {
        throw new ClassificationConfigMissingError(path);
    }

    const file = parseRuleFile(readFileSync(path, 'utf-8'), path);

    if (Array.isArray(file)) {
        return compileRuleSet(file, defaultLabel ?? DEFAULT_LABEL);
    }

    return compileRuleSet(file.rules, defaultLabel ?? file.defaultLabel ?? DEFAULT_LABEL);
}

export interface LoadRuleSetOptions {
    /** Rules file (default: resolveRuleSetPath()) */
    path?: string;
    /** Overrides the file's own default label */
    defaultLabel?: string;
    logger?: Logger;
}

/**
 * Load the classification rules. A missing file is not an error: it is logged
 * and `null` is returned so cleaning can continue without classification.
 */
export function loadRuleSet(options: LoadRuleSetOptions = {}): ClassificationRuleSet | null {
    const { path = resolveRuleSetPath(), defaultLabel, logger = consoleLogger } = options;

    try {
        const ruleSet = readRuleSetFile(path, defaultLabel);
        logger.info(`Loaded ${ruleSet.rules.length} classification rules from ${path}`);
        return ruleSet;
    } catch (error) {
        if (error instanceof ClassificationConfigMissingError) {
            logger.warn(`${error.message}, classification will be skipped`);
            return null;
        }
        throw error;
    }
}
