/**
 * dataset-resolver - Type Definitions
 *
 * Column lookups, formula tokens and classification rule sets.
 */

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const LOG_PREFIX = 'dataset-resolver:';

export const consoleLogger: Logger = {
    debug: (message) => console.debug(`${LOG_PREFIX} ${message}`),
    info: (message) => console.log(`${LOG_PREFIX} ${message}`),
    warn: (message) => console.warn(`${LOG_PREFIX} ${message}`),
    error: (message) => console.error(`${LOG_PREFIX} ${message}`),
};

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

// ============================================================================
// Column Map
// ============================================================================

/** Two raw headers that normalize to the same canonical name */
export interface ColumnCollision {
    readonly canonical: string;
    readonly kept: string;
    readonly dropped: string;
}

export interface ColumnMap {
    /** Canonical name → raw header, in header order. A copy; `resolve` is unaffected by edits */
    readonly entries: ReadonlyMap<string, string>;
    readonly collisions: readonly ColumnCollision[];
    resolve(canonical: string): string | undefined;
}

export interface ColumnMapOptions {
    logger?: Logger;
}

// ============================================================================
// Formula Tokens
// ============================================================================

export interface VariableToken {
    /** Token text exactly as written in the formula */
    readonly raw: string;
    readonly canonical: string;
}

export interface ResolvedToken extends VariableToken {
    /** Dataset header the token resolved to */
    readonly column: string;
    /** Text substituted into the formula (quoted when needed) */
    readonly replacement: string;
}

// ============================================================================
// Classification
// ============================================================================

/** One rule as written in the configuration file */
export interface ClassificationRuleConfig {
    readonly patterns: readonly string[];
    readonly excludes?: readonly string[];
    readonly scientific_type: string;
}

export interface ClassificationRule {
    readonly include: readonly RegExp[];
    readonly exclude: readonly RegExp[];
    readonly label: string;
}

export interface ClassificationRuleSet {
    readonly rules: readonly ClassificationRule[];
    readonly defaultLabel: string;
}

// ============================================================================
// Rows
// ============================================================================

export type Row = Record<string, unknown>;

// ============================================================================
// Errors
// ============================================================================

export class ColumnNotFoundError extends Error {
    public readonly name = 'ColumnNotFoundError' as const;

    constructor(
        public readonly token: string,
        public readonly canonical: string
    ) {
        super(`Variable "${token}" does not match any column in the data`);
    }
}

export class MalformedFormulaError extends Error {
    public readonly name = 'MalformedFormulaError' as const;

    constructor(public readonly formula: string) {
        super(`Formula "${formula}" contains no variables`);
    }
}

export class ClassificationConfigMissingError extends Error {
    public readonly name = 'ClassificationConfigMissingError' as const;

    constructor(public readonly path: string) {
        super(`Classification rules not found at ${path}`);
    }
}

export class InvalidArgumentsError extends Error {
    public readonly name = 'InvalidArgumentsError' as const;

    constructor(
        message: string,
        public readonly issues: readonly string[]
    ) {
        super(`${message}: ${issues.join('; ')}`);
    }
}

export class RuleSetValidationError extends Error {
    public readonly name = 'RuleSetValidationError' as const;

    constructor(
        message: string,
        public readonly issues: readonly string[]
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    }
}
