import { describe, expect, it, vi } from 'vitest';
import { buildColumnMap } from '../src/columns.js';
import {
    alignFormula,
    quoteIdentifier,
    resolveFormulaTokens,
    rewriteFormula,
    tokenizeFormula,
} from '../src/formula.js';
import type { Logger } from '../src/types.js';
import { ColumnNotFoundError, MalformedFormulaError, silentLogger } from '../src/types.js';

function columns(...names: string[]) {
    return buildColumnMap(names, { logger: silentLogger });
}

describe('tokenizeFormula', () => {
    it('splits on formula operators and dedupes in first-seen order', () => {
        expect(tokenizeFormula('y ~ a + b * a')).toEqual(['y', 'a', 'b']);
        expect(tokenizeFormula('mass (g) ~ year:fall')).toEqual(['mass (g)', 'year', 'fall']);
    });

    it('keeps backtick-quoted names whole', () => {
        expect(tokenizeFormula('`a:b` ~ c')).toEqual(['`a:b`', 'c']);
    });

    it('passes wrapped terms through as single tokens', () => {
        expect(tokenizeFormula('log(mass) ~ year')).toEqual(['log(mass)', 'year']);
    });

    it('drops empty pieces', () => {
        expect(tokenizeFormula('y ~ ')).toEqual(['y']);
        expect(tokenizeFormula(' ~ + :')).toEqual([]);
    });
});

describe('quoteIdentifier', () => {
    it('leaves plain identifiers alone', () => {
        expect(quoteIdentifier('year')).toBe('year');
        expect(quoteIdentifier('log.mass_2')).toBe('log.mass_2');
    });

    it('quotes names with other characters once', () => {
        expect(quoteIdentifier('mass (g)')).toBe('`mass (g)`');
        expect(quoteIdentifier('`mass (g)`')).toBe('`mass (g)`');
    });
});

describe('resolveFormulaTokens', () => {
    it('returns the column and replacement for each term', () => {
        expect(resolveFormulaTokens('mass (g) ~ year', columns('mass (g)', 'year'))).toEqual([
            { raw: 'mass (g)', canonical: 'mass_g', column: 'mass (g)', replacement: '`mass (g)`' },
            { raw: 'year', canonical: 'year', column: 'year', replacement: 'year' },
        ]);
    });
});

describe('rewriteFormula', () => {
    it('quotes a header with spaces and leaves plain names unquoted', () => {
        expect(rewriteFormula('mass (g) ~ year', columns('mass (g)', 'year'))).toBe('`mass (g)` ~ year');
    });

    it('maps drifted spellings onto the real header', () => {
        expect(rewriteFormula('Mass_G ~ year', columns('mass (g)', 'year'))).toBe('`mass (g)` ~ year');
        expect(rewriteFormula('`Mass (G)` ~ year', columns('mass (g)', 'year'))).toBe('`mass (g)` ~ year');
    });

    it('is the identity for canonical names', () => {
        const formula = 'mass_g ~ year + fall';
        expect(rewriteFormula(formula, columns('mass_g', 'year', 'fall'))).toBe(formula);
    });

    it('is idempotent', () => {
        const map = columns('mass (g)', 'year', 'Rec Class');
        const once = rewriteFormula('mass_g ~ year * rec_class', map);

        expect(once).toBe('`mass (g)` ~ year * `Rec Class`');
        expect(rewriteFormula(once, map)).toBe(once);
    });

    it('ignores columns the formula does not use', () => {
        expect(rewriteFormula('y ~ x1 + x2', columns('y', 'x1', 'x2', 'x3'))).toBe('y ~ x1 + x2');
        expect(rewriteFormula('y ~ x1 + x2', columns('y', 'x1', 'x2'))).toBe('y ~ x1 + x2');
    });

    it('fails on the first term with no matching column', () => {
        const map = columns('y', 'x1', 'x2');

        expect(() => rewriteFormula('y ~ x1 + x3', map)).toThrowError(ColumnNotFoundError);
        expect(() => rewriteFormula('y ~ x1 + x3', map)).toThrowError(
            'Variable "x3" does not match any column in the data'
        );
    });

    it('reports the offending token on the error', () => {
        try {
            rewriteFormula('Mass ~ year', columns('mass (g)', 'year'));
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ColumnNotFoundError);
            if (error instanceof ColumnNotFoundError) {
                expect(error.token).toBe('Mass');
                expect(error.canonical).toBe('mass');
            }
        }
    });

    it('rejects formulas without variables', () => {
        expect(() => rewriteFormula(' ~ ', columns('y'))).toThrowError(MalformedFormulaError);
    });

    it('does not substitute inside names already quoted', () => {
        const map = columns('Mass', 'mass (g)', 'year');
        expect(rewriteFormula('mass (g) ~ mass + year', map)).toBe('`mass (g)` ~ Mass + year');
    });

    it('only replaces whole terms', () => {
        const map = columns('VAR1', 'VAR10', 'y');
        expect(rewriteFormula('y ~ var1 + var10', map)).toBe('y ~ VAR1 + VAR10');
    });

    it('rewrites every occurrence in interaction terms', () => {
        const map = columns('body mass', 'sex', 'island');
        expect(rewriteFormula('body mass ~ sex * island + sex:island', map)).toBe(
            '`body mass` ~ sex * island + sex:island'
        );
    });
});

describe('alignFormula', () => {
    it('builds the column map from headers and logs the rewrite', () => {
        const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

        expect(alignFormula('Mass (G) ~ year', ['mass (g)', 'year'], { logger })).toBe('`mass (g)` ~ year');
        expect(logger.debug).toHaveBeenCalledWith('Aligned formula "Mass (G) ~ year" → "`mass (g)` ~ year"');
    });

    it('logs nothing when the formula is already aligned', () => {
        const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

        expect(alignFormula('y ~ x', ['x', 'y'], { logger })).toBe('y ~ x');
        expect(logger.debug).not.toHaveBeenCalled();
    });
});
