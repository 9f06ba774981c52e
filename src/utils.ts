/**
 * dataset-resolver - Utilities
 *
 * Cell-value helpers shared by cleaning and classification.
 */

import _ from 'lodash';

/**
 * Empty cell as produced by the CSV loader
 *
 * @example
 * isMissing(null)  // true
 * isMissing('')    // true
 * isMissing(NaN)   // true
 * isMissing(0)     // false
 */
export function isMissing(value: unknown): boolean {
    return _.isNil(value) || value === '' || (typeof value === 'number' && Number.isNaN(value));
}
