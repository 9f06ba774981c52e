/**
 * Name Normalization
 *
 * Maps any header or formula term to a canonical lookup key.
 *
 * @example
 * normalizeName("Mass (g)")      // "mass_g"
 * normalizeName("Fall %")        // "fall_percent"
 * normalizeName("Finder's Name") // "finders_name"
 * normalizeName("__GeoLocation") // "geolocation"
 */
export function normalizeName(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/['’]/g, '')
        .replace(/%/g, 'percent')
        .replace(/[^a-z0-9_]+/g, '_')
        .replace(/_+/g, '_')
        .replace(/^_|_$/g, '');
}
