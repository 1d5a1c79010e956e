/**
 * CSV parsing utilities.
 */

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Turn a raw header row into unique column names.
 *
 * - BOM stripped from every name
 * - blank header at index i becomes "Unnamed: i"
 * - repeated names get ".1", ".2", ... in order of appearance
 */
export function normalizeHeaders(raw: readonly unknown[]): string[] {
    const seen = new Map<string, number>();
    const taken = new Set<string>();
    return raw.map((value, index) => {
        const text = value === null || value === undefined ? '' : stripBom(String(value)).trim();
        const base = text === '' ? `Unnamed: ${index}` : text;

        let name = base;
        let n = seen.get(base) ?? 0;
        while (taken.has(name)) {
            n++;
            name = `${base}.${n}`;
        }
        seen.set(base, n);
        taken.add(name);
        return name;
    });
}
