/**
 * CSV text utilities.
 */

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    return value.startsWith('\uFEFF') ? value.slice(1) : value;
}

/**
 * Prepare CSV text for parsing: no BOM, and "\n" as the only line break so
 * one input line maps to one sheet row.
 */
export function normalizeCsvText(value: string): string {
    return stripBom(value).replace(/\r\n?/g, '\n');
}
