/** `($1,$2,$3),($4,$5,$6)` for a multi-row INSERT. */
export function valuesClause(rows: number, columns: number): string {
  return Array.from({ length: rows }, (_, r) => {
    const cols = Array.from({ length: columns }, (_, c) => `$${r * columns + c + 1}`);
    return `(${cols.join(',')})`;
  }).join(',');
}

export const orNull = <T>(value: T | undefined): T | null => (value === undefined ? null : value);

/** Nullable column → optional field. */
export const opt = <T>(value: unknown): T | undefined =>
  value === null || value === undefined ? undefined : (value as T);
