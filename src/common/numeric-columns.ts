/** NUMERIC(precision, scale) shapes shared by entities and input checks. */
export type NumericColumn = { readonly precision: number; readonly scale: number };

export const HOURS_COLUMN = { precision: 10, scale: 2 } as const satisfies NumericColumn;
export const FACTOR_COLUMN = { precision: 6, scale: 2 } as const satisfies NumericColumn;

// Postgres int4
export const INT4_MAX = 2147483647;
