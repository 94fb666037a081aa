import { z, type ZodTypeAny } from 'zod';

// sql.js hands back plain column values; these schemas turn a row into a domain shape.

export const sqliteBoolean = z.number().transform(value => value !== 0);

export const optionalText = z
  .string()
  .nullable()
  .transform(value => value ?? undefined);

export const nullableBoolean = z
  .number()
  .nullable()
  .transform(value => (value === null ? null : value !== 0));

export function jsonColumn<T extends ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform(raw => JSON.parse(raw))
    .pipe(schema);
}

export function toSqliteBoolean(value: boolean): number {
  return value ? 1 : 0;
}
