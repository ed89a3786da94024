import type { Knex } from 'knex';

export type UpsertTarget = {
  table: string;
  columns: readonly string[];
  /** Empty: conflicting rows are left untouched */
  conflictColumns: readonly string[];
};

const toRow = (record: Record<string, unknown>, columns: readonly string[]): Record<string, unknown> =>
  Object.fromEntries(
    columns.map((column) => {
      const value = record[column];
      // JSON columns are sent serialized
      if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
        return [column, JSON.stringify(value)];
      }
      return [column, value ?? null];
    })
  );

export const buildUpsertQuery = (
  knex: Knex,
  target: UpsertTarget,
  records: Record<string, unknown>[]
): Knex.QueryBuilder => {
  const insert = knex(target.table).insert(records.map((record) => toRow(record, target.columns)));

  if (target.conflictColumns.length === 0) {
    return insert.onConflict().ignore();
  }
  return insert.onConflict([...target.conflictColumns]).merge();
};

export const upsertRows = async (
  knex: Knex,
  target: UpsertTarget,
  records: Record<string, unknown>[]
): Promise<number> => {
  if (records.length === 0) {
    return 0;
  }

  await buildUpsertQuery(knex, target, records);
  return records.length;
};

export const describeRow = (record: Record<string, unknown>, target: UpsertTarget): string => {
  const keyColumns = target.conflictColumns.length > 0 ? target.conflictColumns : target.columns.slice(0, 1);
  return keyColumns.map((column) => `${column}=${String(record[column])}`).join(' ');
};
