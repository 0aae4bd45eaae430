import { NotFoundError } from "../errors";

/**
 * Pure table mutations. None of these persist; callers save the result.
 */

type Identified = { id: string };

export function appendRow<T extends Identified>(
  table: readonly T[],
  record: T,
): T[] {
  return [...table, record];
}

function assertPosition(table: readonly unknown[], position: number) {
  if (!Number.isInteger(position) || position < 0 || position >= table.length) {
    throw new NotFoundError(
      `Row ${position} does not exist (table has ${table.length} rows)`,
    );
  }
}

/**
 * Replace fields of the row at ordinal `position`.
 * Positions shift after any delete; prefer {@link editRowById}.
 */
export function editRow<T extends Identified>(
  table: readonly T[],
  position: number,
  fields: Partial<Omit<T, "id">>,
): T[] {
  assertPosition(table, position);
  return table.map((row, index) =>
    index === position ? { ...row, ...fields } : row,
  );
}

/**
 * Remove the row at ordinal `position`. Remaining rows keep their relative
 * order and occupy positions 0..n-2.
 */
export function deleteRow<T extends Identified>(
  table: readonly T[],
  position: number,
): T[] {
  assertPosition(table, position);
  return table.filter((_, index) => index !== position);
}

export function findPosition<T extends Identified>(
  table: readonly T[],
  id: string,
): number {
  const position = table.findIndex((row) => row.id === id);
  if (position === -1) {
    throw new NotFoundError(`Record ${id} not found`);
  }
  return position;
}

export function editRowById<T extends Identified>(
  table: readonly T[],
  id: string,
  fields: Partial<Omit<T, "id">>,
): T[] {
  return editRow(table, findPosition(table, id), fields);
}

export function deleteRowById<T extends Identified>(
  table: readonly T[],
  id: string,
): T[] {
  return deleteRow(table, findPosition(table, id));
}

/**
 * Give a fresh id to every record whose id an earlier record already uses.
 * Order and every other field are kept.
 */
export function ensureUniqueIds<T extends Identified>(
  table: readonly T[],
  createId: () => string,
): T[] {
  const seen = new Set<string>();
  return table.map((row) => {
    let record = row;
    while (seen.has(record.id)) {
      record = { ...record, id: createId() };
    }
    seen.add(record.id);
    return record;
  });
}
