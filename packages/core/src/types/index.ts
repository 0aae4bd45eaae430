export * from "./attendance";
export * from "./member";
export * from "./absence";

/** A single service instance: date plus free-text name. */
export interface ServiceKey {
  serviceDate: string;
  serviceName: string;
}

export type LedgerName = "attendance" | "members" | "absences";

/** Column name reserved for the stable record identifier. */
export const ID_COLUMN = "Id";

export type CellValue = string | number;

/** A row keyed by canonical column name, as backends store it. */
export type LedgerRow = Record<string, CellValue>;

/** Whatever a backend or an upload hands back before normalization. */
export type RawRow = Record<string, unknown>;

export interface LedgerSnapshot {
  columns: string[];
  rows: RawRow[];
}
