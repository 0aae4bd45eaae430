export * from "./errors";
export * from "./types";
export * from "./utils/coerce";
export * from "./utils/names";
export * from "./ledger/definitions";
export * from "./ledger/table";
export * from "./aggregation/service";
export * from "./aggregation/dashboard";
export * from "./absentees/reconciler";
export * from "./csv/codec";
