export enum Header {
  SessionId = "x-session-id",
}

export enum StorageDriver {
  Memory = "memory",
  Csv = "csv",
  Postgres = "postgres",
}

export enum NameMatching {
  Exact = "exact",
  Casefold = "casefold",
}
