import { ORPCError, os } from "@orpc/server";
import type { RequestHeadersPluginContext } from "@orpc/server/plugins";

import {
  ImportSchemaError,
  isLedgerError,
  NotFoundError,
  PersistenceError,
  ValidationError,
} from "@attendance/core";
import type { Repositories } from "@attendance/db";
import type { AppConfig } from "@attendance/env";
import { Header } from "@attendance/shared/common/enums";
import { createLogger } from "@attendance/shared/logger";

import type { Session, SessionStore } from "./session-store";

export type ApiConfig = Pick<AppConfig, "adminPin" | "nameMatching">;

/** What the server hands every call */
export interface BaseContext extends RequestHeadersPluginContext {
  repos: Repositories;
  sessions: SessionStore;
  config: ApiConfig;
}

export interface Context extends BaseContext {
  session: Session;
}

const log = createLogger("api");

/**
 * Convert ledger errors into RPC errors. Anything else is rethrown as is.
 */
export function toORPCError(error: unknown): unknown {
  if (error instanceof ORPCError) {
    return error;
  }
  if (!isLedgerError(error)) {
    log.error("Unexpected error", error);
    return error;
  }
  if (error instanceof ImportSchemaError) {
    return new ORPCError("BAD_REQUEST", {
      message: error.message,
      data: { missingColumns: error.missingColumns },
      cause: error,
    });
  }
  if (error instanceof ValidationError) {
    return new ORPCError("BAD_REQUEST", {
      message: error.message,
      ...(error.field ? { data: { field: error.field } } : {}),
      cause: error,
    });
  }
  if (error instanceof NotFoundError) {
    return new ORPCError("NOT_FOUND", { message: error.message, cause: error });
  }
  if (error instanceof PersistenceError) {
    log.error("Storage failure", error);
  }
  return new ORPCError("INTERNAL_SERVER_ERROR", {
    message: error.message,
    cause: error,
  });
}

const base = os.$context<BaseContext>().use(async ({ next }) => {
  try {
    return await next();
  } catch (error) {
    throw toORPCError(error);
  }
});

export const withSession = base.use(async ({ context, next }) => {
  const session = context.sessions.resolve(
    context.reqHeaders?.get(Header.SessionId),
  );
  const newContext: Context = { ...context, session };
  return next({ context: newContext });
});

export const publicProcedure = withSession;

export const adminProcedure = withSession.use(({ context, next }) => {
  if (!context.session.isAdmin) {
    throw new ORPCError("UNAUTHORIZED", {
      message: "Admin mode is locked.",
    });
  }
  return next({ context });
});
