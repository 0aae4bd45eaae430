import { ORPCError } from "@orpc/server";
import { z } from "zod";

import { Header } from "@attendance/shared/common/enums";

import { publicProcedure } from "../shared";

const requireSessionId = (id: string | null): string => {
  if (!id) {
    throw new ORPCError("BAD_REQUEST", {
      message: `The ${Header.SessionId} header is required to unlock admin mode.`,
    });
  }
  return id;
};

/**
 * Session Router
 * Admin mode is per session and unlocked with the shared PIN.
 */
export const sessionRouter = {
  status: publicProcedure.handler(({ context: ctx }) => ({
    isAdmin: ctx.session.isAdmin,
  })),

  unlock: publicProcedure
    .input(z.object({ pin: z.string() }))
    .handler(({ context: ctx, input }) => {
      const id = requireSessionId(ctx.session.id);
      if (input.pin !== ctx.config.adminPin) {
        throw new ORPCError("UNAUTHORIZED", { message: "Incorrect PIN." });
      }
      return { isAdmin: ctx.sessions.unlock(id).isAdmin };
    }),

  lock: publicProcedure.handler(({ context: ctx }) => {
    if (!ctx.session.id) return { isAdmin: false };
    return { isAdmin: ctx.sessions.lock(ctx.session.id).isAdmin };
  }),
};
