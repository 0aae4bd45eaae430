import { z } from "zod";

import { CSV_MIME_TYPE } from "@attendance/core";

import { adminProcedure, publicProcedure } from "../shared";

/**
 * Members Router
 * The roster that absentees are reconciled against.
 */
export const membersRouter = {
  list: publicProcedure
    .input(z.object({ activeOnly: z.boolean().default(false) }).default({}))
    .handler(async ({ context: ctx, input }) => {
      return input.activeOnly
        ? ctx.repos.members.listActive()
        : ctx.repos.members.load();
    }),

  add: publicProcedure
    .input(
      z.object({
        firstName: z.string(),
        lastName: z.string(),
        notes: z.string().optional(),
        active: z.boolean().optional(),
      }),
    )
    .handler(async ({ context: ctx, input }) => {
      return ctx.repos.members.add(input);
    }),

  edit: adminProcedure
    .input(
      z.object({
        id: z.string().min(1),
        firstName: z.string().optional(),
        lastName: z.string().optional(),
        notes: z.string().optional(),
        active: z.boolean().optional(),
      }),
    )
    .handler(async ({ context: ctx, input }) => {
      const { id, ...update } = input;
      return ctx.repos.members.edit(id, update);
    }),

  delete: adminProcedure
    .input(z.object({ id: z.string().min(1) }))
    .handler(async ({ context: ctx, input }) => {
      return ctx.repos.members.deleteById(input.id);
    }),

  exportCsv: publicProcedure.handler(async ({ context: ctx }) => ({
    fileName: "members.csv",
    mimeType: CSV_MIME_TYPE,
    content: await ctx.repos.members.exportCsv(),
  })),

  importCsv: adminProcedure
    .input(z.object({ csv: z.string() }))
    .handler(async ({ context: ctx, input }) => {
      const records = await ctx.repos.members.importCsv(input.csv);
      return { imported: records.length };
    }),
};
