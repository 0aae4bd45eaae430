import { z } from "zod";

import {
  absenteesForService,
  checkInCandidates,
  CSV_MIME_TYPE,
  getNameNormalizer,
} from "@attendance/core";

import { publicProcedure } from "../shared";

const serviceInput = z.object({
  serviceDate: z.string().min(1),
  serviceName: z.string().min(1),
});

/**
 * Absences Router
 * Who on the active roster missed a service, and notes on why.
 */
export const absencesRouter = {
  forService: publicProcedure
    .input(serviceInput)
    .handler(async ({ context: ctx, input }) => {
      const normalize = getNameNormalizer(ctx.config.nameMatching);
      const [members, attendance, notes] = await Promise.all([
        ctx.repos.members.load(),
        ctx.repos.attendance.load(),
        ctx.repos.absences.forService(input),
      ]);

      return {
        absentees: absenteesForService(members, attendance, input, normalize),
        checkInCandidates: checkInCandidates(
          members,
          attendance,
          input,
          normalize,
        ),
        notes: Object.fromEntries(notes),
      };
    }),

  record: publicProcedure
    .input(
      serviceInput.extend({
        notes: z.record(z.string(), z.string()),
      }),
    )
    .handler(async ({ context: ctx, input }) => {
      const { notes, ...service } = input;
      const added = await ctx.repos.absences.record(service, notes);
      return { recorded: added.length, notes: added };
    }),

  list: publicProcedure.handler(async ({ context: ctx }) => {
    return ctx.repos.absences.load();
  }),

  exportCsv: publicProcedure.handler(async ({ context: ctx }) => ({
    fileName: "absences.csv",
    mimeType: CSV_MIME_TYPE,
    content: await ctx.repos.absences.exportCsv(),
  })),
};
