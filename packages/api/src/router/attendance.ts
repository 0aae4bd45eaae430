import { z } from "zod";

import {
  asInt,
  composeAttendeeName,
  CSV_MIME_TYPE,
  filterLog,
  serviceSummary,
  totalsPerService,
} from "@attendance/core";

import { adminProcedure, publicProcedure } from "../shared";

const householdInput = z.union([z.number(), z.string()]).optional();

/**
 * Attendance Router
 * Check-ins, the attendance log and per-service totals.
 */
export const attendanceRouter = {
  /**
   * Check someone in to a service. Either `attendee` or a first/last name
   * pair identifies them.
   */
  add: publicProcedure
    .input(
      z.object({
        serviceDate: z.string(),
        serviceName: z.string(),
        attendee: z.string().optional(),
        firstName: z.string().optional(),
        lastName: z.string().optional(),
        household: householdInput,
        notes: z.string().optional(),
      }),
    )
    .handler(async ({ context: ctx, input }) => {
      const attendee =
        input.attendee?.trim() ||
        composeAttendeeName(input.firstName ?? "", input.lastName ?? "");
      return ctx.repos.attendance.add({
        serviceDate: input.serviceDate,
        serviceName: input.serviceName,
        attendee,
        household: input.household,
        notes: input.notes,
      });
    }),

  list: publicProcedure
    .input(
      z
        .object({
          date: z.string().nullish(),
          serviceContains: z.string().nullish(),
          attendeeContains: z.string().nullish(),
        })
        .optional(),
    )
    .handler(async ({ context: ctx, input }) => {
      return filterLog(await ctx.repos.attendance.load(), input ?? {});
    }),

  /**
   * Metrics for the selected service plus totals for every service held
   */
  summary: publicProcedure
    .input(
      z.object({
        serviceDate: z.string(),
        serviceName: z.string().nullish(),
      }),
    )
    .handler(async ({ context: ctx, input }) => {
      const records = await ctx.repos.attendance.load();
      return {
        selected: serviceSummary(records, input.serviceDate, input.serviceName),
        totals: totalsPerService(records),
      };
    }),

  edit: adminProcedure
    .input(
      z.object({
        id: z.string().min(1),
        attendee: z.string().optional(),
        household: householdInput,
        notes: z.string().optional(),
      }),
    )
    .handler(async ({ context: ctx, input }) => {
      const { id, household, ...fields } = input;
      return ctx.repos.attendance.edit(id, {
        ...fields,
        ...(household !== undefined ? { household: asInt(household) } : {}),
      });
    }),

  delete: adminProcedure
    .input(z.object({ id: z.string().min(1) }))
    .handler(async ({ context: ctx, input }) => {
      return ctx.repos.attendance.deleteById(input.id);
    }),

  exportCsv: publicProcedure.handler(async ({ context: ctx }) => ({
    fileName: "attendance.csv",
    mimeType: CSV_MIME_TYPE,
    content: await ctx.repos.attendance.exportCsv(),
  })),

  /**
   * Replace the whole attendance ledger with an uploaded CSV
   */
  importCsv: adminProcedure
    .input(z.object({ csv: z.string() }))
    .handler(async ({ context: ctx, input }) => {
      const records = await ctx.repos.attendance.importCsv(input.csv);
      return { imported: records.length };
    }),
};
