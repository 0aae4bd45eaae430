import { z } from "zod";

import {
  buildDashboard,
  DEFAULT_ROLLING_WINDOW,
  defaultDateRange,
  MAX_ROLLING_WINDOW,
  MIN_ROLLING_WINDOW,
} from "@attendance/core";

import { publicProcedure } from "../shared";

export const dashboardRouter = {
  /**
   * KPIs, daily series, service mix and top attendees for a date range.
   * A missing bound defaults to the earliest or latest service on record.
   */
  get: publicProcedure
    .input(
      z
        .object({
          start: z.string().nullish(),
          end: z.string().nullish(),
          serviceName: z.string().nullish(),
          window: z
            .number()
            .int()
            .min(MIN_ROLLING_WINDOW)
            .max(MAX_ROLLING_WINDOW)
            .default(DEFAULT_ROLLING_WINDOW),
        })
        .default({}),
    )
    .handler(async ({ context: ctx, input }) => {
      const records = await ctx.repos.attendance.load();
      const fallback = defaultDateRange(records);
      const start = input.start ?? fallback?.start;
      const end = input.end ?? fallback?.end;

      return buildDashboard(records, {
        range: start && end ? { start, end } : null,
        serviceName: input.serviceName,
        window: input.window,
      });
    }),
};
