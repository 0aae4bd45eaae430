import { absencesRouter } from "./router/absences";
import { attendanceRouter } from "./router/attendance";
import { dashboardRouter } from "./router/dashboard";
import { membersRouter } from "./router/members";
import { sessionRouter } from "./router/session";

export { SessionStore } from "./session-store";
export type { Session } from "./session-store";
export type { ApiConfig, BaseContext, Context } from "./shared";

export const router = {
  absences: absencesRouter,
  attendance: attendanceRouter,
  dashboard: dashboardRouter,
  members: membersRouter,
  session: sessionRouter,
};

export type AppRouter = typeof router;
