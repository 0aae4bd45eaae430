import { beforeEach, describe, expect, it } from "vitest";

import { NameMatching } from "@attendance/shared/common/enums";

import type { TestApp } from "../__tests__/test-utils";
import { createTestApp, createTestClient } from "../__tests__/test-utils";

const SERVICE = { serviceDate: "2024-01-07", serviceName: "Sunday 1st Service" };

async function seed(app: TestApp) {
  const client = createTestClient(app);
  await client.members.add({ firstName: "Jane", lastName: "Doe" });
  await client.members.add({ firstName: "John", lastName: "Smith" });
  await client.members.add({ firstName: "Ada", lastName: "Brown" });
  await client.members.add({
    firstName: "Old",
    lastName: "Member",
    active: false,
  });
  await client.attendance.add({ ...SERVICE, attendee: "john smith" });
  await client.attendance.add({ ...SERVICE, attendee: "Ada Brown" });
  return client;
}

describe("Absences Router", () => {
  let app: TestApp;

  beforeEach(() => {
    app = createTestApp();
  });

  it("lists active members not checked in, matching names exactly", async () => {
    const client = await seed(app);

    const result = await client.absences.forService(SERVICE);

    expect(result.absentees).toEqual(["Jane Doe", "John Smith"]);
    expect(result.checkInCandidates.map((member) => member.attendee)).toEqual([
      "Jane Doe",
      "John Smith",
    ]);
    expect(result.notes).toEqual({});
  });

  it("ignores case and spacing when configured to", async () => {
    app = createTestApp({ nameMatching: NameMatching.Casefold });
    const client = await seed(app);

    const result = await client.absences.forService(SERVICE);

    expect(result.absentees).toEqual(["Jane Doe"]);
  });

  it("records notes for absentees and shows them for the service", async () => {
    const client = await seed(app);

    const recorded = await client.absences.record({
      ...SERVICE,
      notes: { "Jane Doe": "Travelling", "John Smith": "   " },
    });
    const result = await client.absences.forService(SERVICE);

    expect(recorded.recorded).toBe(1);
    expect(recorded.notes[0]).toMatchObject({
      serviceDate: "2024-01-07",
      serviceName: "Sunday 1st Service",
      attendee: "Jane Doe",
      note: "Travelling",
    });
    expect(result.notes).toEqual({ "Jane Doe": "Travelling" });
    expect(await client.absences.list()).toHaveLength(1);
  });

  it("requires a service to reconcile against", async () => {
    const client = createTestClient(app);

    await expect(
      client.absences.forService({ serviceDate: "", serviceName: "" }),
    ).rejects.toMatchObject({ code: "BAD_REQUEST" });
  });
});
