import { beforeEach, describe, expect, it } from "vitest";

import type { TestApp } from "../__tests__/test-utils";
import {
  createAdminClient,
  createTestApp,
  createTestClient,
} from "../__tests__/test-utils";

describe("Members Router", () => {
  let app: TestApp;

  beforeEach(() => {
    app = createTestApp();
  });

  it("adds members and lists the active ones", async () => {
    const client = createTestClient(app);
    await client.members.add({ firstName: "Jane", lastName: "Doe" });
    await client.members.add({
      firstName: "John",
      lastName: "Smith",
      active: false,
    });

    const all = await client.members.list();
    const active = await client.members.list({ activeOnly: true });

    expect(all.map((member) => member.attendee)).toEqual([
      "Jane Doe",
      "John Smith",
    ]);
    expect(active.map((member) => member.attendee)).toEqual(["Jane Doe"]);
  });

  it("lets an admin rename a member", async () => {
    const admin = createAdminClient(app);
    const member = await admin.members.add({
      firstName: "Jane",
      lastName: "Doe",
    });

    const edited = await admin.members.edit({
      id: member.id,
      lastName: "Smith",
      active: false,
    });

    expect(edited).toEqual({
      id: "id-1",
      firstName: "Jane",
      lastName: "Smith",
      attendee: "Jane Smith",
      notes: "",
      active: false,
    });
  });

  it("keeps edits and deletes behind admin mode", async () => {
    const client = createTestClient(app);
    const member = await client.members.add({
      firstName: "Jane",
      lastName: "Doe",
    });

    await expect(
      client.members.edit({ id: member.id, notes: "x" }),
    ).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    await expect(
      client.members.delete({ id: member.id }),
    ).rejects.toMatchObject({ code: "UNAUTHORIZED" });
  });

  it("imports a roster with Active flags in any spelling", async () => {
    const admin = createAdminClient(app);

    await admin.members.importCsv({
      csv:
        "FirstName,LastName,Attendee,Notes,Active\n" +
        "Jane,Doe,,,yes\n" +
        "John,Smith,,Moved away,0\n",
    });

    expect(await admin.members.list()).toEqual([
      {
        id: "id-1",
        firstName: "Jane",
        lastName: "Doe",
        attendee: "Jane Doe",
        notes: "",
        active: true,
      },
      {
        id: "id-2",
        firstName: "John",
        lastName: "Smith",
        attendee: "John Smith",
        notes: "Moved away",
        active: false,
      },
    ]);
  });

  it("exports the roster with Active as 1 or 0", async () => {
    const client = createTestClient(app);
    await client.members.add({ firstName: "Jane", lastName: "Doe" });

    const exported = await client.members.exportCsv();

    expect(exported.content).toBe(
      "FirstName,LastName,Attendee,Notes,Active,Id\nJane,Doe,Jane Doe,,1,id-1",
    );
  });
});
