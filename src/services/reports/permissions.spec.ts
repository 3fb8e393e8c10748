import { ReportRecord } from "../../types/ReportInterface";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { UserRoleEnum } from "../../types/enums/userRoleEnum";
import { authorize, listScope } from "./permissions";

const report: ReportRecord = {
  id: "r-1",
  creatorId: "reporter-1",
  category: "lighting",
  description: "Lamp out",
  location: { lat: 0, lon: 0 },
  images: [],
  priority: ReportPriorityEnum.LOW,
  status: ReportStatusEnum.ASSIGNED,
  assigneeId: "handler-1",
  createdAt: new Date("2026-01-01T00:00:00Z"),
  updatedAt: new Date("2026-01-01T00:00:00Z"),
  closedAt: null,
  version: 1,
};

const admin = { id: "admin-1", role: UserRoleEnum.ADMIN };
const assignee = { id: "handler-1", role: UserRoleEnum.HANDLER };
const otherHandler = { id: "handler-2", role: UserRoleEnum.HANDLER };
const creator = { id: "reporter-1", role: UserRoleEnum.REPORTER };

describe("authorize", () => {
  it("lets anyone create", () => {
    expect(authorize(creator, "create", null)).toEqual({ allowed: true });
  });

  it("restricts viewing to administrators, the assignee and the creator", () => {
    expect(authorize(admin, "view", report).allowed).toBe(true);
    expect(authorize(assignee, "view", report).allowed).toBe(true);
    expect(authorize(creator, "view", report).allowed).toBe(true);
    expect(authorize(otherHandler, "view", report)).toEqual({
      allowed: false,
      reason: "only administrators, the assignee or the creator can view this report",
    });
  });

  it("never treats an anonymous report as created by the caller", () => {
    expect(authorize(creator, "view", { ...report, creatorId: null }).allowed).toBe(false);
  });

  it.each(["assign", "close", "override", "metrics"] as const)("keeps %s for administrators", (operation) => {
    expect(authorize(admin, operation, report).allowed).toBe(true);
    expect(authorize(assignee, operation, report)).toEqual({
      allowed: false,
      reason: `${operation} requires an administrator`,
    });
  });

  it.each(["start", "resolve"] as const)("keeps %s for the assignee", (operation) => {
    expect(authorize(assignee, operation, report).allowed).toBe(true);
    expect(authorize(admin, operation, report).allowed).toBe(false);
    expect(authorize(otherHandler, operation, report).allowed).toBe(false);
  });

  it("lets administrators and the assignee comment", () => {
    expect(authorize(admin, "comment", report).allowed).toBe(true);
    expect(authorize(assignee, "comment", report).allowed).toBe(true);
    expect(authorize(creator, "comment", report).allowed).toBe(false);
  });

  it("keeps the assigned-reports list for handlers", () => {
    expect(authorize(assignee, "list_assigned", null).allowed).toBe(true);
    expect(authorize(admin, "list_assigned", null)).toEqual({
      allowed: false,
      reason: "only handlers have assigned reports",
    });
  });
});

describe("listScope", () => {
  it("scopes listings by role", () => {
    expect(listScope(admin)).toEqual({});
    expect(listScope(assignee)).toEqual({ assigneeId: "handler-1" });
    expect(listScope(creator)).toEqual({ creatorId: "reporter-1" });
  });
});
