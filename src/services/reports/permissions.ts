import { Principal } from "../../types/PrincipalInterface";
import { ReportRecord } from "../../types/ReportInterface";
import { UserRoleEnum } from "../../types/enums/userRoleEnum";

export type ReportOperation =
  | "create"
  | "view"
  | "assign"
  | "start"
  | "resolve"
  | "close"
  | "override"
  | "comment"
  | "metrics"
  | "list_assigned";

export type Decision = { allowed: true } | { allowed: false; reason: string };

const allow: Decision = { allowed: true };
const deny = (reason: string): Decision => ({ allowed: false, reason });

const isHandler = (p: Principal) => p.role === UserRoleEnum.HANDLER;
const isAdmin = (p: Principal) => p.role === UserRoleEnum.ADMIN;
const isAssignee = (p: Principal, r: ReportRecord | null) => r !== null && r.assigneeId !== null && r.assigneeId === p.id;
const isCreator = (p: Principal, r: ReportRecord | null) => r !== null && r.creatorId !== null && r.creatorId === p.id;

/**
 * Role and ownership rules, free of I/O. State adjacency is checked
 * separately by the state machine.
 */
export function authorize(principal: Principal, operation: ReportOperation, report: ReportRecord | null): Decision {
  switch (operation) {
    case "create":
      return allow;
    case "view":
      return isAdmin(principal) || isAssignee(principal, report) || isCreator(principal, report)
        ? allow
        : deny("only administrators, the assignee or the creator can view this report");
    case "assign":
    case "close":
    case "override":
    case "metrics":
      return isAdmin(principal) ? allow : deny(`${operation} requires an administrator`);
    case "start":
    case "resolve":
      return isAssignee(principal, report) ? allow : deny(`only the assignee can ${operation} this report`);
    case "list_assigned":
      return isHandler(principal) ? allow : deny("only handlers have assigned reports");
    case "comment":
      return isAdmin(principal) || isAssignee(principal, report)
        ? allow
        : deny("only administrators or the assignee can comment");
  }
}

export interface ListScope {
  creatorId?: string;
  assigneeId?: string;
}

/** Which reports a listing may show: everything, assigned to the caller, or filed by them. */
export function listScope(principal: Principal): ListScope {
  switch (principal.role) {
    case UserRoleEnum.ADMIN:
      return {};
    case UserRoleEnum.HANDLER:
      return { assigneeId: principal.id };
    case UserRoleEnum.REPORTER:
      return { creatorId: principal.id };
  }
}
