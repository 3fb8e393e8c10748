import { v4 as uuid } from "uuid";
import { Logger, moduleLogger } from "../../observability/logging";
import { CaseUpdateRecord } from "../../types/CaseUpdateInterface";
import { Principal } from "../../types/PrincipalInterface";
import { NewReportInput, ReportRecord } from "../../types/ReportInterface";
import { CaseUpdateKindEnum } from "../../types/enums/caseUpdateKindEnum";
import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { ASSIGNEE_STATUSES, ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { UserRoleEnum } from "../../types/enums/userRoleEnum";
import { Forbidden, InvalidAssignee, InvalidTransition, ReportNotFound } from "../errors";
import { CaseLedger } from "../ledger/caseLedger";
import { EventSink } from "../notifications/dispatcher";
import { buildEvent } from "../notifications/messages";
import { ReportListQuery, ReportStore, UserDirectory } from "../stores";
import { KeyedLock } from "./keyedLock";
import { ReportOperation, authorize, listScope } from "./permissions";
import { STEPS, StepAction, overrideEvent } from "./transitions";

export type TransitionCommand =
  | { action: "assign"; assigneeId: string; note?: string }
  | { action: "start"; note?: string }
  | { action: "resolve"; note: string }
  | { action: "close"; note?: string }
  | { action: "override"; status: ReportStatusEnum; assigneeId?: string; note?: string };

export type ReportListFilters = Pick<ReportListQuery, "status" | "priority" | "limit">;

export interface ReportStateMachineDeps {
  reports: ReportStore;
  ledger: CaseLedger;
  directory: Pick<UserDirectory, "findById">;
  events: EventSink;
  logger?: Logger;
  clock?: () => Date;
  newId?: () => string;
}

/** The outcome of validating an operation, before anything is written. */
interface Plan {
  kind: CaseUpdateKindEnum;
  status: ReportStatusEnum;
  assigneeId: string | null;
  note: string | null;
  event: NotificationKindEnum;
}

function cleanNote(note: string | undefined): string | null {
  const trimmed = note?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Owns the report lifecycle: pending → assigned → in_progress → resolved →
 * closed, plus administrative overrides and comments. Every accepted
 * operation writes the report and one ledger entry in a single store
 * transaction, then hands exactly one event to the dispatcher.
 */
export class ReportStateMachine {
  private readonly locks = new KeyedLock();
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: ReportStateMachineDeps) {
    this.log = deps.logger ?? moduleLogger("reports");
    this.clock = deps.clock ?? (() => new Date());
    this.newId = deps.newId ?? (() => uuid());
  }

  async create(principal: Principal, input: NewReportInput): Promise<ReportRecord> {
    this.require(principal, "create", null);
    const now = this.clock();
    const report: ReportRecord = {
      id: this.newId(),
      creatorId: input.anonymous ? null : principal.id,
      category: input.category.trim(),
      description: input.description.trim(),
      location: { ...input.location },
      images: [...(input.images ?? [])],
      priority: input.priority ?? ReportPriorityEnum.MEDIUM,
      status: ReportStatusEnum.PENDING,
      assigneeId: null,
      createdAt: now,
      updatedAt: now,
      closedAt: null,
      version: 0,
    };
    await this.deps.reports.insert(report);
    this.log.info({ reportId: report.id, anonymous: report.creatorId === null }, "report created");
    this.emit(NotificationKindEnum.REPORT_CREATED, report, null, null, now);
    return report;
  }

  async get(principal: Principal, reportId: string): Promise<ReportRecord> {
    const report = await this.load(reportId);
    this.require(principal, "view", report);
    return report;
  }

  /**
   * Administrators see every report, handlers the ones assigned to them and
   * reporters the ones they filed under their name.
   */
  async list(principal: Principal, filters: ReportListFilters): Promise<ReportRecord[]> {
    return this.deps.reports.list({ ...filters, ...listScope(principal) });
  }

  async listAssigned(principal: Principal, filters: ReportListFilters): Promise<ReportRecord[]> {
    this.require(principal, "list_assigned", null);
    return this.deps.reports.list({ ...filters, assigneeId: principal.id });
  }

  async history(principal: Principal, reportId: string): Promise<CaseUpdateRecord[]> {
    const report = await this.load(reportId);
    this.require(principal, "view", report);
    return this.deps.ledger.history(reportId);
  }

  async transition(principal: Principal, reportId: string, command: TransitionCommand): Promise<ReportRecord> {
    return this.locks.run(reportId, async () => {
      const current = await this.load(reportId);
      const plan =
        command.action === "override"
          ? await this.planOverride(principal, current, command)
          : await this.planStep(principal, current, command);
      return this.commit(principal, current, plan);
    });
  }

  async comment(principal: Principal, reportId: string, note: string): Promise<ReportRecord> {
    return this.locks.run(reportId, async () => {
      const current = await this.load(reportId);
      this.require(principal, "comment", current);
      if (current.status === ReportStatusEnum.CLOSED) {
        throw new InvalidTransition(current.status, null, "closed reports take no further updates");
      }
      const text = cleanNote(note);
      if (!text) throw new InvalidTransition(current.status, null, "a comment needs text");
      return this.commit(principal, current, {
        kind: CaseUpdateKindEnum.COMMENT,
        status: current.status,
        assigneeId: current.assigneeId,
        note: text,
        event: NotificationKindEnum.CASE_UPDATED,
      });
    });
  }

  private async planStep(
    principal: Principal,
    current: ReportRecord,
    command: Exclude<TransitionCommand, { action: "override" }>
  ): Promise<Plan> {
    const action: StepAction = command.action;
    const step = STEPS[action];
    if (current.status !== step.from) {
      throw new InvalidTransition(current.status, step.to, `${action} is only allowed from ${step.from}`);
    }
    const decision = authorize(principal, action, current);
    if (!decision.allowed) throw new InvalidTransition(current.status, step.to, decision.reason);

    const note = cleanNote(command.note);
    const plan: Plan = {
      kind: CaseUpdateKindEnum.STATUS_CHANGE,
      status: step.to,
      assigneeId: current.assigneeId,
      note,
      event: step.event,
    };

    switch (command.action) {
      case "assign":
        await this.requireHandler(command.assigneeId);
        plan.assigneeId = command.assigneeId;
        break;
      case "resolve":
        if (!note) throw new InvalidTransition(current.status, step.to, "a resolution note is required");
        break;
      case "close":
        plan.assigneeId = null;
        break;
      case "start":
        break;
    }
    return plan;
  }

  private async planOverride(
    principal: Principal,
    current: ReportRecord,
    command: Extract<TransitionCommand, { action: "override" }>
  ): Promise<Plan> {
    const target = command.status;
    const decision = authorize(principal, "override", current);
    if (!decision.allowed) throw new InvalidTransition(current.status, target, decision.reason);
    if (target === current.status) throw new InvalidTransition(current.status, target, `report is already ${target}`);

    let assigneeId: string | null = null;
    if (ASSIGNEE_STATUSES.includes(target)) {
      if (command.assigneeId) {
        await this.requireHandler(command.assigneeId);
        assigneeId = command.assigneeId;
      } else {
        assigneeId = current.assigneeId;
      }
      if (!assigneeId) throw new InvalidAssignee(null, `a report that is ${target} needs an assignee`);
    } else if (command.assigneeId) {
      throw new InvalidAssignee(command.assigneeId, `a report that is ${target} cannot carry an assignee`);
    }

    return {
      kind: CaseUpdateKindEnum.STATUS_CHANGE,
      status: target,
      assigneeId,
      note: cleanNote(command.note),
      event: overrideEvent(target),
    };
  }

  private async commit(principal: Principal, current: ReportRecord, plan: Plan): Promise<ReportRecord> {
    const now = this.clock();
    const next: ReportRecord = {
      ...current,
      status: plan.status,
      assigneeId: plan.assigneeId,
      closedAt: plan.status === ReportStatusEnum.CLOSED ? current.closedAt ?? now : null,
      updatedAt: now,
      version: current.version + 1,
    };
    const entry: CaseUpdateRecord = {
      id: this.newId(),
      reportId: current.id,
      sequence: next.version,
      authorId: principal.id,
      kind: plan.kind,
      previousStatus: current.status,
      newStatus: next.status,
      note: plan.note,
      createdAt: now,
    };

    await this.deps.reports.transaction(async (session) => {
      await this.deps.reports.save(next, current.version, session);
      await this.deps.ledger.append(entry, session);
    });

    this.log.info(
      { reportId: next.id, from: current.status, to: next.status, kind: plan.kind, actor: principal.id, sequence: entry.sequence },
      "report updated"
    );
    // Closing clears the assignee on the report, but they still hear about it.
    this.emit(plan.event, next, next.assigneeId ?? current.assigneeId, plan.note, now);
    return next;
  }

  private emit(kind: NotificationKindEnum, report: ReportRecord, assigneeId: string | null, note: string | null, at: Date) {
    const event = buildEvent(kind, report, { creatorId: report.creatorId, assigneeId }, note, at);
    try {
      const result = this.deps.events.dispatch(event);
      if (!result.accepted) this.log.warn({ eventId: event.id, kind }, "notification event not accepted");
    } catch (error) {
      this.log.error({ err: error, eventId: event.id, kind }, "could not enqueue notification event");
    }
  }

  private async load(reportId: string): Promise<ReportRecord> {
    const report = await this.deps.reports.findById(reportId);
    if (!report) throw new ReportNotFound(reportId);
    return report;
  }

  private require(principal: Principal, operation: ReportOperation, report: ReportRecord | null) {
    const decision = authorize(principal, operation, report);
    if (!decision.allowed) throw new Forbidden(decision.reason);
  }

  private async requireHandler(userId: string) {
    const user = await this.deps.directory.findById(userId);
    if (!user) throw new InvalidAssignee(userId, "no such user");
    if (user.role !== UserRoleEnum.HANDLER) throw new InvalidAssignee(userId, "user lacks handler capability");
    if (!user.isActive) throw new InvalidAssignee(userId, "user is not active");
  }
}
