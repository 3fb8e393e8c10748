import { ReportRecord } from "../types/ReportInterface";
import { CaseUpdateRecord } from "../types/CaseUpdateInterface";
import { FailedDelivery, InboxNotification } from "../types/NotificationInterface";
import { DirectoryUser } from "../types/UserInterface";
import { ReportPriorityEnum } from "../types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../types/enums/reportStatusEnum";

/**
 * Opaque handle for a store transaction. Each store implementation narrows it
 * to its own session type; writes issued with the same session commit or
 * roll back together.
 */
export interface StoreSession {
  readonly kind: string;
}

export interface ReportQuery {
  from?: Date;
  to?: Date;
  statuses?: readonly ReportStatusEnum[];
  category?: string;
}

export interface ReportListQuery {
  creatorId?: string;
  assigneeId?: string;
  status?: ReportStatusEnum;
  priority?: ReportPriorityEnum;
  limit: number;
}

export interface ReportStore {
  transaction(work: (session: StoreSession) => Promise<void>): Promise<void>;
  insert(report: ReportRecord): Promise<void>;
  findById(id: string): Promise<ReportRecord | null>;
  /**
   * Persists `report` only if the stored version still equals
   * `expectedVersion`; throws ConcurrentModification otherwise.
   */
  save(report: ReportRecord, expectedVersion: number, session?: StoreSession): Promise<void>;
  scan(query: ReportQuery): Promise<ReportRecord[]>;
  /** Newest first. */
  list(query: ReportListQuery): Promise<ReportRecord[]>;
}

/** Append-only: there is deliberately no update or delete. */
export interface CaseUpdateStore {
  append(update: CaseUpdateRecord, session?: StoreSession): Promise<void>;
  last(reportId: string, session?: StoreSession): Promise<CaseUpdateRecord | null>;
  list(reportId: string): Promise<CaseUpdateRecord[]>;
}

export interface UserDirectory {
  findById(id: string): Promise<DirectoryUser | null>;
  listAdministratorIds(): Promise<string[]>;
}

export type NewFailedDelivery = Omit<FailedDelivery, "id" | "status" | "createdAt">;

export interface FailedDeliveryStore {
  record(failure: NewFailedDelivery): Promise<void>;
  listPending(limit: number): Promise<FailedDelivery[]>;
  mark(id: string, status: "requeued" | "abandoned"): Promise<void>;
  /** Counts a sweep that could not requeue the failure as one of its rounds. */
  spendRound(id: string): Promise<void>;
}

export type NewInboxNotification = Omit<InboxNotification, "id" | "readAt" | "createdAt">;

export interface InboxStore {
  /** Returns false when the (eventId, userId) pair was already stored. */
  insertOnce(notification: NewInboxNotification): Promise<boolean>;
  listForUser(userId: string, limit: number): Promise<InboxNotification[]>;
  markRead(id: string, userId: string): Promise<InboxNotification | null>;
  /** Returns how many notifications changed. */
  markAllRead(userId: string): Promise<number>;
  countUnread(userId: string): Promise<number>;
}
