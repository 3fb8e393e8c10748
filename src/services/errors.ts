import { ReportStatusEnum } from "../types/enums/reportStatusEnum";

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTransition extends DomainError {
  readonly code = "INVALID_TRANSITION";
  readonly statusCode = 409;

  constructor(
    readonly from: ReportStatusEnum,
    readonly to: ReportStatusEnum | null,
    readonly reason: string
  ) {
    super(`Invalid transition ${from} -> ${to ?? from}: ${reason}`);
  }
}

export class InvalidAssignee extends DomainError {
  readonly code = "INVALID_ASSIGNEE";
  readonly statusCode = 422;

  constructor(readonly assigneeId: string | null, reason: string) {
    super(`Cannot assign ${assigneeId ?? "nobody"}: ${reason}`);
  }
}

export class ReportNotFound extends DomainError {
  readonly code = "REPORT_NOT_FOUND";
  readonly statusCode = 404;

  constructor(readonly reportId: string) {
    super(`Report ${reportId} not found`);
  }
}

export class Forbidden extends DomainError {
  readonly code = "FORBIDDEN";
  readonly statusCode = 403;
}

export class ConcurrentModification extends DomainError {
  readonly code = "CONCURRENT_MODIFICATION";
  readonly statusCode = 409;

  constructor(readonly reportId: string, readonly expectedVersion: number) {
    super(`Report ${reportId} changed since version ${expectedVersion}`);
  }
}

export class LedgerOrderViolation extends DomainError {
  readonly code = "LEDGER_ORDER_VIOLATION";
  readonly statusCode = 500;
}

export class AggregationSourceError extends DomainError {
  readonly code = "AGGREGATION_SOURCE_ERROR";
  readonly statusCode = 502;

  constructor(readonly source: unknown) {
    super(`Report population scan failed: ${source instanceof Error ? source.message : String(source)}`);
  }
}

/** Never surfaced to a request; logged and recorded by the dispatcher. */
export class ChannelDeliveryFailed extends Error {
  constructor(
    readonly channel: string,
    readonly recipientId: string,
    readonly attempts: number,
    readonly lastError: string
  ) {
    super(`Delivery via ${channel} to ${recipientId} failed after ${attempts} attempt(s): ${lastError}`);
    this.name = "ChannelDeliveryFailed";
  }
}

/** Thrown by the narrative service; the aggregator turns it into an absent narrative. */
export class AIUnavailable extends Error {
  constructor(readonly reason: string, readonly attempts: number) {
    super(`AI narrative unavailable after ${attempts} attempt(s): ${reason}`);
    this.name = "AIUnavailable";
  }
}

export class NotificationNotFound extends DomainError {
  readonly code = "NOTIFICATION_NOT_FOUND";
  readonly statusCode = 404;

  constructor(readonly notificationId: string) {
    super(`Notification ${notificationId} not found`);
  }
}
