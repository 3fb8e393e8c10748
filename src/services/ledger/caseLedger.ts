import { CaseUpdateRecord } from "../../types/CaseUpdateInterface";
import { CaseUpdateKindEnum } from "../../types/enums/caseUpdateKindEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";
import { LedgerOrderViolation } from "../errors";
import { CaseUpdateStore, StoreSession } from "../stores";

export const INITIAL_STATUS = ReportStatusEnum.PENDING;

/**
 * Append-only history of a report. Entries are numbered 1..N per report and
 * never change once written.
 */
export class CaseLedger {
  constructor(private readonly store: CaseUpdateStore) {}

  async append(update: CaseUpdateRecord, session?: StoreSession): Promise<void> {
    const last = await this.store.last(update.reportId, session);
    const expected = (last?.sequence ?? 0) + 1;
    if (update.sequence !== expected) {
      throw new LedgerOrderViolation(
        `Report ${update.reportId}: expected sequence ${expected}, got ${update.sequence}`
      );
    }
    if (last && update.createdAt.getTime() < last.createdAt.getTime()) {
      throw new LedgerOrderViolation(`Report ${update.reportId}: entry ${update.sequence} predates entry ${last.sequence}`);
    }
    if (last && update.previousStatus !== last.newStatus) {
      throw new LedgerOrderViolation(
        `Report ${update.reportId}: entry ${update.sequence} starts from ${update.previousStatus} but the report is ${last.newStatus}`
      );
    }
    await this.store.append(Object.freeze({ ...update }), session);
  }

  async history(reportId: string): Promise<CaseUpdateRecord[]> {
    const entries = await this.store.list(reportId);
    return [...entries].sort((a, b) => a.sequence - b.sequence);
  }

  /** Rebuilds the status a report reached from its ordered history alone. */
  static replay(history: readonly CaseUpdateRecord[]): ReportStatusEnum {
    let status = INITIAL_STATUS;
    history.forEach((entry, idx) => {
      if (entry.sequence !== idx + 1) {
        throw new LedgerOrderViolation(`Gap in history at position ${idx + 1} (sequence ${entry.sequence})`);
      }
      if (entry.previousStatus !== status) {
        throw new LedgerOrderViolation(`Entry ${entry.sequence} starts from ${entry.previousStatus}, expected ${status}`);
      }
      if (entry.kind === CaseUpdateKindEnum.COMMENT && entry.newStatus !== entry.previousStatus) {
        throw new LedgerOrderViolation(`Comment ${entry.sequence} changes status`);
      }
      status = entry.newStatus;
    });
    return status;
  }
}
