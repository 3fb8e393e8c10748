import { CaseUpdateKindEnum } from "./enums/caseUpdateKindEnum";
import { ReportStatusEnum } from "./enums/reportStatusEnum";

export interface CaseUpdateRecord {
  id: string;
  reportId: string;
  sequence: number;
  authorId: string;
  kind: CaseUpdateKindEnum;
  previousStatus: ReportStatusEnum;
  newStatus: ReportStatusEnum;
  note: string | null;
  createdAt: Date;
}
