import { Schema } from "mongoose";
import { CaseUpdateKindEnum } from "../../types/enums/caseUpdateKindEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";

export interface CaseUpdateDocument {
  _id: string;
  reportId: string;
  sequence: number;
  authorId: string;
  kind: CaseUpdateKindEnum;
  previousStatus: ReportStatusEnum;
  newStatus: ReportStatusEnum;
  note: string | null;
  createdAt: Date;
}

const statuses = Object.values(ReportStatusEnum);

// Every field is immutable: ledger entries are never edited once written.
const CaseUpdateSchema = new Schema<CaseUpdateDocument>(
  {
    _id: { type: String, required: true },
    reportId: { type: String, required: true, immutable: true },
    sequence: { type: Number, required: true, min: 1, immutable: true },
    authorId: { type: String, required: true, immutable: true },
    kind: { type: String, enum: Object.values(CaseUpdateKindEnum), required: true, immutable: true },
    previousStatus: { type: String, enum: statuses, required: true, immutable: true },
    newStatus: { type: String, enum: statuses, required: true, immutable: true },
    note: { type: String, default: null, immutable: true },
    createdAt: { type: Date, required: true, immutable: true },
  },
  { versionKey: false }
);

CaseUpdateSchema.index({ reportId: 1, sequence: 1 }, { unique: true });

export { CaseUpdateSchema };
