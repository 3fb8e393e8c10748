import { Schema } from "mongoose";
import { ReportPriorityEnum } from "../../types/enums/reportPriorityEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";

export interface ReportDocument {
  _id: string;
  creatorId: string | null;
  category: string;
  description: string;
  location: {
    lat: number;
    lon: number;
    address?: string;
    city?: string;
  };
  images: string[];
  priority: ReportPriorityEnum;
  status: ReportStatusEnum;
  assigneeId: string | null;
  createdAt: Date;
  updatedAt: Date;
  closedAt: Date | null;
  version: number;
}

const ReportSchema = new Schema<ReportDocument>(
  {
    _id: { type: String, required: true },
    creatorId: { type: String, default: null },
    category: { type: String, required: true, trim: true },
    description: { type: String, required: true },
    location: {
      lat: { type: Number, required: true, min: -90, max: 90 },
      lon: { type: Number, required: true, min: -180, max: 180 },
      address: { type: String },
      city: { type: String },
    },
    images: [{ type: String }],
    priority: {
      type: String,
      enum: Object.values(ReportPriorityEnum),
      default: ReportPriorityEnum.MEDIUM,
    },
    status: {
      type: String,
      enum: Object.values(ReportStatusEnum),
      default: ReportStatusEnum.PENDING,
    },
    assigneeId: { type: String, default: null },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
    closedAt: { type: Date, default: null },
    version: { type: Number, required: true, default: 0 },
  },
  { versionKey: false }
);

ReportSchema.index({ createdAt: -1 });
ReportSchema.index({ status: 1, createdAt: -1 });
ReportSchema.index({ category: 1, createdAt: -1 });
ReportSchema.index({ assigneeId: 1, createdAt: -1 });
ReportSchema.index({ creatorId: 1, createdAt: -1 });

export { ReportSchema };
