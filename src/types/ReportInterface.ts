import { ReportPriorityEnum } from "./enums/reportPriorityEnum";
import { ReportStatusEnum } from "./enums/reportStatusEnum";

export interface GeoLocation {
  lat: number;
  lon: number;
  address?: string;
  city?: string;
}

export interface ReportRecord {
  id: string;
  /** null when the report was filed anonymously */
  creatorId: string | null;
  category: string;
  description: string;
  location: GeoLocation;
  images: string[];
  priority: ReportPriorityEnum;
  status: ReportStatusEnum;
  assigneeId: string | null;
  createdAt: Date;
  updatedAt: Date;
  closedAt: Date | null;
  /** Bumped on every ledger append; compare-and-set token for writes. */
  version: number;
}

export interface NewReportInput {
  category: string;
  description: string;
  location: GeoLocation;
  images?: string[];
  priority?: ReportPriorityEnum;
  anonymous?: boolean;
}
