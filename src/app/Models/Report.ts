import { model, Model } from "mongoose";
import { ReportDocument, ReportSchema } from "../../database/schemas/ReportSchema";

const Report: Model<ReportDocument> = model<ReportDocument>("Report", ReportSchema);

export { Report };
