import { model, Model } from "mongoose";
import { CaseUpdateDocument, CaseUpdateSchema } from "../../database/schemas/CaseUpdateSchema";

const CaseUpdate: Model<CaseUpdateDocument> = model<CaseUpdateDocument>("CaseUpdate", CaseUpdateSchema);

export { CaseUpdate };
