import { model, Model } from "mongoose";
import { DeliveryFailureDocument, DeliveryFailureSchema } from "../../database/schemas/DeliveryFailureSchema";

const DeliveryFailure: Model<DeliveryFailureDocument> = model<DeliveryFailureDocument>("DeliveryFailure", DeliveryFailureSchema);

export { DeliveryFailure };
