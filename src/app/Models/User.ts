import { model, Model } from "mongoose";
import { UserDocument, UserSchema } from "../../database/schemas/UserSchema";

const User: Model<UserDocument> = model<UserDocument>("User", UserSchema);

export { User };
