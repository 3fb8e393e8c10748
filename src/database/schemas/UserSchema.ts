import { Schema } from "mongoose";
import { UserRoleEnum } from "../../types/enums/userRoleEnum";

export interface UserDocument {
  _id: string;
  name: string;
  email: string | null;
  phone: string | null;
  role: UserRoleEnum;
  isActive: boolean;
  pushTokens: string[];
}

const UserSchema = new Schema<UserDocument>(
  {
    _id: { type: String, required: true },
    name: { type: String, required: true },
    email: { type: String, default: null },
    phone: { type: String, default: null },
    role: {
      type: String,
      enum: Object.values(UserRoleEnum),
      default: UserRoleEnum.REPORTER,
    },
    isActive: { type: Boolean, default: true },
    pushTokens: [{ type: String }],
  },
  { versionKey: false, timestamps: true }
);

UserSchema.index({ role: 1, isActive: 1 });

export { UserSchema };
