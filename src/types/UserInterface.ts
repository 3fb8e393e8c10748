import { UserRoleEnum } from "./enums/userRoleEnum";

export interface DirectoryUser {
  id: string;
  name: string;
  email: string | null;
  phone: string | null;
  role: UserRoleEnum;
  isActive: boolean;
  pushTokens: string[];
}
