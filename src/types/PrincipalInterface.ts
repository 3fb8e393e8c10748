import { UserRoleEnum } from "./enums/userRoleEnum";

/** The acting user, as vouched for by the identity layer. */
export interface Principal {
  id: string;
  role: UserRoleEnum;
}
