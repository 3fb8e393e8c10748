export enum UserRoleEnum {
  REPORTER = "reportante",
  HANDLER = "encargado",
  ADMIN = "admin",
}
