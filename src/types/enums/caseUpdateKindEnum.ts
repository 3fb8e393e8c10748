export enum CaseUpdateKindEnum {
  STATUS_CHANGE = "status_change",
  COMMENT = "comment",
}
