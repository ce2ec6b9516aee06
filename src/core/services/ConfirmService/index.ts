export {
  ConfirmServiceTag,
  ConfirmServiceAlwaysApprove,
  ConfirmServiceAlwaysDecline,
  makeScriptedConfirmService,
} from "./ConfirmService"
export type { ConfirmService, ConfirmRequest, ScriptedConfirm } from "./ConfirmService"
