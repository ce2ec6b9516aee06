export {
  LinkServiceTag,
  LinkServiceLive,
  InsufficientPrivilege,
  LinkCreationFailed,
  PathRemovalFailed,
  toLinkError,
} from "./LinkService"
export type { LinkService, LinkError } from "./LinkService"
