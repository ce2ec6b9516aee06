export { TransferServiceTag, TransferServiceLive, MoveFailure } from "./TransferService"
export type { TransferService, TransferReport } from "./TransferService"
