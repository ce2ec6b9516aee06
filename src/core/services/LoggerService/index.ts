export { LoggerServiceTag, LoggerServiceLive, formatResultLine } from "./LoggerService"
export type { LoggerService } from "./LoggerService"
