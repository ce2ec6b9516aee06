export { HostServiceTag, HostServiceLive, makeHostService } from "./HostService"
export type { Host } from "./HostService"
