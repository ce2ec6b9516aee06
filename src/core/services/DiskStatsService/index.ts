export {
  DiskStatsServiceTag,
  DiskStatsServiceLive,
  DiskStatsPermissionDenied,
  DiskStatsUnknownError,
  toDiskStatsError
} from "./DiskStatsService";
export type { DiskStatsService, DiskStats, DiskStatsError } from "./DiskStatsService";
