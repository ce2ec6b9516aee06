export {
  RelocationPlannerServiceTag,
  RelocationPlannerServiceLive,
  InvalidSource,
  DestinationUnavailable,
} from "./RelocationPlannerService"
export type { RelocationPlannerService, PlanError } from "./RelocationPlannerService"
