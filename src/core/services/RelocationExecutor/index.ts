export {
  RelocationExecutorServiceTag,
  RelocationExecutorServiceLive,
  RelocationResult,
  PathNotADirectory,
  describeRelocationError,
  privilegeRemediation,
} from "./RelocationExecutorService"
export type {
  RelocationExecutorService,
  RelocationError,
  ExecutePlanOptions,
} from "./RelocationExecutorService"
