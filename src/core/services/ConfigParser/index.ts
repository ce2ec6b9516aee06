export {
  ConfigParserServiceTag,
  ConfigParserServiceLive,
  DiscoveryReadFailure,
} from "./ConfigParserService"
export type { ConfigParserService } from "./ConfigParserService"
