export {
  LibraryDiscoveryServiceTag,
  LibraryDiscoveryServiceLive,
  defaultSteamRoots,
  libraryConfigFiles,
} from "./LibraryDiscoveryService"
export type { LibraryDiscoveryService } from "./LibraryDiscoveryService"
