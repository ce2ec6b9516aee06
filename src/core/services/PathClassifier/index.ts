export { PathClassifierServiceTag, PathClassifierServiceLive } from "./PathClassifierService"
export type { PathClassifierService } from "./PathClassifierService"
