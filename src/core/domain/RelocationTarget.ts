/**
 * Subdirectories of steamapps that can be moved to another volume.
 *
 * `downloading` holds in-flight game downloads and is always relocated.
 * `temp` is Steam's scratch area for updates and is opt-in.
 */
export type RelocationTarget = "downloading" | "temp";

export const PRIMARY_TARGET: RelocationTarget = "downloading";

export interface TargetSelection {
  readonly includeTemp: boolean;
}

export const selectTargets = (selection: TargetSelection): ReadonlyArray<RelocationTarget> =>
  selection.includeTemp ? [PRIMARY_TARGET, "temp"] : [PRIMARY_TARGET];
