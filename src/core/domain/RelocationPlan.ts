import * as NodePath from "node:path";
import { formatSize } from "@lib/formatSize";
import { selectTargets, type RelocationTarget, type TargetSelection } from "./RelocationTarget";

export const STEAMAPPS_DIR_NAME = "steamapps";
export const FALLBACK_LIBRARY_NAME = "steam_library";
export const DESTINATION_ROOT_SUFFIX = "_symlink";

export interface RelocationOperation {
  readonly target: RelocationTarget;
  /** Path inside steamapps that ends up as the symbolic link */
  readonly linkPath: string;
  /** Directory on the destination volume the link points at */
  readonly targetPath: string;
}

export interface RelocationPlan {
  readonly steamappsDir: string;
  readonly destinationBase: string;
  readonly destinationRoot: string;
  readonly operations: ReadonlyArray<RelocationOperation>;
}

/** Name of the library that owns a steamapps directory, e.g. "SteamLibrary". */
export const libraryNameOf = (steamappsDir: string): string =>
  NodePath.basename(NodePath.dirname(steamappsDir)) || FALLBACK_LIBRARY_NAME;

export const destinationRootFor = (steamappsDir: string, destinationBase: string): string =>
  NodePath.join(destinationBase, `${libraryNameOf(steamappsDir)}${DESTINATION_ROOT_SUFFIX}`);

/**
 * Build the plan for a library. Pure: paths are expected to be absolute already
 * and nothing is checked on disk.
 */
export const derivePlan = (
  steamappsDir: string,
  destinationBase: string,
  selection: TargetSelection
): RelocationPlan => {
  const destinationRoot = destinationRootFor(steamappsDir, destinationBase);

  return {
    steamappsDir,
    destinationBase,
    destinationRoot,
    operations: selectTargets(selection).map((target) => ({
      target,
      linkPath: NodePath.join(steamappsDir, target),
      targetPath: NodePath.join(destinationRoot, target),
    })),
  };
};

export const summarizePlan = (plan: RelocationPlan, freeBytes?: number): string[] => [
  `Library steamapps: ${plan.steamappsDir}`,
  `Destination root: ${plan.destinationRoot}`,
  ...(freeBytes !== undefined ? [`Free space at destination: ${formatSize(freeBytes)}`] : []),
  ...plan.operations.map((op) => `  - ${op.target}: ${op.linkPath} -> ${op.targetPath}`),
];
