import { Data, Effect, Layer, pipe } from "effect";
import { Path } from "@effect/platform";
import type { Terminal } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";

import { HostServiceLive } from "./services/HostService";
import { DiskStatsServiceTag, DiskStatsServiceLive } from "./services/DiskStatsService";
import { LinkServiceLive } from "./services/LinkService";
import { ConfigParserServiceLive } from "./services/ConfigParser";
import { LibraryDiscoveryServiceTag, LibraryDiscoveryServiceLive } from "./services/LibraryDiscovery";
import { PathClassifierServiceTag, PathClassifierServiceLive } from "./services/PathClassifier";
import { RelocationPlannerServiceTag, RelocationPlannerServiceLive } from "./services/RelocationPlanner";
import { TransferServiceTag, TransferServiceLive } from "./services/TransferService";
import {
  RelocationExecutorServiceTag,
  RelocationExecutorServiceLive,
  type ExecutePlanOptions,
  type RelocationResult
} from "./services/RelocationExecutor";
import { ConfirmServiceTag } from "./services/ConfirmService";

import type { PathState } from "./domain/PathState";
import {
  STEAMAPPS_DIR_NAME,
  summarizePlan,
  type RelocationOperation,
  type RelocationPlan
} from "./domain/RelocationPlan";

export type { RelocationTarget, TargetSelection } from "./domain/RelocationTarget";
export type { RelocationOperation, RelocationPlan } from "./domain/RelocationPlan";
export { derivePlan, summarizePlan } from "./domain/RelocationPlan";
export { PathState, describePathState } from "./domain/PathState";
export type { Host } from "./services/HostService";
export type { ConfirmRequest, ConfirmService } from "./services/ConfirmService";
export {
  ConfirmServiceTag,
  ConfirmServiceAlwaysApprove,
  ConfirmServiceAlwaysDecline,
  makeScriptedConfirmService
} from "./services/ConfirmService";
export type { RelocationError } from "./services/RelocationExecutor";
export { RelocationResult, describeRelocationError } from "./services/RelocationExecutor";

export type { DiscoveryReadFailure } from "./services/ConfigParser";
export type { InvalidSource, DestinationUnavailable } from "./services/RelocationPlanner";
export type {
  InsufficientPrivilege,
  LinkCreationFailed,
  PathRemovalFailed
} from "./services/LinkService";
export type { MoveFailure } from "./services/TransferService";
export type { PathNotADirectory } from "./services/RelocationExecutor";

export interface RelocationRequest {
  readonly steamappsDir: string;
  readonly destinationBase: string;
  readonly includeTemp: boolean;
}

export interface InspectedOperation {
  readonly operation: RelocationOperation;
  readonly state: PathState;
}

export type RelocationRun = Data.TaggedEnum<{
  Cancelled: { readonly reason: string };
  Completed: {
    readonly plan: RelocationPlan;
    readonly results: ReadonlyArray<RelocationResult>;
  };
}>;

export const RelocationRun = Data.taggedEnum<RelocationRun>();

export const discoverLibraries = Effect.flatMap(LibraryDiscoveryServiceTag, (discovery) =>
  discovery.discover()
);

/**
 * Plan a relocation and classify every link path without changing anything.
 */
export const inspectRelocation = (request: RelocationRequest) =>
  Effect.gen(function* () {
    const planner = yield* RelocationPlannerServiceTag;
    const classifier = yield* PathClassifierServiceTag;

    const plan = yield* planner.inspect(request.steamappsDir, request.destinationBase, request);
    const operations = yield* Effect.forEach(plan.operations, (operation) =>
      Effect.map(
        classifier.classify(operation.linkPath, operation.targetPath),
        (state): InspectedOperation => ({ operation, state })
      )
    );

    return { plan, operations };
  });

/**
 * The full relocation run: confirm an unusual source, plan, confirm the
 * summary, then execute every operation in order.
 *
 * Fails only for problems found before anything is mutated (InvalidSource,
 * DestinationUnavailable). Per-operation failures are reported as results.
 */
export const relocate = (request: RelocationRequest, options?: ExecutePlanOptions) =>
  Effect.gen(function* () {
    const confirm = yield* ConfirmServiceTag;
    const planner = yield* RelocationPlannerServiceTag;
    const executor = yield* RelocationExecutorServiceTag;
    const diskStats = yield* DiskStatsServiceTag;
    const path = yield* Path.Path;

    if (path.basename(request.steamappsDir) !== STEAMAPPS_DIR_NAME) {
      const proceed = yield* confirm.confirm({
        title: "Confirm steamapps",
        message: `Selected directory does not end with '${STEAMAPPS_DIR_NAME}':\n${request.steamappsDir}\n\nProceed anyway?`
      });
      if (!proceed) {
        return RelocationRun.Cancelled({ reason: "Source directory not confirmed" });
      }
    }

    const plan = yield* planner.plan(request.steamappsDir, request.destinationBase, request);

    const freeBytes = yield* pipe(
      diskStats.getStats(plan.destinationBase),
      Effect.map((stats): number | undefined => stats.free),
      Effect.catchAll((e) =>
        pipe(Effect.logDebug(`Free space unknown for ${plan.destinationBase}: ${e._tag}`), Effect.as(undefined))
      )
    );

    const approved = yield* confirm.confirm({
      title: "Proceed?",
      message: [
        "This will create/replace symlinks as follows:",
        "",
        ...summarizePlan(plan, freeBytes)
      ].join("\n")
    });
    if (!approved) {
      return RelocationRun.Cancelled({ reason: "Relocation not confirmed" });
    }

    const results = yield* executor.executePlan(plan, options);
    return RelocationRun.Completed({ plan, results });
  });

/**
 * Everything the core needs apart from the host, link primitives, disk stats,
 * confirmation policy and platform. Tests provide those themselves.
 */
/** Core services over the given transfer backend */
export const makeCoreServices = <E, R>(transfer: Layer.Layer<TransferServiceTag, E, R>) =>
  pipe(
    Layer.mergeAll(LibraryDiscoveryServiceLive, RelocationExecutorServiceLive),
    Layer.provideMerge(
      Layer.mergeAll(
        ConfigParserServiceLive,
        PathClassifierServiceLive,
        RelocationPlannerServiceLive,
        transfer
      )
    )
  );

export const CoreServicesLive = makeCoreServices(TransferServiceLive);

export const createAppLayer = (
  confirm: Layer.Layer<ConfirmServiceTag, never, Terminal.Terminal>
) =>
  pipe(
    CoreServicesLive,
    Layer.provideMerge(Layer.mergeAll(LinkServiceLive, confirm)),
    Layer.provideMerge(Layer.mergeAll(HostServiceLive, DiskStatsServiceLive)),
    Layer.provideMerge(NodeContext.layer)
  );
