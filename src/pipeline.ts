import type { CacheStore } from "./cache-store";
import { buildCameraTree, cameraTreeSchema, heuristicParentMatcher, verifyCameraTree, type ParentMatcher } from "./camera-tree";
import { CameraTreeError, RunFailedError, ValidationError } from "./errors";
import type { GenerationServices } from "./providers/registry";
import type { RemoteGateway } from "./remote";
import type { RunEventLog } from "./run-events";
import { runScheduler, type SchedulerResult, type TaskExecutors } from "./scheduler";
import { CAMERA_TREE_KEY, planTasks, type TaskGraph } from "./task-graph";
import { createFirstFrameExecutor, createLastFrameExecutor, type ExecutorDeps } from "./tools/generate-frame";
import { createShotVideoExecutor } from "./tools/generate-video";
import { saveRunReport } from "./tools/state";
import type { Camera, RunReport, Shot, ShotOutput, TaskOutcome } from "./types";

export interface PipelineDeps {
  cache: CacheStore;
  gateway: RemoteGateway;
  services: GenerationServices;
  matcher: ParentMatcher;
  events?: RunEventLog;
  isInterrupted?: () => boolean;
}

export interface PipelineOptions {
  targets?: string[];
  verbose?: boolean;
}

export interface RunPlan {
  cameras: Camera[];
  graph: TaskGraph;
}

export interface PipelineResult extends SchedulerResult, RunPlan {
  report: RunReport;
}

export function createExecutors(deps: ExecutorDeps): TaskExecutors {
  return {
    first_frame: createFirstFrameExecutor(deps),
    last_frame: createLastFrameExecutor(deps),
    shot_video: createShotVideoExecutor(deps),
  };
}

/**
 * Loads camera_tree.json when it still fits the shot list; otherwise builds
 * the tree and caches it. A cached tree that no longer verifies is removed.
 */
export async function resolveCameraTree(shots: readonly Shot[], cache: CacheStore, matcher: ParentMatcher): Promise<Camera[]> {
  if (await cache.exists(CAMERA_TREE_KEY)) {
    try {
      const cameras = await cache.loadJson(CAMERA_TREE_KEY, cameraTreeSchema);
      verifyCameraTree(cameras, shots);
      console.log(`[camera-tree] Loaded ${cameras.length} cameras from existing file.`);
      return cameras;
    } catch (error) {
      if (!(error instanceof ValidationError || error instanceof CameraTreeError)) {
        throw error;
      }
      console.warn(`[camera-tree] Discarding stale ${CAMERA_TREE_KEY}: ${error.message}`);
      await cache.remove(CAMERA_TREE_KEY);
    }
  }

  const cameras = await buildCameraTree(shots, { matcher });
  const treePath = await cache.saveJson(CAMERA_TREE_KEY, cameras);
  console.log(`[camera-tree] Constructed ${cameras.length} cameras and saved to ${treePath}.`);
  return cameras;
}

export async function planRun(
  shots: readonly Shot[],
  deps: Pick<PipelineDeps, "cache" | "matcher">,
  targets?: readonly string[],
): Promise<RunPlan> {
  const cameras = await resolveCameraTree(shots, deps.cache, deps.matcher);
  return { cameras, graph: planTasks(shots, cameras, { targets }) };
}

/**
 * Plan without touching the working directory: a valid cached tree is used
 * as is, otherwise the tree is built in memory with the heuristic matcher.
 */
export async function previewRun(
  shots: readonly Shot[],
  cache: CacheStore,
  targets?: readonly string[],
): Promise<RunPlan> {
  let cameras: Camera[] | undefined;
  if (await cache.exists(CAMERA_TREE_KEY)) {
    try {
      cameras = await cache.loadJson(CAMERA_TREE_KEY, cameraTreeSchema);
      verifyCameraTree(cameras, shots);
    } catch (error) {
      if (!(error instanceof ValidationError || error instanceof CameraTreeError)) {
        throw error;
      }
      console.warn(`[camera-tree] Ignoring stale ${CAMERA_TREE_KEY}: ${error.message}`);
      cameras = undefined;
    }
  }
  if (!cameras) {
    console.log("[camera-tree] No usable camera tree on disk; planning with the heuristic matcher.");
    cameras = await buildCameraTree(shots, { matcher: heuristicParentMatcher });
  }
  return { cameras, graph: planTasks(shots, cameras, { targets }) };
}

/** One line per planned task, with whether its artifact is already cached. */
export async function describePlan(graph: TaskGraph, cache: CacheStore): Promise<string[]> {
  const lines: string[] = [];
  for (const id of graph.order) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    const cached = await cache.exists(node.cacheKey);
    const after = node.prerequisites.length > 0 ? ` after ${node.prerequisites.join(", ")}` : "";
    lines.push(`${cached ? "[cached] " : "[pending]"} ${id} (camera ${node.cameraIdx})${after} -> ${node.cacheKey}`);
  }
  return lines;
}

function buildReport(
  cache: CacheStore,
  startedAt: string,
  outcomes: TaskOutcome[],
  shots: ShotOutput[],
  generatorCalls: number,
): RunReport {
  return {
    workingDir: cache.workingDir,
    startedAt,
    finishedAt: new Date().toISOString(),
    tasks: outcomes,
    failures: outcomes.filter((o) => o.state === "failed"),
    shots,
    generatorCalls,
  };
}

/**
 * Resolves the camera tree, plans the tasks and runs them. The run report is
 * written whether or not the run succeeds.
 */
export async function runPipeline(shots: readonly Shot[], deps: PipelineDeps, options: PipelineOptions = {}): Promise<PipelineResult> {
  const { cache, gateway, events } = deps;
  const isInterrupted = deps.isInterrupted ?? (() => false);
  const startedAt = new Date().toISOString();
  const callsBefore = gateway.callCount;

  const plan = await planRun(shots, deps, options.targets);
  console.log(`[pipeline] ${plan.graph.order.length} tasks across ${plan.graph.shots.size} shots and ${plan.cameras.length} cameras`);
  events?.emitRunStatus("running");

  let result: SchedulerResult;
  try {
    result = await runScheduler({
      graph: plan.graph,
      cache,
      executors: createExecutors({ ...deps.services, gateway }),
      events,
      isInterrupted,
      verbose: options.verbose,
    });
  } catch (error) {
    if (error instanceof RunFailedError) {
      const report = buildReport(cache, startedAt, error.outcomes, error.shots, gateway.callCount - callsBefore);
      const reportPath = await saveRunReport(cache, report);
      console.error(`[pipeline] ${error.failures.length} task(s) failed. Report saved to ${reportPath}`);
      events?.emitRunStatus(isInterrupted() ? "interrupted" : "failed", error.message);
    }
    throw error;
  }

  const report = buildReport(cache, startedAt, result.outcomes, result.shots, gateway.callCount - callsBefore);
  const reportPath = await saveRunReport(cache, report);
  events?.emitRunStatus("completed");

  const cached = result.outcomes.filter((o) => o.cached).length;
  console.log("\n=== Run Complete ===");
  console.log(`Tasks: ${result.outcomes.length} (${cached} cached, ${result.outcomes.length - cached} generated)`);
  console.log(`Shots with video: ${result.shots.length}`);
  console.log(`Generator calls: ${report.generatorCalls}`);
  console.log(`Report: ${reportPath}`);

  return { ...result, ...plan, report };
}
