import type { CacheStore } from "./cache-store";
import { FatalIOError, RunFailedError, RunInterruptedError, errorName, extractErrorMessage } from "./errors";
import { EventBoard } from "./event-board";
import { checkArtifactType } from "./providers/files";
import type { RunEventLog } from "./run-events";
import { cameraOf, getNode, shotOf, type TaskGraph, type TaskNode } from "./task-graph";
import {
  taskId,
  type Artifact,
  type ArtifactKind,
  type Camera,
  type Shot,
  type ShotOutput,
  type TaskId,
  type TaskOutcome,
  type TaskState,
} from "./types";

export interface TaskContext {
  node: TaskNode;
  shot: Shot;
  camera: Camera;
  graph: TaskGraph;
  cache: CacheStore;
  /** Artifact path of a finished prerequisite. */
  pathOf(id: TaskId): string;
  isInterrupted(): boolean;
}

export type TaskExecutor = (ctx: TaskContext) => Promise<Artifact>;

export type TaskExecutors = Record<ArtifactKind, TaskExecutor>;

export interface SchedulerOptions {
  graph: TaskGraph;
  cache: CacheStore;
  executors: TaskExecutors;
  events?: RunEventLog;
  isInterrupted?: () => boolean;
  verbose?: boolean;
}

export interface SchedulerResult {
  outcomes: TaskOutcome[];         // topological order
  shots: ShotOutput[];             // shot order, finished shots only
}

/**
 * Launches every planned task at once. Each task is served from the cache or
 * waits for its prerequisites, then runs its executor and stores the
 * artifact. Resolves when all tasks finished; rejects with RunFailedError
 * when any of them failed.
 */
export async function runScheduler(options: SchedulerOptions): Promise<SchedulerResult> {
  const { graph, cache, executors, events, verbose = false } = options;
  const isInterrupted = options.isInterrupted ?? (() => false);
  const board = new EventBoard(graph.order);
  const outcomes = new Map<TaskId, TaskOutcome>();
  let fatal: FatalIOError | undefined;

  const transition = (id: TaskId, state: TaskState, extra: { cached?: boolean; error?: string } = {}): void => {
    events?.emitTaskState(id, state, extra);
    if (state === "failed") {
      console.error(`[scheduler] Task ${id} failed: ${extra.error ?? "unknown error"}`);
    } else if (verbose || state === "done") {
      console.log(`[scheduler] Task ${id} ${state}${extra.cached ? " (cached)" : ""}`);
    }
  };

  const runTask = async (node: TaskNode): Promise<void> => {
    try {
      if (await cache.exists(node.cacheKey)) {
        const path = cache.pathFor(node.cacheKey);
        board.markDone(node.id, path);
        outcomes.set(node.id, { id: node.id, state: "done", cached: true, path });
        transition(node.id, "done", { cached: true });
        return;
      }

      await board.waitForAll(node.id, node.prerequisites);
      transition(node.id, "ready");

      if (fatal) {
        throw fatal;
      }
      if (isInterrupted()) {
        throw new RunInterruptedError(`Task ${node.id}`);
      }

      transition(node.id, "running");
      const artifact = await executors[node.kind]({
        node,
        shot: shotOf(graph, node.shotIdx),
        camera: cameraOf(graph, node.cameraIdx),
        graph,
        cache,
        pathOf: (id) => board.pathOf(id),
        isInterrupted,
      });
      const path = await cache.save(node.cacheKey, checkArtifactType(artifact, node.cacheKey).data);
      board.markDone(node.id, path);
      outcomes.set(node.id, { id: node.id, state: "done", cached: false, path });
      transition(node.id, "done");
    } catch (error) {
      if (error instanceof FatalIOError && !fatal) {
        fatal = error;
      }
      const message = extractErrorMessage(error);
      board.markFailed(node.id, error);
      outcomes.set(node.id, { id: node.id, state: "failed", cached: false, error: message, errorName: errorName(error) });
      transition(node.id, "failed", { error: message });
    }
  };

  for (const id of graph.order) {
    events?.emitTaskState(id, "pending");
  }
  await Promise.all(graph.order.map((id) => runTask(getNode(graph, id))));

  const ordered = graph.order.flatMap((id) => {
    const outcome = outcomes.get(id);
    return outcome ? [outcome] : [];
  });
  const result: SchedulerResult = { outcomes: ordered, shots: collectShotOutputs(graph, board) };

  const failures = ordered.filter((o) => o.state === "failed");
  if (failures.length > 0) {
    throw new RunFailedError(
      failures.map((f) => ({ taskId: f.id, error: f.error ?? "unknown error", errorName: f.errorName ?? "Error" })),
      result.outcomes,
      result.shots,
    );
  }
  return result;
}

function collectShotOutputs(graph: TaskGraph, board: EventBoard): ShotOutput[] {
  const finished = (id: TaskId): string | undefined =>
    graph.nodes.has(id) && board.state(id) === "done" ? board.pathOf(id) : undefined;

  const outputs: ShotOutput[] = [];
  for (const shot of graph.shots.values()) {
    const video = finished(taskId(shot.idx, "shot_video"));
    const firstFrame = finished(taskId(shot.idx, "first_frame"));
    if (!video || !firstFrame) continue;

    const lastId = taskId(shot.idx, "last_frame");
    const lastFrame = finished(lastId);
    if (graph.nodes.has(lastId) && !lastFrame) continue;

    outputs.push({ shotIdx: shot.idx, firstFrame, video, ...(lastFrame ? { lastFrame } : {}) });
  }
  return outputs;
}
