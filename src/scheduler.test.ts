import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { CacheStore } from "./cache-store";
import { buildCameraTree } from "./camera-tree";
import { FatalIOError, RunFailedError, ValidationError } from "./errors";
import { RunEventLog } from "./run-events";
import { runScheduler, type TaskContext, type TaskExecutor, type TaskExecutors } from "./scheduler";
import { planTasks, type TaskGraph } from "./task-graph";
import { makeTempDir, shot } from "./testing/fakes";
import type { Artifact, Shot } from "./types";

async function plan(shots: Shot[]): Promise<TaskGraph> {
  return planTasks(shots, await buildCameraTree(shots));
}

function artifactFor(ctx: TaskContext): Artifact {
  return { data: Buffer.from(ctx.node.id), mimeType: ctx.node.kind === "shot_video" ? "video/mp4" : "image/png" };
}

function fakeExecutors(): { [K in keyof TaskExecutors]: Mock<TaskExecutor> } {
  return {
    first_frame: vi.fn<TaskExecutor>(async (ctx) => artifactFor(ctx)),
    last_frame: vi.fn<TaskExecutor>(async (ctx) => artifactFor(ctx)),
    shot_video: vi.fn<TaskExecutor>(async (ctx) => artifactFor(ctx)),
  };
}

async function runFailure(run: Promise<unknown>): Promise<RunFailedError> {
  const error = await run.catch((e: unknown) => e);
  if (!(error instanceof RunFailedError)) {
    throw new Error(`Expected RunFailedError, got ${String(error)}`);
  }
  return error;
}

describe("runScheduler", () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let cache: CacheStore;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    ({ dir, cleanup } = await makeTempDir());
    cache = new CacheStore(dir);
  });

  afterEach(async () => {
    await cleanup();
  });

  it("should run every task once and store its artifact", async () => {
    const graph = await plan([shot(0, "small"), shot(1, "large", { camera: { parentCameraIdx: 0 } })]);
    const executors = fakeExecutors();

    const result = await runScheduler({ graph, cache, executors });

    expect(executors.first_frame).toHaveBeenCalledTimes(2);
    expect(executors.last_frame).toHaveBeenCalledTimes(1);
    expect(executors.shot_video).toHaveBeenCalledTimes(2);
    expect(result.outcomes.map((o) => [o.id, o.state, o.cached])).toEqual([
      ["0:first_frame", "done", false],
      ["0:shot_video", "done", false],
      ["1:first_frame", "done", false],
      ["1:last_frame", "done", false],
      ["1:shot_video", "done", false],
    ]);
    expect(result.shots).toEqual([
      { shotIdx: 0, firstFrame: cache.pathFor("shots/0/first_frame.png"), video: cache.pathFor("shots/0/video.mp4") },
      {
        shotIdx: 1,
        firstFrame: cache.pathFor("shots/1/first_frame.png"),
        lastFrame: cache.pathFor("shots/1/last_frame.png"),
        video: cache.pathFor("shots/1/video.mp4"),
      },
    ]);
    expect((await cache.load("shots/1/last_frame.png")).toString()).toBe("1:last_frame");
  });

  it("should serve a cached artifact without calling its generator and release its dependents", async () => {
    const graph = await plan([shot(0, "small"), shot(1, "large", { camera: { parentCameraIdx: 0 } })]);
    await cache.save("shots/0/first_frame.png", Buffer.from("prepared"));
    const executors = fakeExecutors();
    const prerequisitePaths: string[] = [];
    executors.first_frame.mockImplementation(async (ctx) => {
      prerequisitePaths.push(...ctx.node.prerequisites.map((id) => ctx.pathOf(id)));
      return artifactFor(ctx);
    });

    const result = await runScheduler({ graph, cache, executors });

    expect(executors.first_frame).toHaveBeenCalledTimes(1);
    expect(executors.first_frame.mock.calls[0][0].node.id).toBe("1:first_frame");
    expect(prerequisitePaths).toEqual([cache.pathFor("shots/0/first_frame.png")]);
    expect(result.outcomes[0]).toEqual({ id: "0:first_frame", state: "done", cached: true, path: cache.pathFor("shots/0/first_frame.png") });
  });

  it("should fail dependents of a failed task and keep independent branches running", async () => {
    const graph = await plan([
      shot(0, "small"),
      shot(1, "small", { camera: { parentCameraIdx: null } }),
    ]);
    const executors = fakeExecutors();
    executors.first_frame.mockImplementation(async (ctx) => {
      if (ctx.shot.idx === 0) {
        throw new ValidationError("no image in response");
      }
      return artifactFor(ctx);
    });

    const error = await runFailure(runScheduler({ graph, cache, executors }));

    expect(error.failures).toEqual([
      { taskId: "0:first_frame", error: "no image in response", errorName: "ValidationError" },
      { taskId: "0:shot_video", error: "Task 0:shot_video skipped: prerequisite 0:first_frame failed", errorName: "DependencyFailedError" },
    ]);
    expect(error.shots.map((s) => s.shotIdx)).toEqual([1]);
    expect(executors.shot_video).toHaveBeenCalledTimes(1);
  });

  it("should stop starting tasks after a fatal error", async () => {
    const graph = await plan([
      shot(0, "small"),
      shot(1, "large", { camera: { parentCameraIdx: null } }),
    ]);
    const events = new RunEventLog();
    let shotOneStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => { shotOneStarted = resolve; });
    let shotZeroFailed: () => void = () => undefined;
    const failed = new Promise<void>((resolve) => { shotZeroFailed = resolve; });
    events.subscribe((event) => {
      if (event.type === "task_state" && event.payload.taskId === "0:first_frame" && event.payload.state === "failed") {
        shotZeroFailed();
      }
    });

    const executors = fakeExecutors();
    executors.first_frame.mockImplementation(async (ctx) => {
      if (ctx.shot.idx === 0) {
        await started;
        throw new FatalIOError("disk full");
      }
      shotOneStarted();
      await failed;
      return artifactFor(ctx);
    });

    const error = await runFailure(runScheduler({ graph, cache, executors, events }));

    expect(executors.last_frame).not.toHaveBeenCalled();
    expect(error.outcomes.map((o) => [o.id, o.state, o.errorName])).toEqual([
      ["0:first_frame", "failed", "FatalIOError"],
      ["0:shot_video", "failed", "DependencyFailedError"],
      ["1:first_frame", "done", undefined],
      ["1:last_frame", "failed", "FatalIOError"],
      ["1:shot_video", "failed", "DependencyFailedError"],
    ]);
  });

  it("should reject an artifact whose format does not match its cache key", async () => {
    const graph = await plan([shot(0, "small")]);
    const executors = fakeExecutors();
    executors.first_frame.mockResolvedValue({ data: Buffer.from("jpeg"), mimeType: "image/jpeg" });

    const error = await runFailure(runScheduler({ graph, cache, executors }));

    expect(error.failures[0]).toEqual({
      taskId: "0:first_frame",
      error: "Expected image/png for shots/0/first_frame.png, got image/jpeg",
      errorName: "ValidationError",
    });
    expect(await cache.exists("shots/0/first_frame.png")).toBe(false);
  });

  it("should start every task only after its prerequisites are done, whatever the timing", async () => {
    const graph = await plan([
      shot(0, "medium"),
      shot(1, "small", { camera: { parentCameraIdx: 0 } }),
      shot(2, "large", { camera: { parentCameraIdx: null } }),
      shot(3, "medium", { camera: { sameCameraAs: 2 } }),
      shot(4, "small", { camera: { parentCameraIdx: 2 } }),
      shot(5, "large", { camera: { sameCameraAs: 0 } }),
    ]);

    for (const seed of [1, 5, 11]) {
      const roundCache = new CacheStore(`${dir}/round-${seed}`);
      const done = new Set<string>();
      const violations: string[] = [];
      const executor = vi.fn<TaskExecutor>(async (ctx) => {
        for (const prerequisite of ctx.node.prerequisites) {
          if (!done.has(prerequisite)) {
            violations.push(`${ctx.node.id} started before ${prerequisite}`);
          }
        }
        const position = graph.order.indexOf(ctx.node.id);
        await new Promise((resolve) => setTimeout(resolve, ((position + 1) * seed) % 7));
        done.add(ctx.node.id);
        return artifactFor(ctx);
      });

      await runScheduler({
        graph,
        cache: roundCache,
        executors: { first_frame: executor, last_frame: executor, shot_video: executor },
      });

      expect(violations).toEqual([]);
      expect(executor).toHaveBeenCalledTimes(graph.order.length);
    }
  });

  it("should not start new tasks once interrupted", async () => {
    const graph = await plan([shot(0, "small")]);
    const executors = fakeExecutors();

    const error = await runFailure(runScheduler({ graph, cache, executors, isInterrupted: () => true }));

    expect(executors.first_frame).not.toHaveBeenCalled();
    expect(error.failures[0]).toEqual({
      taskId: "0:first_frame",
      error: "Task 0:first_frame not started: run interrupted",
      errorName: "RunInterruptedError",
    });
  });

  it("should report each task's state transitions", async () => {
    const graph = await plan([shot(0, "small")]);
    const events = new RunEventLog();

    await runScheduler({ graph, cache, executors: fakeExecutors(), events });

    const states = events.events().flatMap((e) =>
      e.type === "task_state" && e.payload.taskId === "0:first_frame" ? [e.payload.state] : []);
    expect(states).toEqual(["pending", "ready", "running", "done"]);
  });
});
