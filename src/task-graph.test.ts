import { describe, expect, it } from "vitest";
import { buildCameraTree } from "./camera-tree";
import { InvalidPlanError } from "./errors";
import { artifactCacheKey, planTasks, transitionCacheKey } from "./task-graph";
import { shot } from "./testing/fakes";
import type { Camera } from "./types";

describe("planTasks", () => {
  const shots = [shot(0, "small"), shot(1, "large", { camera: { parentCameraIdx: 0 } })];

  it("should plan one first frame for a small shot and gate the child camera on it", async () => {
    const graph = planTasks(shots, await buildCameraTree(shots));

    expect(graph.order).toEqual(["0:first_frame", "0:shot_video", "1:first_frame", "1:last_frame", "1:shot_video"]);
    expect(graph.nodes.has("0:last_frame")).toBe(false);
    expect(graph.nodes.get("1:first_frame")?.prerequisites).toEqual(["0:first_frame"]);
    expect(graph.nodes.get("1:last_frame")?.prerequisites).toEqual(["1:first_frame"]);
    expect(graph.nodes.get("1:shot_video")).toEqual({
      id: "1:shot_video",
      shotIdx: 1,
      kind: "shot_video",
      cameraIdx: 1,
      cacheKey: "shots/1/video.mp4",
      prerequisites: ["1:first_frame", "1:last_frame"],
    });
  });

  it("should chain later shots of a camera to its opening first frame", async () => {
    const chained = [shot(0, "small"), shot(1, "medium", { camera: { sameCameraAs: 0 } })];

    const graph = planTasks(chained, await buildCameraTree(chained));

    expect(graph.nodes.get("1:first_frame")?.prerequisites).toEqual(["0:first_frame"]);
  });

  it("should restrict the plan to the targets and their prerequisites", async () => {
    const graph = planTasks(shots, await buildCameraTree(shots), { targets: ["1:shot_video"] });

    expect(graph.order).toEqual(["0:first_frame", "1:first_frame", "1:last_frame", "1:shot_video"]);
  });

  it("should reject unknown targets", async () => {
    const cameras = await buildCameraTree(shots);

    expect(() => planTasks(shots, cameras, { targets: ["0:last_frame"] })).toThrow('Unknown target task "0:last_frame"');
    expect(() => planTasks(shots, cameras, { targets: ["bogus"] })).toThrow(InvalidPlanError);
  });

  it("should reject prerequisites that are not planned", () => {
    const cameras: Camera[] = [
      { idx: 0, activeShotIdxs: [0] },
      { idx: 1, activeShotIdxs: [1], parentCamIdx: 0, parentShotIdx: 0, parentFrame: "last_frame" },
    ];

    expect(() => planTasks([shot(0, "small"), shot(1, "small")], cameras))
      .toThrow("Task 1:first_frame depends on 0:last_frame, which is not planned");
  });

  it("should reject shots no camera films", () => {
    expect(() => planTasks([shot(0, "small"), shot(1, "small")], [{ idx: 0, activeShotIdxs: [0] }]))
      .toThrow("Shot 1 is not filmed by any camera");
  });
});

describe("cache keys", () => {
  it("should derive paths from task identity", () => {
    expect(artifactCacheKey(3, "first_frame")).toBe("shots/3/first_frame.png");
    expect(artifactCacheKey(3, "last_frame")).toBe("shots/3/last_frame.png");
    expect(transitionCacheKey(0, 2)).toBe("transitions/cam_0_to_cam_2.mp4");
  });
});
