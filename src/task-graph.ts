import { InvalidPlanError } from "./errors";
import { parseTaskId, requiresLastFrame, taskId, type ArtifactKind, type Camera, type Shot, type TaskId } from "./types";

export interface TaskNode {
  id: TaskId;
  shotIdx: number;
  kind: ArtifactKind;
  cameraIdx: number;
  cacheKey: string;
  prerequisites: TaskId[];
}

export interface TaskGraph {
  nodes: Map<TaskId, TaskNode>;
  order: TaskId[];                 // topological, ties in shot order
  shots: Map<number, Shot>;
  cameras: Map<number, Camera>;
}

export interface PlanOptions {
  /** Restrict the plan to these tasks and everything they depend on. */
  targets?: readonly string[];
}

// ---------------------------------------------------------------------------
// Cache keys
// ---------------------------------------------------------------------------

const ARTIFACT_FILES: Record<ArtifactKind, string> = {
  first_frame: "first_frame.png",
  last_frame: "last_frame.png",
  shot_video: "video.mp4",
};

export const CAMERA_TREE_KEY = "camera_tree.json";
export const RUN_REPORT_KEY = "run_report.json";

export function artifactCacheKey(shotIdx: number, kind: ArtifactKind): string {
  return `shots/${shotIdx}/${ARTIFACT_FILES[kind]}`;
}

export function transitionCacheKey(parentCamIdx: number, childCamIdx: number): string {
  return `transitions/cam_${parentCamIdx}_to_cam_${childCamIdx}.mp4`;
}

export function newCameraImageKey(shotIdx: number, cameraIdx: number): string {
  return `shots/${shotIdx}/new_camera_${cameraIdx}.png`;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

function firstFramePrerequisites(shot: Shot, camera: Camera): TaskId[] {
  const opening = camera.activeShotIdxs[0];
  if (opening !== shot.idx) {
    return [taskId(opening, "first_frame")];
  }
  if (camera.parentCamIdx === undefined || camera.parentShotIdx === undefined) {
    return [];
  }
  return [taskId(camera.parentShotIdx, camera.parentFrame ?? "first_frame")];
}

/**
 * Derives every task of the run from the shots and their camera forest.
 * Throws InvalidPlanError when a prerequisite or target does not resolve.
 */
export function planTasks(shots: readonly Shot[], cameras: readonly Camera[], options: PlanOptions = {}): TaskGraph {
  const cameraOfShot = new Map<number, Camera>();
  for (const camera of cameras) {
    for (const shotIdx of camera.activeShotIdxs) {
      cameraOfShot.set(shotIdx, camera);
    }
  }

  const all = new Map<TaskId, TaskNode>();
  const add = (shot: Shot, camera: Camera, kind: ArtifactKind, prerequisites: TaskId[]): void => {
    const id = taskId(shot.idx, kind);
    all.set(id, { id, shotIdx: shot.idx, kind, cameraIdx: camera.idx, cacheKey: artifactCacheKey(shot.idx, kind), prerequisites });
  };

  for (const shot of shots) {
    const camera = cameraOfShot.get(shot.idx);
    if (!camera) {
      throw new InvalidPlanError(`Shot ${shot.idx} is not filmed by any camera`);
    }
    const first = taskId(shot.idx, "first_frame");
    add(shot, camera, "first_frame", firstFramePrerequisites(shot, camera));
    if (requiresLastFrame(shot.variationType)) {
      const last = taskId(shot.idx, "last_frame");
      add(shot, camera, "last_frame", [first]);
      add(shot, camera, "shot_video", [first, last]);
    } else {
      add(shot, camera, "shot_video", [first]);
    }
  }

  for (const node of all.values()) {
    for (const prerequisite of node.prerequisites) {
      if (!all.has(prerequisite)) {
        throw new InvalidPlanError(`Task ${node.id} depends on ${prerequisite}, which is not planned`);
      }
    }
  }

  const nodes = options.targets && options.targets.length > 0 ? closure(all, options.targets) : all;

  return {
    nodes,
    order: topologicalOrder(nodes),
    shots: new Map(shots.map((s) => [s.idx, s])),
    cameras: new Map(cameras.map((c) => [c.idx, c])),
  };
}

function closure(all: ReadonlyMap<TaskId, TaskNode>, targets: readonly string[]): Map<TaskId, TaskNode> {
  const stack: TaskId[] = [];
  for (const target of targets) {
    const parsed = parseTaskId(target);
    const id = parsed ? taskId(parsed.shotIdx, parsed.kind) : undefined;
    if (!id || !all.has(id)) {
      throw new InvalidPlanError(`Unknown target task "${target}"`);
    }
    stack.push(id);
  }

  const selected = new Set<TaskId>();
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || selected.has(id)) continue;
    selected.add(id);
    stack.push(...(all.get(id)?.prerequisites ?? []));
  }

  // Keep planning order so the topological sort stays stable.
  const nodes = new Map<TaskId, TaskNode>();
  for (const [id, node] of all) {
    if (selected.has(id)) nodes.set(id, node);
  }
  return nodes;
}

function topologicalOrder(nodes: ReadonlyMap<TaskId, TaskNode>): TaskId[] {
  const remaining = new Map<TaskId, number>();
  const dependents = new Map<TaskId, TaskId[]>();
  for (const node of nodes.values()) {
    remaining.set(node.id, node.prerequisites.length);
    for (const prerequisite of node.prerequisites) {
      const list = dependents.get(prerequisite) ?? [];
      list.push(node.id);
      dependents.set(prerequisite, list);
    }
  }

  const rank = new Map([...nodes.keys()].map((id, i) => [id, i]));
  const ready = [...nodes.keys()].filter((id) => remaining.get(id) === 0);
  const order: TaskId[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0));
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) ready.push(dependent);
    }
  }

  if (order.length !== nodes.size) {
    const stuck = [...nodes.keys()].filter((id) => !order.includes(id));
    throw new InvalidPlanError(`Task graph has a cycle through ${stuck.join(", ")}`);
  }
  return order;
}

export function getNode(graph: TaskGraph, id: TaskId): TaskNode {
  const node = graph.nodes.get(id);
  if (!node) {
    throw new InvalidPlanError(`Task ${id} is not planned`);
  }
  return node;
}

export function shotOf(graph: TaskGraph, shotIdx: number): Shot {
  const shot = graph.shots.get(shotIdx);
  if (!shot) {
    throw new InvalidPlanError(`Unknown shot ${shotIdx}`);
  }
  return shot;
}

export function cameraOf(graph: TaskGraph, cameraIdx: number): Camera {
  const camera = graph.cameras.get(cameraIdx);
  if (!camera) {
    throw new InvalidPlanError(`Unknown camera ${cameraIdx}`);
  }
  return camera;
}
