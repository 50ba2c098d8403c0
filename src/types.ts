export type VariationType = "small" | "medium" | "large";

export type FramePosition = "first_frame" | "last_frame";

export type ArtifactKind = FramePosition | "shot_video";

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ["first_frame", "last_frame", "shot_video"];

export interface CameraHints {
  sameCameraAs?: number;            // idx of an earlier shot filmed by the same camera
  cameraIdx?: number;               // explicit camera identity
  parentCameraIdx?: number | null;  // null forces a root camera
  parentShotIdx?: number;
  parentFrame?: FramePosition;
  fullyCoversChild?: boolean;
  missingInfo?: string;
}

export interface Shot {
  idx: number;
  description: string;              // visual content of the beat
  variationType: VariationType;
  firstFrameDesc?: string;
  lastFrameDesc?: string;
  motionDesc?: string;
  audioDesc?: string;
  composition?: string;             // "wide_establishing" | "medium_shot" | "close_up" | ...
  durationSeconds?: number;
  referenceImagePaths?: string[];   // character portraits and other fixed references
  camera?: CameraHints;
}

export interface Camera {
  idx: number;
  activeShotIdxs: number[];         // temporal order
  parentCamIdx?: number;
  parentShotIdx?: number;
  parentFrame?: FramePosition;      // which artifact of the parent shot the cut starts from
  isParentFullyCoversChild?: boolean;
  missingInfo?: string;
}

export type TaskId = `${number}:${ArtifactKind}`;

export type TaskState = "pending" | "ready" | "running" | "done" | "failed";

export interface Artifact {
  data: Uint8Array;
  mimeType: string;
}

export interface ShotOutput {
  shotIdx: number;
  firstFrame: string;
  lastFrame?: string;
  video: string;
}

export interface TaskOutcome {
  id: TaskId;
  state: "done" | "failed";
  cached: boolean;
  path?: string;
  error?: string;
  errorName?: string;
}

export interface RunReport {
  workingDir: string;
  startedAt: string;
  finishedAt: string;
  tasks: TaskOutcome[];
  failures: TaskOutcome[];
  shots: ShotOutput[];             // shot order; only shots whose video finished
  generatorCalls: number;
}

export function taskId(shotIdx: number, kind: ArtifactKind): TaskId {
  return `${shotIdx}:${kind}`;
}

export function parseTaskId(value: string): { shotIdx: number; kind: ArtifactKind } | null {
  const match = /^(\d+):(first_frame|last_frame|shot_video)$/.exec(value);
  if (!match) {
    return null;
  }
  const kind = ARTIFACT_KINDS.find((k) => k === match[2]);
  return kind ? { shotIdx: Number(match[1]), kind } : null;
}

/**
 * Medium and large variations change the composition enough that the video
 * model needs an explicit end state.
 */
export function requiresLastFrame(variationType: VariationType): boolean {
  return variationType !== "small";
}
