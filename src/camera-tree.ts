import { z } from "zod";
import { CameraTreeError } from "./errors";
import { requiresLastFrame, type Camera, type FramePosition, type Shot } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ParentCandidate {
  camera: Camera;
  introducedAt: number;          // position of the camera's opening shot
  lastActiveShotIdx: number;     // most recent shot before the new camera
  lastActivePosition: number;
}

export interface ParentMatch {
  parentCamIdx: number;
  score: number;                 // <= 0 means "not a plausible parent"
  fullyCoversChild: boolean;
  missingInfo?: string;
  parentShotIdx?: number;
}

/**
 * Decides which earlier camera a new camera is visually derived from.
 * Implementations may be heuristic or model-backed.
 */
export interface ParentMatcher {
  match(shot: Shot, candidates: readonly ParentCandidate[], shots: readonly Shot[]): Promise<ParentMatch[]>;
}

export const cameraSchema = z.object({
  idx: z.number().int().nonnegative(),
  activeShotIdxs: z.array(z.number().int().nonnegative()).min(1),
  parentCamIdx: z.number().int().nonnegative().optional(),
  parentShotIdx: z.number().int().nonnegative().optional(),
  parentFrame: z.enum(["first_frame", "last_frame"]).optional(),
  isParentFullyCoversChild: z.boolean().optional(),
  missingInfo: z.string().optional(),
});

export const cameraTreeSchema = z.array(cameraSchema);

// ---------------------------------------------------------------------------
// Heuristic matcher: shot scale ladder + description overlap
// ---------------------------------------------------------------------------

const SCALE_RULES: Array<{ scale: number; keywords: string[] }> = [
  { scale: 4, keywords: ["extreme_close_up", "insert", "detail", "macro"] },
  { scale: 3, keywords: ["close_up", "closeup", "reaction"] },
  { scale: 0, keywords: ["extreme_wide", "establishing", "aerial"] },
  { scale: 1, keywords: ["wide", "full_shot", "long_shot"] },
  { scale: 2, keywords: ["medium", "two_shot", "over_the_shoulder", "tracking", "cowboy"] },
];

const DEFAULT_SCALE = 2;

const STOPWORDS = new Set([
  "the", "and", "with", "from", "into", "onto", "that", "this", "their", "his", "her", "its",
  "shot", "camera", "frame", "while", "over", "under", "near", "then", "they", "are", "was",
]);

function matchScale(text: string): number | undefined {
  const normalized = text.toLowerCase().replace(/[\s-]+/g, "_");
  for (const rule of SCALE_RULES) {
    if (rule.keywords.some((k) => normalized.includes(k))) {
      return rule.scale;
    }
  }
  return undefined;
}

/** 0 = extreme wide ... 4 = extreme close-up. */
export function shotScale(shot: Shot): number {
  return (shot.composition ? matchScale(shot.composition) : undefined)
    ?? matchScale(shot.description)
    ?? DEFAULT_SCALE;
}

function contentWords(text: string): Set<string> {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return new Set(words.filter((w) => w.length >= 3 && !STOPWORDS.has(w)));
}

export function descriptionOverlap(a: string, b: string): number {
  const left = contentWords(a);
  const right = contentWords(b);
  if (left.size === 0 || right.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of left) {
    if (right.has(word)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

/**
 * A tighter framing can be cut out of a wider one, never the reverse. A wider
 * parent scores 1 + overlap and fully covers the child; a parent at the same
 * scale scores its overlap alone and is flagged as partial coverage.
 */
export const heuristicParentMatcher: ParentMatcher = {
  async match(shot, candidates, shots) {
    const byIdx = new Map(shots.map((s) => [s.idx, s]));
    const childScale = shotScale(shot);
    const matches: ParentMatch[] = [];

    for (const candidate of candidates) {
      const parentShot = byIdx.get(candidate.lastActiveShotIdx);
      if (!parentShot) continue;
      const parentScale = shotScale(parentShot);
      if (parentScale > childScale) continue;

      const overlap = descriptionOverlap(parentShot.description, shot.description);
      if (parentScale < childScale) {
        matches.push({ parentCamIdx: candidate.camera.idx, score: 1 + overlap, fullyCoversChild: true });
      } else if (overlap > 0) {
        matches.push({
          parentCamIdx: candidate.camera.idx,
          score: overlap,
          fullyCoversChild: false,
          missingInfo: `Camera ${candidate.camera.idx} frames shot ${parentShot.idx} at the same scale; the new angle is not visible in it.`,
        });
      }
    }
    return matches;
  },
};

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface BuildCameraTreeOptions {
  matcher?: ParentMatcher;
}

const PARTIAL_COVERAGE_NOTE = "Parent camera does not fully cover the new camera's composition.";

function defaultParentFrame(parentShot: Shot, parentPosition: number, childPosition: number): FramePosition {
  return parentPosition === childPosition - 1 && requiresLastFrame(parentShot.variationType)
    ? "last_frame"
    : "first_frame";
}

/**
 * Walks the shots in order, reusing an open camera where the hints say so and
 * otherwise opening a new camera linked to the best-matching earlier camera.
 * Ties between equally plausible parents go to the most recently active one.
 */
export async function buildCameraTree(shots: readonly Shot[], options: BuildCameraTreeOptions = {}): Promise<Camera[]> {
  const matcher = options.matcher ?? heuristicParentMatcher;
  const positions = shotPositions(shots);
  const cameras: Camera[] = [];
  const cameraByIdx = new Map<number, Camera>();
  const cameraOfShot = new Map<number, Camera>();

  const candidatesAt = (position: number): ParentCandidate[] =>
    cameras.map((camera) => {
      const lastActiveShotIdx = camera.activeShotIdxs[camera.activeShotIdxs.length - 1];
      return {
        camera,
        introducedAt: positions.get(camera.activeShotIdxs[0]) ?? 0,
        lastActiveShotIdx,
        lastActivePosition: positions.get(lastActiveShotIdx) ?? position,
      };
    });

  for (const [position, shot] of shots.entries()) {
    const hints = shot.camera ?? {};

    let reuse: Camera | undefined;
    if (hints.sameCameraAs !== undefined) {
      const earlierPosition = positions.get(hints.sameCameraAs);
      if (earlierPosition === undefined || earlierPosition >= position) {
        throw new CameraTreeError([`Shot ${shot.idx}: sameCameraAs ${hints.sameCameraAs} is not an earlier shot`]);
      }
      reuse = cameraOfShot.get(hints.sameCameraAs);
    } else if (hints.cameraIdx !== undefined) {
      reuse = cameraByIdx.get(hints.cameraIdx);
    }

    if (reuse) {
      reuse.activeShotIdxs.push(shot.idx);
      cameraOfShot.set(shot.idx, reuse);
      continue;
    }

    const idx = hints.cameraIdx ?? nextCameraIdx(cameras);
    const camera: Camera = { idx, activeShotIdxs: [shot.idx] };
    const candidates = candidatesAt(position);

    if (hints.parentCameraIdx !== undefined && hints.parentCameraIdx !== null) {
      const parent = candidates.find((c) => c.camera.idx === hints.parentCameraIdx);
      if (!parent) {
        throw new CameraTreeError([`Shot ${shot.idx}: parent camera ${hints.parentCameraIdx} is not introduced before it`]);
      }
      if (hints.parentShotIdx !== undefined) {
        const parentShotPosition = positions.get(hints.parentShotIdx);
        if (
          !parent.camera.activeShotIdxs.includes(hints.parentShotIdx)
          || parentShotPosition === undefined
          || parentShotPosition >= position
        ) {
          throw new CameraTreeError([
            `Shot ${shot.idx}: parent shot ${hints.parentShotIdx} is not an earlier shot of camera ${parent.camera.idx}`,
          ]);
        }
      }
      const fullyCovers = hints.fullyCoversChild ?? hints.missingInfo === undefined;
      linkParent(camera, shots, positions, position, parent, {
        parentCamIdx: parent.camera.idx,
        score: 1,
        fullyCoversChild: fullyCovers,
        missingInfo: hints.missingInfo,
        parentShotIdx: hints.parentShotIdx,
      }, hints.parentFrame);
    } else if (hints.parentCameraIdx !== null && candidates.length > 0) {
      const matches = await matcher.match(shot, candidates, shots);
      const best = pickParent(matches, candidates);
      if (best) {
        linkParent(camera, shots, positions, position, best.candidate, best.match, hints.parentFrame);
      }
    }

    cameras.push(camera);
    cameraByIdx.set(camera.idx, camera);
    cameraOfShot.set(shot.idx, camera);
  }

  verifyCameraTree(cameras, shots);
  return cameras;
}

function nextCameraIdx(cameras: readonly Camera[]): number {
  return cameras.reduce((max, c) => Math.max(max, c.idx + 1), 0);
}

function shotPositions(shots: readonly Shot[]): Map<number, number> {
  const positions = new Map<number, number>();
  const duplicates: string[] = [];
  shots.forEach((shot, position) => {
    if (positions.has(shot.idx)) {
      duplicates.push(`Shot idx ${shot.idx} appears more than once`);
    }
    positions.set(shot.idx, position);
  });
  if (duplicates.length > 0) {
    throw new CameraTreeError(duplicates);
  }
  return positions;
}

function pickParent(
  matches: readonly ParentMatch[],
  candidates: readonly ParentCandidate[],
): { match: ParentMatch; candidate: ParentCandidate } | undefined {
  let best: { match: ParentMatch; candidate: ParentCandidate } | undefined;
  for (const match of matches) {
    if (!(match.score > 0)) continue;
    const candidate = candidates.find((c) => c.camera.idx === match.parentCamIdx);
    if (!candidate) continue;
    if (
      !best
      || match.score > best.match.score
      || (match.score === best.match.score && candidate.lastActivePosition > best.candidate.lastActivePosition)
    ) {
      best = { match, candidate };
    }
  }
  return best;
}

function linkParent(
  camera: Camera,
  shots: readonly Shot[],
  positions: ReadonlyMap<number, number>,
  childPosition: number,
  parent: ParentCandidate,
  match: ParentMatch,
  frameHint: FramePosition | undefined,
): void {
  const requested = match.parentShotIdx;
  const requestedPosition = requested === undefined ? undefined : positions.get(requested);
  const parentShotIdx = requested !== undefined
    && parent.camera.activeShotIdxs.includes(requested)
    && requestedPosition !== undefined
    && requestedPosition < childPosition
    ? requested
    : parent.lastActiveShotIdx;

  const parentPosition = positions.get(parentShotIdx) ?? 0;
  const parentShot = shots[parentPosition];
  let parentFrame = frameHint ?? defaultParentFrame(parentShot, parentPosition, childPosition);
  if (parentFrame === "last_frame" && !requiresLastFrame(parentShot.variationType)) {
    parentFrame = "first_frame";
  }

  camera.parentCamIdx = parent.camera.idx;
  camera.parentShotIdx = parentShotIdx;
  camera.parentFrame = parentFrame;
  camera.isParentFullyCoversChild = match.fullyCoversChild;
  if (!match.fullyCoversChild) {
    camera.missingInfo = match.missingInfo ?? PARTIAL_COVERAGE_NOTE;
  } else if (match.missingInfo) {
    camera.missingInfo = match.missingInfo;
  }
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

/**
 * Checks the forest against the shot list. Used on freshly built trees and on
 * trees loaded from the cache, which may come from an older shot list.
 */
export function verifyCameraTree(cameras: readonly Camera[], shots: readonly Shot[]): void {
  const violations: string[] = [];
  const positions = new Map<number, number>();
  shots.forEach((shot, position) => positions.set(shot.idx, position));

  const byIdx = new Map<number, Camera>();
  for (const camera of cameras) {
    if (byIdx.has(camera.idx)) {
      violations.push(`Camera ${camera.idx} is defined more than once`);
    }
    byIdx.set(camera.idx, camera);
  }

  const owner = new Map<number, number>();
  const introducedAt = (camera: Camera): number => positions.get(camera.activeShotIdxs[0]) ?? -1;

  for (const camera of cameras) {
    if (camera.activeShotIdxs.length === 0) {
      violations.push(`Camera ${camera.idx} films no shots`);
      continue;
    }
    let previous = -1;
    for (const shotIdx of camera.activeShotIdxs) {
      const position = positions.get(shotIdx);
      if (position === undefined) {
        violations.push(`Camera ${camera.idx} lists unknown shot ${shotIdx}`);
        continue;
      }
      if (position <= previous) {
        violations.push(`Camera ${camera.idx} lists shot ${shotIdx} out of order`);
      }
      previous = position;
      const existing = owner.get(shotIdx);
      if (existing !== undefined) {
        violations.push(`Shot ${shotIdx} belongs to cameras ${existing} and ${camera.idx}`);
      }
      owner.set(shotIdx, camera.idx);
    }

    if (camera.parentCamIdx === undefined) {
      if (camera.parentShotIdx !== undefined) {
        violations.push(`Camera ${camera.idx} has a parent shot but no parent camera`);
      }
      continue;
    }

    const parent = byIdx.get(camera.parentCamIdx);
    if (!parent) {
      violations.push(`Camera ${camera.idx} refers to unknown parent camera ${camera.parentCamIdx}`);
      continue;
    }
    if (parent.activeShotIdxs.length > 0 && introducedAt(parent) >= introducedAt(camera)) {
      violations.push(`Camera ${camera.idx} is introduced before its parent camera ${parent.idx}`);
    }
    if (camera.parentShotIdx === undefined) {
      violations.push(`Camera ${camera.idx} has a parent camera but no parent shot`);
      continue;
    }
    if (!parent.activeShotIdxs.includes(camera.parentShotIdx)) {
      violations.push(`Camera ${camera.idx}: parent shot ${camera.parentShotIdx} is not filmed by camera ${parent.idx}`);
      continue;
    }
    const parentShotPosition = positions.get(camera.parentShotIdx);
    if (parentShotPosition === undefined || parentShotPosition >= introducedAt(camera)) {
      violations.push(`Camera ${camera.idx}: parent shot ${camera.parentShotIdx} does not precede its first shot`);
      continue;
    }
    if (camera.parentFrame === "last_frame" && !requiresLastFrame(shots[parentShotPosition].variationType)) {
      violations.push(`Camera ${camera.idx}: parent shot ${camera.parentShotIdx} has no last frame`);
    }
  }

  for (const shot of shots) {
    if (!owner.has(shot.idx)) {
      violations.push(`Shot ${shot.idx} belongs to no camera`);
    }
  }

  if (violations.length > 0) {
    throw new CameraTreeError(violations);
  }
}

/** Cameras whose opening shot has no parent. */
export function rootCameras(cameras: readonly Camera[]): Camera[] {
  return cameras.filter((c) => c.parentCamIdx === undefined);
}

export function describeCameraTree(cameras: readonly Camera[]): string[] {
  const children = new Map<number | undefined, Camera[]>();
  for (const camera of cameras) {
    const list = children.get(camera.parentCamIdx) ?? [];
    list.push(camera);
    children.set(camera.parentCamIdx, list);
  }

  const lines: string[] = [];
  const walk = (camera: Camera, depth: number): void => {
    const link = camera.parentCamIdx === undefined
      ? ""
      : ` <- shot ${camera.parentShotIdx} ${camera.parentFrame ?? "first_frame"}${camera.isParentFullyCoversChild === false ? " (partial)" : ""}`;
    lines.push(`${"  ".repeat(depth)}Camera ${camera.idx}: shots [${camera.activeShotIdxs.join(", ")}]${link}`);
    if (camera.missingInfo) {
      lines.push(`${"  ".repeat(depth + 1)}missing: ${camera.missingInfo}`);
    }
    for (const child of children.get(camera.idx) ?? []) {
      walk(child, depth + 1);
    }
  };
  for (const root of rootCameras(cameras)) {
    walk(root, 0);
  }
  return lines;
}
