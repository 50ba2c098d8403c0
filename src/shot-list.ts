import { readFile } from "fs/promises";
import { resolve } from "path";
import { z } from "zod";
import { FatalIOError, InvalidPlanError, extractErrorMessage } from "./errors";
import type { Shot } from "./types";

const cameraHintsSchema = z.object({
  sameCameraAs: z.number().int().nonnegative().optional(),
  cameraIdx: z.number().int().nonnegative().optional(),
  parentCameraIdx: z.number().int().nonnegative().nullable().optional(),
  parentShotIdx: z.number().int().nonnegative().optional(),
  parentFrame: z.enum(["first_frame", "last_frame"]).optional(),
  fullyCoversChild: z.boolean().optional(),
  missingInfo: z.string().optional(),
});

export const shotSchema = z.object({
  idx: z.number().int().nonnegative(),
  description: z.string().min(1),
  variationType: z.enum(["small", "medium", "large"]),
  firstFrameDesc: z.string().optional(),
  lastFrameDesc: z.string().optional(),
  motionDesc: z.string().optional(),
  audioDesc: z.string().optional(),
  composition: z.string().optional(),
  durationSeconds: z.number().positive().optional(),
  referenceImagePaths: z.array(z.string()).optional(),
  camera: cameraHintsSchema.optional(),
});

// Either a bare array or { shots: [...] }.
export const shotListSchema = z.union([
  z.array(shotSchema),
  z.object({ shots: z.array(shotSchema) }).transform((file) => file.shots),
]);

/**
 * Validates parsed shot-list JSON. Reference image paths are resolved
 * against `baseDir`.
 */
export function parseShotList(raw: unknown, baseDir = process.cwd()): Shot[] {
  const result = shotListSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidPlanError(`Invalid shot list: ${result.error.message}`);
  }
  const shots = result.data;
  if (shots.length === 0) {
    throw new InvalidPlanError("Shot list is empty");
  }

  const seen = new Set<number>();
  for (const shot of shots) {
    if (seen.has(shot.idx)) {
      throw new InvalidPlanError(`Shot idx ${shot.idx} appears more than once`);
    }
    seen.add(shot.idx);
  }

  return shots.map((shot) => ({
    ...shot,
    ...(shot.referenceImagePaths ? { referenceImagePaths: shot.referenceImagePaths.map((p) => resolve(baseDir, p)) } : {}),
  }));
}

export async function loadShotList(filePath: string): Promise<Shot[]> {
  const absolute = resolve(filePath);
  let text: string;
  try {
    text = await readFile(absolute, "utf-8");
  } catch (error) {
    throw new FatalIOError(`Cannot read shot list ${absolute}: ${extractErrorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidPlanError(`Shot list ${absolute} is not valid JSON: ${extractErrorMessage(error)}`);
  }
  return parseShotList(raw, resolve(absolute, ".."));
}
