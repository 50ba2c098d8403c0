import { readFile } from "fs/promises";
import { extname } from "path";
import { FatalIOError, ValidationError, extractErrorMessage } from "../errors";
import type { Artifact } from "../types";

const IMAGE_MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
};

export function imageMimeType(filePath: string): string {
  return IMAGE_MIME_TYPES[extname(filePath).toLowerCase()] ?? "image/png";
}

const ARTIFACT_MIME_TYPES: Record<string, string> = {
  ...IMAGE_MIME_TYPES,
  ".mp4": "video/mp4",
};

/**
 * Rejects an artifact whose media type differs from the one its cache key
 * implies, so a JPEG never lands under a `.png` key.
 */
export function checkArtifactType(artifact: Artifact, cacheKey: string): Artifact {
  const expected = ARTIFACT_MIME_TYPES[extname(cacheKey).toLowerCase()];
  const actual = artifact.mimeType.split(";")[0].trim().toLowerCase();
  if (expected !== undefined && actual !== expected) {
    throw new ValidationError(`Expected ${expected} for ${cacheKey}, got ${artifact.mimeType}`);
  }
  return artifact;
}

/** Reads a local input (reference image, frame). A missing input is not worth retrying. */
export async function readInputFile(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    throw new FatalIOError(`Cannot read ${filePath}: ${extractErrorMessage(error)}`, { cause: error });
  }
}
