import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";
import type { z } from "zod";
import { FatalIOError, NotFoundError, ValidationError, extractErrorMessage } from "./errors";

export type CacheKey = string;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Path-addressed artifact store rooted at a run's working directory.
 *
 * Keys are relative POSIX paths derived from task identity, so the same
 * pipeline pointed at the same directory finds the same entries. Entries are
 * written through a temp file and renamed into place; a run killed mid-write
 * leaves no partial artifact behind.
 */
export class CacheStore {
  readonly workingDir: string;

  constructor(workingDir: string) {
    this.workingDir = path.resolve(workingDir);
  }

  pathFor(key: CacheKey): string {
    if (key.length === 0 || path.isAbsolute(key) || key.includes("\\")) {
      throw new FatalIOError(`Invalid cache key: "${key}"`);
    }
    const normalized = path.posix.normalize(key);
    if (normalized.startsWith("../") || normalized === "..") {
      throw new FatalIOError(`Cache key escapes the working directory: "${key}"`);
    }
    return path.join(this.workingDir, ...normalized.split("/"));
  }

  async exists(key: CacheKey): Promise<boolean> {
    const filePath = this.pathFor(key);
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new FatalIOError(`Cannot stat ${filePath}: ${extractErrorMessage(error)}`, { cause: error });
    }
  }

  async load(key: CacheKey): Promise<Buffer> {
    const filePath = this.pathFor(key);
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError(key);
      }
      throw new FatalIOError(`Cannot read ${filePath}: ${extractErrorMessage(error)}`, { cause: error });
    }
  }

  async loadJson<T>(key: CacheKey, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw = await this.load(key);
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString("utf-8"));
    } catch (error) {
      throw new ValidationError(`${key} is not valid JSON: ${extractErrorMessage(error)}`, { cause: error });
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError(`${key} does not match the expected shape: ${result.error.message}`);
    }
    return result.data;
  }

  /**
   * Writes an entry. Saving a key twice is harmless: content is deterministic
   * per key and the last rename wins.
   */
  async save(key: CacheKey, data: Uint8Array | string): Promise<string> {
    const filePath = this.pathFor(key);
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new FatalIOError(`Cannot write ${filePath}: ${extractErrorMessage(error)}`, { cause: error });
    }
    return filePath;
  }

  async saveJson(key: CacheKey, value: unknown): Promise<string> {
    return this.save(key, JSON.stringify(value, null, 2));
  }

  /** Drops a stale entry. Missing entries are not an error. */
  async remove(key: CacheKey): Promise<void> {
    const filePath = this.pathFor(key);
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      throw new FatalIOError(`Cannot remove ${filePath}: ${extractErrorMessage(error)}`, { cause: error });
    }
  }
}
