import { execFile } from "child_process";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { promisify } from "util";
import { FatalIOError, ValidationError, extractErrorMessage } from "../errors";
import type { Artifact } from "../types";
import type { FrameExtractor } from "./registry";

const execFileAsync = promisify(execFile);

/**
 * Grabs the final frame of a clip with ffmpeg: seek to one second before the
 * end and keep overwriting a single output image until the stream ends.
 */
export class FfmpegFrameExtractor implements FrameExtractor {
  constructor(private readonly ffmpegPath = "ffmpeg") {}

  async extractLastFrame(videoPath: string): Promise<Artifact> {
    const tempDir = await mkdtemp(join(tmpdir(), "framechain-frame-"));
    const framePath = join(tempDir, "last_frame.png");
    try {
      await this.run(["-v", "error", "-sseof", "-1", "-i", videoPath, "-update", "1", "-y", framePath]);
      try {
        return { data: await readFile(framePath), mimeType: "image/png" };
      } catch (error) {
        throw new ValidationError(`ffmpeg produced no frame for ${videoPath}`, { cause: error });
      }
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }

  private async run(args: string[]): Promise<void> {
    try {
      await execFileAsync(this.ffmpegPath, args);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new FatalIOError(`${this.ffmpegPath} is not installed or not on PATH`, { cause: error });
      }
      throw new ValidationError(`ffmpeg failed: ${extractErrorMessage(error)}`, { cause: error });
    }
  }
}
