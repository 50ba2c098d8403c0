import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { GenerateVideosOperation, GoogleGenAI, Image } from "@google/genai";
import { RunInterruptedError, TransientRemoteError, ValidationError } from "../errors";
import { sleep } from "../retry";
import type { Artifact } from "../types";
import { imageMimeType, readInputFile } from "./files";
import { getGoogleClient } from "./google-client";
import type { VideoGenerator, VideoRequest } from "./registry";

export const DEFAULT_VEO_MODEL = "veo-3.1-generate-preview";

const POLL_INTERVAL_MS = 10_000;
const MAX_WAIT_MS = 600_000;

// Veo accepts 4, 6 or 8 second clips.
const SUPPORTED_DURATIONS = [4, 6, 8];

export function veoDuration(seconds: number): number {
  return SUPPORTED_DURATIONS.find((d) => d >= seconds) ?? SUPPORTED_DURATIONS[SUPPORTED_DURATIONS.length - 1];
}

async function toImage(filePath: string): Promise<Image> {
  const data = await readInputFile(filePath);
  return { imageBytes: data.toString("base64"), mimeType: imageMimeType(filePath) };
}

/**
 * First/last frame interpolation with Veo. The long-running operation is
 * polled until done; the clip is downloaded through a temporary file.
 */
export class VeoVideoGenerator implements VideoGenerator {
  readonly name = "veo";

  constructor(
    private readonly model: string = DEFAULT_VEO_MODEL,
    private readonly isInterrupted: () => boolean = () => false,
    private readonly client: () => GoogleGenAI = getGoogleClient,
  ) {}

  async generateVideo(request: VideoRequest): Promise<Artifact> {
    const [firstPath, lastPath] = request.framePaths;
    if (!firstPath) {
      throw new ValidationError(`Video request ${request.requestKey} has no first frame`);
    }
    const client = this.client();

    console.log(`[veo] Generating ${request.requestKey} (${veoDuration(request.durationSeconds)}s${lastPath ? ", first+last frame" : ""})`);
    let operation: GenerateVideosOperation = await client.models.generateVideos({
      model: this.model,
      prompt: request.prompt,
      image: await toImage(firstPath),
      config: {
        numberOfVideos: 1,
        durationSeconds: veoDuration(request.durationSeconds),
        aspectRatio: "16:9",
        ...(lastPath ? { lastFrame: await toImage(lastPath) } : {}),
      },
    });

    const deadline = Date.now() + MAX_WAIT_MS;
    while (!operation.done) {
      if (this.isInterrupted()) {
        throw new RunInterruptedError(`Video operation ${operation.name ?? request.requestKey}`, "abandoned");
      }
      if (Date.now() > deadline) {
        throw new TransientRemoteError(`Video operation ${operation.name ?? request.requestKey} did not complete within ${MAX_WAIT_MS}ms`);
      }
      await sleep(POLL_INTERVAL_MS);
      operation = await client.operations.getVideosOperation({ operation });
    }

    if (operation.error) {
      throw new ValidationError(`Video generation failed for ${request.requestKey}: ${JSON.stringify(operation.error)}`);
    }
    const video = operation.response?.generatedVideos?.[0]?.video;
    if (!video) {
      throw new ValidationError(`No video in response for ${request.requestKey}`);
    }
    if (video.videoBytes) {
      return { data: Buffer.from(video.videoBytes, "base64"), mimeType: video.mimeType ?? "video/mp4" };
    }

    const tempDir = await mkdtemp(join(tmpdir(), "framechain-veo-"));
    try {
      const downloadPath = join(tempDir, "video.mp4");
      await client.files.download({ file: video, downloadPath });
      return { data: await readFile(downloadPath), mimeType: video.mimeType ?? "video/mp4" };
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }
}
