import { z } from "zod";
import type { CacheStore } from "../cache-store";
import { NotFoundError, ValidationError } from "../errors";
import type { Artifact } from "../types";
import { checkJob, downloadAsset, pollJob, runWorkflow, uploadAsset } from "./comfy-client";
import type { ImageGenerator, ImageRequest, VideoGenerator, VideoRequest } from "./registry";

const FPS = 16;
const FRAME_SIZE = 640;
const UNFINISHED_STATUSES = new Set(["pending", "queued", "running"]);

const pendingJobSchema = z.object({
  jobId: z.string(),
  requestKey: z.string(),
  startedAt: z.string(),
});

export type PendingJob = z.infer<typeof pendingJobSchema>;

/**
 * Remembers remote job ids under jobs/ in the working directory, so a
 * restarted run can collect a job it already paid for.
 */
export class PendingJobStore {
  constructor(private readonly cache: CacheStore) {}

  static keyFor(requestKey: string): string {
    return `jobs/${requestKey.replace(/[^A-Za-z0-9_.-]+/g, "_")}.json`;
  }

  async get(requestKey: string): Promise<PendingJob | undefined> {
    try {
      return await this.cache.loadJson(PendingJobStore.keyFor(requestKey), pendingJobSchema);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return undefined;
      }
      if (error instanceof ValidationError) {
        console.warn(`[comfyui] Ignoring unreadable pending job for ${requestKey}: ${error.message}`);
        await this.delete(requestKey);
        return undefined;
      }
      throw error;
    }
  }

  async set(requestKey: string, jobId: string): Promise<void> {
    const job: PendingJob = { jobId, requestKey, startedAt: new Date().toISOString() };
    await this.cache.saveJson(PendingJobStore.keyFor(requestKey), job);
  }

  async delete(requestKey: string): Promise<void> {
    await this.cache.remove(PendingJobStore.keyFor(requestKey));
  }
}

/**
 * Runs a workflow, or resumes the job a previous run left behind for the
 * same request, and downloads its first output.
 */
async function runJob(
  store: PendingJobStore,
  requestKey: string,
  isInterrupted: () => boolean,
  start: () => Promise<string>,
): Promise<Uint8Array> {
  let jobId: string | undefined;

  const pending = await store.get(requestKey);
  if (pending) {
    console.log(`[comfyui] Found pending job ${pending.jobId} for ${requestKey}, checking status...`);
    const check = await checkJob(pending.jobId);
    if (check?.status === "completed" && check.outputAssetIds.length > 0) {
      console.log(`[comfyui] Pending job completed, downloading result...`);
      const data = await downloadAsset(check.outputAssetIds[0]);
      await store.delete(requestKey);
      return data;
    }
    if (check && UNFINISHED_STATUSES.has(check.status)) {
      jobId = pending.jobId;
    } else {
      console.log(`[comfyui] Pending job status: ${check?.status ?? "unknown"}, starting fresh`);
      await store.delete(requestKey);
    }
  }

  if (!jobId) {
    jobId = await start();
    await store.set(requestKey, jobId);
    console.log(`[comfyui] Workflow started: job ${jobId} (${requestKey})`);
  }

  const result = await pollJob(jobId, isInterrupted);
  if (result.outputAssetIds.length === 0) {
    await store.delete(requestKey);
    throw new ValidationError(`No output assets returned for job ${jobId}`);
  }
  const data = await downloadAsset(result.outputAssetIds[0]);
  await store.delete(requestKey);
  return data;
}

export class ComfyImageGenerator implements ImageGenerator {
  readonly name = "comfyui";
  private readonly jobs: PendingJobStore;

  constructor(
    cache: CacheStore,
    private readonly isInterrupted: () => boolean,
    private readonly workflow = "text_to_image",
  ) {
    this.jobs = new PendingJobStore(cache);
  }

  async generateImage(request: ImageRequest): Promise<Artifact> {
    const data = await runJob(this.jobs, request.requestKey, this.isInterrupted, async () => {
      const referenceAssetIds: string[] = [];
      for (const refPath of request.referenceImagePaths) {
        referenceAssetIds.push(await uploadAsset(refPath));
      }
      return runWorkflow(this.workflow, {
        prompt: request.prompt,
        reference_asset_ids: referenceAssetIds,
        width: FRAME_SIZE,
        height: FRAME_SIZE,
      });
    });
    return { data, mimeType: "image/png" };
  }
}

export class ComfyVideoGenerator implements VideoGenerator {
  readonly name = "comfyui";
  private readonly jobs: PendingJobStore;

  constructor(
    cache: CacheStore,
    private readonly isInterrupted: () => boolean,
    private readonly workflow = "frame_to_video",
  ) {
    this.jobs = new PendingJobStore(cache);
  }

  async generateVideo(request: VideoRequest): Promise<Artifact> {
    const [firstPath, lastPath] = request.framePaths;
    if (!firstPath) {
      throw new ValidationError(`Video request ${request.requestKey} has no first frame`);
    }

    const data = await runJob(this.jobs, request.requestKey, this.isInterrupted, async () => {
      const startAssetId = await uploadAsset(firstPath);
      const endAssetId = lastPath ? await uploadAsset(lastPath) : undefined;
      // Frame count at 16 fps, plus the closing frame.
      const length = FPS * request.durationSeconds + 1;
      return runWorkflow(this.workflow, {
        prompt: request.prompt,
        start_asset_id: startAssetId,
        ...(endAssetId ? { end_asset_id: endAssetId } : {}),
        width: FRAME_SIZE,
        height: FRAME_SIZE,
        length,
        fps: FPS,
      });
    });
    return { data, mimeType: "video/mp4" };
  }
}
