import * as path from "path";
import { z } from "zod";
import { RunInterruptedError, ValidationError, extractErrorMessage, httpError } from "../errors";
import { sleep } from "../retry";
import { readInputFile } from "./files";

export interface ComfyJobStatus {
  status: string;
  outputAssetIds: string[];
}

const uploadResponseSchema = z.object({ id: z.string() });
const runResponseSchema = z.object({ job_id: z.string() });
const jobResponseSchema = z.object({
  status: z.string(),
  output_asset_ids: z.array(z.string()).optional(),
});

async function parseResponse<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, action: string): Promise<T> {
  const result = schema.safeParse(await response.json());
  if (!result.success) {
    throw new ValidationError(`Unexpected response to ${action}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Get the ComfyUI API base URL from environment variable or default
 */
export function getComfyBaseUrl(): string {
  return process.env.COMFYUI_API_URL || "http://localhost:8000";
}

/**
 * Get authorization headers for ComfyUI API requests.
 * Returns Bearer token header if COMFYUI_API_TOKEN is set, otherwise empty object.
 */
function getAuthHeaders(): Record<string, string> {
  const token = process.env.COMFYUI_API_TOKEN;
  return token ? { Authorization: `Bearer ${token}` } : {};
}

/**
 * Upload an asset file to ComfyUI
 * @returns Asset UUID
 */
export async function uploadAsset(filePath: string): Promise<string> {
  const baseUrl = getComfyBaseUrl();
  const fileBuffer = await readInputFile(filePath);

  const formData = new FormData();
  const blob = new Blob([new Uint8Array(fileBuffer)], { type: "application/octet-stream" });
  formData.append("file", blob, path.basename(filePath));

  const response = await fetch(`${baseUrl}/assets/upload`, {
    method: "POST",
    headers: getAuthHeaders(),
    body: formData,
  });

  if (!response.ok) {
    throw httpError("upload asset", response.status, response.statusText);
  }

  const data = await parseResponse(response, uploadResponseSchema, "upload asset");
  return data.id;
}

/**
 * Run a workflow on ComfyUI
 * @param workflow - Workflow name (e.g., "text_to_image")
 * @returns Job ID
 */
export async function runWorkflow(workflow: string, params: Record<string, unknown>): Promise<string> {
  const baseUrl = getComfyBaseUrl();

  const response = await fetch(`${baseUrl}/workflows/${workflow}/run`, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      ...getAuthHeaders(),
    },
    body: JSON.stringify(params),
  });

  if (!response.ok) {
    throw httpError("run workflow", response.status, response.statusText);
  }

  const data = await parseResponse(response, runResponseSchema, "run workflow");
  return data.job_id;
}

/**
 * Single-poll check of a job's status (no loop, no retry).
 * Used to check if a pending job from a previous run has completed.
 * @returns Job status and output asset IDs, or null if unreachable/not found
 */
export async function checkJob(jobId: string): Promise<ComfyJobStatus | null> {
  const baseUrl = getComfyBaseUrl();
  try {
    const response = await fetch(`${baseUrl}/jobs/${jobId}`, {
      headers: getAuthHeaders(),
    });
    if (!response.ok) return null;
    const data = await parseResponse(response, jobResponseSchema, "check job");
    return { status: data.status, outputAssetIds: data.output_asset_ids || [] };
  } catch (error) {
    console.warn(`[comfyui] Could not check job ${jobId}: ${extractErrorMessage(error)}`);
    return null;
  }
}

/**
 * Poll a job until completion or failure. Cancels the job and throws
 * RunInterruptedError once `isInterrupted` reports true.
 */
export async function pollJob(
  jobId: string,
  isInterrupted: () => boolean,
  pollIntervalMs = 5000,
): Promise<ComfyJobStatus> {
  const baseUrl = getComfyBaseUrl();

  while (true) {
    if (isInterrupted()) {
      await cancelJob(jobId);
      throw new RunInterruptedError(`Job ${jobId}`, "cancelled");
    }

    const response = await fetch(`${baseUrl}/jobs/${jobId}`, {
      method: "GET",
      headers: getAuthHeaders(),
    });

    if (!response.ok) {
      throw httpError("poll job", response.status, response.statusText);
    }

    const data = await parseResponse(response, jobResponseSchema, "poll job");

    if (data.status === "completed") {
      return {
        status: data.status,
        outputAssetIds: data.output_asset_ids || [],
      };
    }

    if (data.status === "failed") {
      throw new ValidationError(`Job ${jobId} failed`);
    }

    await sleep(pollIntervalMs);
  }
}

/**
 * Cancel a running ComfyUI job (best-effort)
 */
export async function cancelJob(jobId: string): Promise<void> {
  const baseUrl = getComfyBaseUrl();
  try {
    const response = await fetch(`${baseUrl}/jobs/${jobId}/cancel`, {
      method: "POST",
      headers: getAuthHeaders(),
    });
    if (!response.ok) {
      console.warn(`[comfyui] Failed to cancel job ${jobId}: ${response.status}`);
    }
  } catch (err) {
    console.warn(`[comfyui] Failed to cancel job ${jobId}: ${extractErrorMessage(err)}`);
  }
}

/**
 * Download an asset from ComfyUI
 */
export async function downloadAsset(assetId: string): Promise<Uint8Array> {
  const baseUrl = getComfyBaseUrl();

  const response = await fetch(`${baseUrl}/assets/${assetId}/file`, {
    method: "GET",
    headers: getAuthHeaders(),
  });

  if (!response.ok) {
    throw httpError("download asset", response.status, response.statusText);
  }

  return new Uint8Array(await response.arrayBuffer());
}
