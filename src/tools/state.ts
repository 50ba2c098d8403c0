import { z } from "zod";
import type { CacheStore } from "../cache-store";
import { NotFoundError } from "../errors";
import { RUN_REPORT_KEY } from "../task-graph";
import { parseTaskId, taskId, type RunReport, type TaskId } from "../types";

const taskIdSchema = z.string().transform((value, ctx): TaskId => {
  const parsed = parseTaskId(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid task id "${value}"` });
    return z.NEVER;
  }
  return taskId(parsed.shotIdx, parsed.kind);
});

const taskOutcomeSchema = z.object({
  id: taskIdSchema,
  state: z.enum(["done", "failed"]),
  cached: z.boolean(),
  path: z.string().optional(),
  error: z.string().optional(),
  errorName: z.string().optional(),
});

const runReportSchema = z.object({
  workingDir: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  tasks: z.array(taskOutcomeSchema),
  failures: z.array(taskOutcomeSchema),
  shots: z.array(z.object({
    shotIdx: z.number().int(),
    firstFrame: z.string(),
    lastFrame: z.string().optional(),
    video: z.string(),
  })),
  generatorCalls: z.number().int().nonnegative(),
});

/**
 * Writes run_report.json into the working directory.
 */
export async function saveRunReport(cache: CacheStore, report: RunReport): Promise<string> {
  return cache.saveJson(RUN_REPORT_KEY, report);
}

/**
 * Loads the report of the last run, or null if there is none.
 */
export async function loadRunReport(cache: CacheStore): Promise<RunReport | null> {
  try {
    return await cache.loadJson(RUN_REPORT_KEY, runReportSchema);
  } catch (error) {
    if (error instanceof NotFoundError) {
      return null;
    }
    throw error;
  }
}
