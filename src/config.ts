import { readFile } from "fs/promises";
import { resolve } from "path";
import { z } from "zod";
import { FatalIOError, extractErrorMessage } from "./errors";

const rateLimitSchema = z.object({
  requestsPerMinute: z.number().int().positive().optional(),
  requestsPerDay: z.number().int().positive().optional(),
  dailyQuotaPolicy: z.enum(["wait", "fail"]).default("wait"),
}).default({});

function serviceSchema(defaultProvider: string) {
  return z.object({
    provider: z.string().default(defaultProvider),
    model: z.string().optional(),
    rateLimit: rateLimitSchema,
  }).default({});
}

export const configSchema = z.object({
  workingDir: z.string().default("./output"),
  retry: z.object({
    maxAttempts: z.number().int().min(1).default(3),
    initialDelayMs: z.number().int().nonnegative().default(1000),
    backoffFactor: z.number().min(1).default(2),
    maxDelayMs: z.number().int().nonnegative().default(30_000),
  }).default({}),
  chatModel: serviceSchema("google"),
  imageGenerator: serviceSchema("gemini"),
  videoGenerator: serviceSchema("veo"),
  cameraMatcher: z.enum(["heuristic", "llm"]).default("heuristic"),
  verbose: z.boolean().default(false),
});

export type FrameChainConfig = z.infer<typeof configSchema>;

/**
 * Validates a raw configuration object, filling in defaults. Throws
 * FatalIOError with the zod issues when a field is invalid.
 */
export function parseConfig(raw: unknown, source = "configuration"): FrameChainConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new FatalIOError(`Invalid ${source}:\n  - ${issues.join("\n  - ")}`);
  }
  return result.data;
}

/**
 * Reads an optional JSON config file and applies CLI overrides on top.
 * Relative working directories resolve against the current directory.
 */
export async function loadConfig(configPath?: string, overrides: { workingDir?: string; verbose?: boolean } = {}): Promise<FrameChainConfig> {
  let raw: unknown = {};
  if (configPath) {
    const absolute = resolve(configPath);
    let text: string;
    try {
      text = await readFile(absolute, "utf-8");
    } catch (error) {
      throw new FatalIOError(`Cannot read config ${absolute}: ${extractErrorMessage(error)}`, { cause: error });
    }
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new FatalIOError(`Config ${absolute} is not valid JSON: ${extractErrorMessage(error)}`, { cause: error });
    }
  }

  const config = parseConfig(raw, configPath ? `config ${configPath}` : "configuration");
  return {
    ...config,
    workingDir: resolve(overrides.workingDir ?? config.workingDir),
    verbose: overrides.verbose ?? config.verbose,
  };
}
