import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeFile } from "fs/promises";
import { join, resolve } from "path";
import { loadConfig, parseConfig } from "./config";
import { FatalIOError } from "./errors";
import { makeTempDir } from "./testing/fakes";

describe("parseConfig", () => {
  it("should fill in defaults for an empty configuration", () => {
    expect(parseConfig({})).toEqual({
      workingDir: "./output",
      retry: { maxAttempts: 3, initialDelayMs: 1000, backoffFactor: 2, maxDelayMs: 30_000 },
      chatModel: { provider: "google", rateLimit: { dailyQuotaPolicy: "wait" } },
      imageGenerator: { provider: "gemini", rateLimit: { dailyQuotaPolicy: "wait" } },
      videoGenerator: { provider: "veo", rateLimit: { dailyQuotaPolicy: "wait" } },
      cameraMatcher: "heuristic",
      verbose: false,
    });
  });

  it("should keep provider settings", () => {
    const config = parseConfig({
      videoGenerator: { provider: "comfyui", model: "wan_frame_to_video", rateLimit: { requestsPerMinute: 2, requestsPerDay: 50, dailyQuotaPolicy: "fail" } },
    });

    expect(config.videoGenerator).toEqual({
      provider: "comfyui",
      model: "wan_frame_to_video",
      rateLimit: { requestsPerMinute: 2, requestsPerDay: 50, dailyQuotaPolicy: "fail" },
    });
  });

  it("should list every invalid field", () => {
    expect(() => parseConfig({ retry: { maxAttempts: 0 }, cameraMatcher: "magic" })).toThrow(FatalIOError);
    expect(() => parseConfig({ retry: { maxAttempts: 0 } })).toThrow("Invalid configuration:\n  - retry.maxAttempts: ");
  });
});

describe("loadConfig", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it("should read a JSON file and apply overrides", async () => {
    const file = join(dir, "framechain.json");
    await writeFile(file, JSON.stringify({ workingDir: "renders", imageGenerator: { provider: "comfyui" }, verbose: true }));

    const fromFile = await loadConfig(file);
    expect(fromFile.workingDir).toBe(resolve("renders"));
    expect(fromFile.imageGenerator.provider).toBe("comfyui");
    expect(fromFile.verbose).toBe(true);

    const overridden = await loadConfig(file, { workingDir: dir, verbose: false });
    expect(overridden.workingDir).toBe(dir);
    expect(overridden.verbose).toBe(false);
  });

  it("should use defaults without a file", async () => {
    expect((await loadConfig()).workingDir).toBe(resolve("./output"));
  });

  it("should fail on a missing or malformed file", async () => {
    await expect(loadConfig(join(dir, "missing.json"))).rejects.toBeInstanceOf(FatalIOError);

    const file = join(dir, "broken.json");
    await writeFile(file, "{ workingDir: ");
    await expect(loadConfig(file)).rejects.toThrow("is not valid JSON");
  });
});
