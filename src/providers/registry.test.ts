import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CacheStore } from "../cache-store";
import { parseConfig } from "../config";
import { FatalIOError } from "../errors";
import { chatModels } from "./chat-model";
import { ComfyImageGenerator, ComfyVideoGenerator } from "./comfy-generators";
import { FfmpegFrameExtractor } from "./ffmpeg-frame-extractor";
import { createGateway, createGenerationServices, imageGenerators, videoGenerators } from "./index";
import { ProviderRegistry } from "./registry";
import { veoDuration } from "./veo-video";

describe("ProviderRegistry", () => {
  it("should create providers by name", () => {
    const registry = new ProviderRegistry<string, number>("widget")
      .register("double", (n) => `double:${n * 2}`)
      .register("plain", (n) => `plain:${n}`);

    expect(registry.names()).toEqual(["double", "plain"]);
    expect(registry.has("plain")).toBe(true);
    expect(registry.create("double", 4)).toBe("double:8");
  });

  it("should name the available providers for an unknown name", () => {
    expect(() => imageGenerators.create("dalle", { cache: new CacheStore("/tmp/unused"), isInterrupted: () => false }))
      .toThrow(new FatalIOError('Unknown image provider "dalle". Available: comfyui, gemini'));
    expect(videoGenerators.names()).toEqual(["comfyui", "veo"]);
  });
});

describe("createGenerationServices", () => {
  it("should build the configured generators", () => {
    const config = parseConfig({ imageGenerator: { provider: "comfyui" }, videoGenerator: { provider: "comfyui" } });

    const services = createGenerationServices(config, new CacheStore("/tmp/unused"), () => false);

    expect(services.imageGenerator).toBeInstanceOf(ComfyImageGenerator);
    expect(services.videoGenerator).toBeInstanceOf(ComfyVideoGenerator);
    expect(services.frameExtractor).toBeInstanceOf(FfmpegFrameExtractor);
  });
});

describe("createGateway", () => {
  it("should give each service class its own limiter", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const config = parseConfig({ imageGenerator: { rateLimit: { requestsPerMinute: 10 } } });

    const gateway = createGateway(config);

    expect(gateway.limiter("image")?.describe()).toBe("10 req/min");
    expect(gateway.limiter("video")?.enabled).toBe(false);
    expect(log).toHaveBeenCalledWith("[rate-limit] image: 10 req/min");
    expect(log).toHaveBeenCalledTimes(1);
  });
});

describe("chatModels", () => {
  beforeEach(() => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-secret");
    vi.stubEnv("GEMINI_API_KEY", "test-secret");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should create models for both providers", () => {
    expect(chatModels.create("anthropic", "claude-sonnet-4-5")).toMatchObject({ modelId: "claude-sonnet-4-5" });
    expect(chatModels.create("google", "gemini-2.5-flash")).toMatchObject({ modelId: "gemini-2.5-flash" });
  });

  it("should require an API key", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");

    expect(() => chatModels.create("anthropic", "claude-sonnet-4-5")).toThrow("ANTHROPIC_API_KEY environment variable is not set");
  });
});

describe("veoDuration", () => {
  it("should snap to the clip lengths Veo accepts", () => {
    expect([1, 4, 5, 7, 8, 12].map(veoDuration)).toEqual([4, 4, 6, 8, 8, 8]);
  });
});

describe("FfmpegFrameExtractor", () => {
  it("should fail fatally when the binary is missing", async () => {
    const extractor = new FfmpegFrameExtractor("framechain-no-such-ffmpeg");

    await expect(extractor.extractLastFrame("/tmp/clip.mp4")).rejects.toBeInstanceOf(FatalIOError);
  });
});
