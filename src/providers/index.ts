import type { LanguageModel } from "ai";
import type { CacheStore } from "../cache-store";
import type { FrameChainConfig } from "../config";
import { RateLimiter } from "../rate-limiter";
import { RemoteGateway } from "../remote";
import { chatModels, DEFAULT_CHAT_MODELS } from "./chat-model";
import { ComfyImageGenerator, ComfyVideoGenerator } from "./comfy-generators";
import { FfmpegFrameExtractor } from "./ffmpeg-frame-extractor";
import { DEFAULT_GEMINI_IMAGE_MODEL, GeminiImageGenerator } from "./gemini-image";
import {
  ProviderRegistry,
  type GenerationServices,
  type GeneratorOptions,
  type ImageGenerator,
  type VideoGenerator,
} from "./registry";
import { DEFAULT_VEO_MODEL, VeoVideoGenerator } from "./veo-video";

export const imageGenerators = new ProviderRegistry<ImageGenerator, GeneratorOptions>("image")
  .register("gemini", (options) => new GeminiImageGenerator(options.model ?? DEFAULT_GEMINI_IMAGE_MODEL))
  .register("comfyui", (options) => new ComfyImageGenerator(options.cache, options.isInterrupted, options.model));

export const videoGenerators = new ProviderRegistry<VideoGenerator, GeneratorOptions>("video")
  .register("veo", (options) => new VeoVideoGenerator(options.model ?? DEFAULT_VEO_MODEL, options.isInterrupted))
  .register("comfyui", (options) => new ComfyVideoGenerator(options.cache, options.isInterrupted, options.model));

/**
 * One limiter per service class, shared by every task of the run.
 */
export function createGateway(config: FrameChainConfig): RemoteGateway {
  const limiters = {
    chat: new RateLimiter("chat", config.chatModel.rateLimit),
    image: new RateLimiter("image", config.imageGenerator.rateLimit),
    video: new RateLimiter("video", config.videoGenerator.rateLimit),
  };
  for (const limiter of Object.values(limiters)) {
    if (limiter.enabled) {
      console.log(`[rate-limit] ${limiter.name}: ${limiter.describe()}`);
    }
  }
  return new RemoteGateway({ limiters, retry: config.retry });
}

export function createGenerationServices(
  config: FrameChainConfig,
  cache: CacheStore,
  isInterrupted: () => boolean,
): GenerationServices {
  return {
    imageGenerator: imageGenerators.create(config.imageGenerator.provider, {
      model: config.imageGenerator.model,
      cache,
      isInterrupted,
    }),
    videoGenerator: videoGenerators.create(config.videoGenerator.provider, {
      model: config.videoGenerator.model,
      cache,
      isInterrupted,
    }),
    frameExtractor: new FfmpegFrameExtractor(),
  };
}

export function createChatModel(config: FrameChainConfig): LanguageModel {
  const { provider, model } = config.chatModel;
  return chatModels.create(provider, model ?? DEFAULT_CHAT_MODELS[provider] ?? DEFAULT_CHAT_MODELS.google);
}
