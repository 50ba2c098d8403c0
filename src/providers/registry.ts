import type { CacheStore } from "../cache-store";
import { FatalIOError } from "../errors";
import type { Artifact } from "../types";

export interface ImageRequest {
  prompt: string;
  referenceImagePaths: string[];
  /** Stable identity of the request; used to recover pending remote jobs. */
  requestKey: string;
}

export interface VideoRequest {
  prompt: string;
  framePaths: string[];            // first frame, then the last frame when there is one
  durationSeconds: number;
  requestKey: string;
}

export interface ImageGenerator {
  readonly name: string;
  generateImage(request: ImageRequest): Promise<Artifact>;
}

export interface VideoGenerator {
  readonly name: string;
  generateVideo(request: VideoRequest): Promise<Artifact>;
}

export interface FrameExtractor {
  extractLastFrame(videoPath: string): Promise<Artifact>;
}

/** What a generator factory gets at startup. */
export interface GeneratorOptions {
  model?: string;
  cache: CacheStore;
  isInterrupted: () => boolean;
}

export type ProviderFactory<T, C> = (config: C) => T;

/** Maps provider names to factories for one capability (image, video, chat). */
export class ProviderRegistry<T, C> {
  private readonly factories = new Map<string, ProviderFactory<T, C>>();

  constructor(readonly capability: string) {}

  register(name: string, factory: ProviderFactory<T, C>): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  create(name: string, config: C): T {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new FatalIOError(`Unknown ${this.capability} provider "${name}". Available: ${this.names().join(", ") || "none"}`);
    }
    return factory(config);
  }
}

/** Collaborators the task executors call. */
export interface GenerationServices {
  imageGenerator: ImageGenerator;
  videoGenerator: VideoGenerator;
  frameExtractor: FrameExtractor;
}
