import { RunInterruptedError } from "../errors";
import { checkArtifactType } from "../providers/files";
import type { ImageRequest, GenerationServices } from "../providers/registry";
import type { RemoteGateway } from "../remote";
import type { TaskContext, TaskExecutor } from "../scheduler";
import { newCameraImageKey, transitionCacheKey } from "../task-graph";
import { taskId, type Artifact, type FramePosition, type Shot } from "../types";

export type ExecutorDeps = GenerationServices & { gateway: RemoteGateway };

const TRANSITION_SECONDS = 4;

/**
 * Plain concatenation of the shot's descriptions for one keyframe.
 */
export function framePrompt(shot: Shot, position: FramePosition): string {
  const frameDesc = position === "first_frame" ? shot.firstFrameDesc : shot.lastFrameDesc;
  return [shot.description, frameDesc, shot.composition ? `Composition: ${shot.composition}` : undefined]
    .filter((part): part is string => Boolean(part))
    .join("\n");
}

export function transitionPrompt(from: Shot, to: Shot): string {
  return `The camera moves continuously from the first view to the second, without a cut.\nFrom: ${from.description}\nTo: ${to.description}`;
}

export function missingInfoPrompt(missingInfo: string): string {
  return `The first image has the right composition and background, but some elements are wrong or missing: ${missingInfo}\nKeep the composition and background of the first image and fix only those elements.`;
}

function generateImage(deps: ExecutorDeps, request: ImageRequest, label: string): Promise<Artifact> {
  return deps.gateway.call("image", label, async () =>
    checkArtifactType(await deps.imageGenerator.generateImage(request), request.requestKey));
}

function assertNotInterrupted(ctx: TaskContext): void {
  if (ctx.isInterrupted()) {
    throw new RunInterruptedError(`Task ${ctx.node.id}`, "stopped between steps");
  }
}

/**
 * Opening frame of a child camera: a short transition clip from the parent
 * frame into the new view, whose final frame becomes the new camera image.
 * A parent that fully covers the child is used as is; otherwise the image is
 * regenerated with the new camera image as the main reference.
 */
async function childCameraFirstFrame(deps: ExecutorDeps, ctx: TaskContext, parentShotIdx: number, parentCamIdx: number): Promise<Artifact> {
  const { shot, camera, cache, graph } = ctx;
  const parentShot = graph.shots.get(parentShotIdx) ?? shot;
  const parentFramePath = ctx.pathOf(taskId(parentShotIdx, camera.parentFrame ?? "first_frame"));

  const transitionKey = transitionCacheKey(parentCamIdx, camera.idx);
  let transitionPath: string;
  if (await cache.exists(transitionKey)) {
    console.log(`[frames] Skipped transition camera ${parentCamIdx} -> ${camera.idx}, already exists.`);
    transitionPath = cache.pathFor(transitionKey);
  } else {
    console.log(`[frames] Generating transition camera ${parentCamIdx} -> ${camera.idx} for shot ${shot.idx}...`);
    const clip = await deps.gateway.call("video", `transition camera ${parentCamIdx} -> ${camera.idx}`, async () =>
      checkArtifactType(await deps.videoGenerator.generateVideo({
        prompt: transitionPrompt(parentShot, shot),
        framePaths: [parentFramePath],
        durationSeconds: TRANSITION_SECONDS,
        requestKey: transitionKey,
      }), transitionKey),
    );
    transitionPath = await cache.save(transitionKey, clip.data);
  }

  const imageKey = newCameraImageKey(shot.idx, camera.idx);
  let newCameraImage: Artifact;
  if (await cache.exists(imageKey)) {
    newCameraImage = { data: await cache.load(imageKey), mimeType: "image/png" };
  } else {
    newCameraImage = checkArtifactType(await deps.frameExtractor.extractLastFrame(transitionPath), imageKey);
    await cache.save(imageKey, newCameraImage.data);
  }

  if (camera.isParentFullyCoversChild !== false && camera.missingInfo === undefined) {
    return newCameraImage;
  }

  assertNotInterrupted(ctx);
  return generateImage(deps, {
    prompt: `${missingInfoPrompt(camera.missingInfo ?? "unspecified")}\n\n${framePrompt(shot, "first_frame")}`,
    referenceImagePaths: [cache.pathFor(imageKey), ...(shot.referenceImagePaths ?? [])],
    requestKey: ctx.node.cacheKey,
  }, `first frame of shot ${shot.idx}`);
}

export function createFirstFrameExecutor(deps: ExecutorDeps): TaskExecutor {
  return async (ctx) => {
    const { shot, camera } = ctx;
    const references = [...(shot.referenceImagePaths ?? [])];
    const openingShotIdx = camera.activeShotIdxs[0];

    if (openingShotIdx !== shot.idx) {
      // Later shots keep the composition of the camera's opening frame.
      references.push(ctx.pathOf(taskId(openingShotIdx, "first_frame")));
    } else if (camera.parentCamIdx !== undefined && camera.parentShotIdx !== undefined) {
      return childCameraFirstFrame(deps, ctx, camera.parentShotIdx, camera.parentCamIdx);
    }

    return generateImage(deps, {
      prompt: framePrompt(shot, "first_frame"),
      referenceImagePaths: references,
      requestKey: ctx.node.cacheKey,
    }, `first frame of shot ${shot.idx}`);
  };
}

export function createLastFrameExecutor(deps: ExecutorDeps): TaskExecutor {
  return async (ctx) => {
    const { shot } = ctx;
    return generateImage(deps, {
      prompt: framePrompt(shot, "last_frame"),
      referenceImagePaths: [...(shot.referenceImagePaths ?? []), ctx.pathOf(taskId(shot.idx, "first_frame"))],
      requestKey: ctx.node.cacheKey,
    }, `last frame of shot ${shot.idx}`);
  };
}
