import { checkArtifactType } from "../providers/files";
import type { TaskExecutor } from "../scheduler";
import { requiresLastFrame, taskId, type Shot } from "../types";
import type { ExecutorDeps } from "./generate-frame";

export const DEFAULT_SHOT_SECONDS = 8;

export function videoPrompt(shot: Shot): string {
  return [shot.motionDesc ?? shot.description, shot.audioDesc]
    .filter((part): part is string => Boolean(part))
    .join("\n");
}

/**
 * Clip for one shot, interpolated from its first frame and, for medium and
 * large variations, its last frame.
 */
export function createShotVideoExecutor(deps: ExecutorDeps): TaskExecutor {
  return async (ctx) => {
    const { shot } = ctx;
    const framePaths = [ctx.pathOf(taskId(shot.idx, "first_frame"))];
    if (requiresLastFrame(shot.variationType)) {
      framePaths.push(ctx.pathOf(taskId(shot.idx, "last_frame")));
    }

    console.log(`[video] Generating shot ${shot.idx} (${shot.variationType}, ${framePaths.length} frame${framePaths.length > 1 ? "s" : ""})`);
    return deps.gateway.call("video", `video for shot ${shot.idx}`, async () =>
      checkArtifactType(await deps.videoGenerator.generateVideo({
        prompt: videoPrompt(shot),
        framePaths,
        durationSeconds: shot.durationSeconds ?? DEFAULT_SHOT_SECONDS,
        requestKey: ctx.node.cacheKey,
      }), ctx.node.cacheKey),
    );
  };
}
