import { generateObject, type LanguageModel } from "ai";
import { z } from "zod";
import type { ParentCandidate, ParentMatch, ParentMatcher } from "./camera-tree";
import { ValidationError } from "./errors";
import type { RemoteGateway } from "./remote";
import type { Shot } from "./types";

const parentChoiceSchema = z.object({
  parentCameraIdx: z.number().int().nullable()
    .describe("Index of the camera the new shot can be derived from, or null if none can"),
  parentShotIdx: z.number().int().nullable()
    .describe("Shot of that camera whose frame the new camera is cut out of, or null for its latest shot"),
  fullyCoversChild: z.boolean()
    .describe("True when everything visible in the new shot is already visible in the parent shot"),
  missingInfo: z.string().nullable()
    .describe("What the new shot shows that the parent shot does not, or null"),
});

export type ParentChoice = z.infer<typeof parentChoiceSchema>;

function describeShot(shot: Shot): string {
  return shot.composition ? `${shot.description} (${shot.composition})` : shot.description;
}

export function buildParentPrompt(shot: Shot, candidates: readonly ParentCandidate[], shots: readonly Shot[]): string {
  const byIdx = new Map(shots.map((s) => [s.idx, s]));
  const lines = candidates.map((candidate) => {
    const filmed = candidate.camera.activeShotIdxs
      .map((idx) => byIdx.get(idx))
      .filter((s): s is Shot => s !== undefined)
      .map((s) => `    - shot ${s.idx}: ${describeShot(s)}`);
    return `Camera ${candidate.camera.idx}:\n${filmed.join("\n")}`;
  });

  return `You are a film editor planning camera coverage. A new camera position opens with the shot below.
Decide which existing camera it can be derived from: the new framing should be reachable by moving or
zooming from one of that camera's shots. A tighter shot can be derived from a wider one, never the reverse.
If no existing camera fits, answer null.

Existing cameras and the shots they film:
${lines.join("\n")}

New shot ${shot.idx}: ${describeShot(shot)}`;
}

/**
 * Asks a chat model which earlier camera a new camera derives from. The call
 * goes through the gateway's chat limiter and retry policy; an answer naming
 * a camera that is not a candidate is retried as a validation failure.
 */
export class LlmParentMatcher implements ParentMatcher {
  constructor(
    private readonly model: LanguageModel,
    private readonly gateway: RemoteGateway,
  ) {}

  async match(shot: Shot, candidates: readonly ParentCandidate[], shots: readonly Shot[]): Promise<ParentMatch[]> {
    const prompt = buildParentPrompt(shot, candidates, shots);
    const choice = await this.gateway.call("chat", `camera parent for shot ${shot.idx}`, async () => {
      const { object } = await generateObject({ model: this.model, schema: parentChoiceSchema, prompt });
      return validateChoice(object, candidates);
    });

    if (choice.parentCameraIdx === null) {
      return [];
    }
    return [{
      parentCamIdx: choice.parentCameraIdx,
      score: 1,
      fullyCoversChild: choice.fullyCoversChild,
      ...(choice.missingInfo ? { missingInfo: choice.missingInfo } : {}),
      ...(choice.parentShotIdx !== null ? { parentShotIdx: choice.parentShotIdx } : {}),
    }];
  }
}

export function validateChoice(choice: ParentChoice, candidates: readonly ParentCandidate[]): ParentChoice {
  if (choice.parentCameraIdx === null) {
    return choice;
  }
  const parent = candidates.find((c) => c.camera.idx === choice.parentCameraIdx);
  if (!parent) {
    throw new ValidationError(`Model chose camera ${choice.parentCameraIdx}, which is not a candidate`);
  }
  if (choice.parentShotIdx !== null && !parent.camera.activeShotIdxs.includes(choice.parentShotIdx)) {
    throw new ValidationError(`Model chose shot ${choice.parentShotIdx}, which camera ${parent.camera.idx} does not film`);
  }
  return choice;
}
