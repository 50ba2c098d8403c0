import { Modality, type GoogleGenAI, type Part } from "@google/genai";
import { ValidationError } from "../errors";
import type { Artifact } from "../types";
import { imageMimeType, readInputFile } from "./files";
import { getGoogleClient } from "./google-client";
import type { ImageGenerator, ImageRequest } from "./registry";

export const DEFAULT_GEMINI_IMAGE_MODEL = "gemini-2.5-flash-image";

/**
 * Image generation through Gemini's native image output. Reference images are
 * sent inline after the prompt, in the order given.
 */
export class GeminiImageGenerator implements ImageGenerator {
  readonly name = "gemini";

  constructor(
    private readonly model: string = DEFAULT_GEMINI_IMAGE_MODEL,
    private readonly client: () => GoogleGenAI = getGoogleClient,
  ) {}

  async generateImage(request: ImageRequest): Promise<Artifact> {
    const parts: Part[] = [{ text: request.prompt }];
    for (const refPath of request.referenceImagePaths) {
      const data = await readInputFile(refPath);
      parts.push({ inlineData: { mimeType: imageMimeType(refPath), data: data.toString("base64") } });
    }

    const response = await this.client().models.generateContent({
      model: this.model,
      contents: [{ role: "user", parts }],
      config: { responseModalities: [Modality.IMAGE] },
    });

    const candidate = response.candidates?.[0];
    if (!candidate?.content?.parts) {
      throw new ValidationError(`No content parts in response for ${request.requestKey}`);
    }

    const inline = candidate.content.parts.find((part) => part.inlineData?.data)?.inlineData;
    if (!inline?.data) {
      throw new ValidationError(`No image data in response for ${request.requestKey}`);
    }
    return { data: Buffer.from(inline.data, "base64"), mimeType: inline.mimeType ?? "image/png" };
  }
}
