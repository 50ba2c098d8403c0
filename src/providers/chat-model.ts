import { anthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import type { LanguageModel } from "ai";
import { FatalIOError } from "../errors";
import { ProviderRegistry } from "./registry";

export const DEFAULT_CHAT_MODELS: Record<string, string> = {
  anthropic: "claude-sonnet-4-5",
  google: "gemini-2.5-flash",
};

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new FatalIOError(`${name} environment variable is not set`);
  }
  return value;
}

export const chatModels = new ProviderRegistry<LanguageModel, string>("chat")
  .register("anthropic", (model) => {
    requireEnv("ANTHROPIC_API_KEY");
    return anthropic(model);
  })
  .register("google", (model) => {
    const google = createGoogleGenerativeAI({ apiKey: requireEnv("GEMINI_API_KEY") });
    return google(model);
  });
