import { GoogleGenAI } from "@google/genai";
import { FatalIOError } from "../errors";

let googleClient: GoogleGenAI | null = null;

export function getGoogleClient(): GoogleGenAI {
  if (!googleClient) {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new FatalIOError("GEMINI_API_KEY environment variable is not set");
    }
    googleClient = new GoogleGenAI({ apiKey });
  }
  return googleClient;
}
