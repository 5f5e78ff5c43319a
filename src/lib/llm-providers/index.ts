import { GoogleGenerativeAI } from "@google/generative-ai";
import type { GenerationClient } from "./types.js";

export const MISSING_API_KEY_MESSAGE =
  "GOOGLE_AI_API_KEY or GEMINI_API_KEY required";

function getApiKey(): string {
  const key = process.env.GOOGLE_AI_API_KEY ?? process.env.GEMINI_API_KEY;
  if (!key) {
    throw new Error(MISSING_API_KEY_MESSAGE);
  }
  return key;
}

export function getGenerationClient(): GenerationClient {
  return new GoogleGenerativeAI(getApiKey());
}
