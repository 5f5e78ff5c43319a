import {
  HarmBlockThreshold,
  HarmCategory,
} from "@google/generative-ai";
import type {
  GenerateContentResponse,
  ModelParams,
  SafetySetting,
} from "@google/generative-ai";
import type {
  GenerationClient,
  GenerationSettings,
  StreamCallback,
} from "./types.js";

export const MODEL_ID = process.env.GEMINI_MODEL || "gemini-2.0-flash-001";

export const CHEF_GENERATION_SETTINGS: GenerationSettings = {
  safetyThresholds: {
    [HarmCategory.HARM_CATEGORY_HARASSMENT]: HarmBlockThreshold.BLOCK_NONE,
    [HarmCategory.HARM_CATEGORY_HATE_SPEECH]: HarmBlockThreshold.BLOCK_NONE,
    [HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT]: HarmBlockThreshold.BLOCK_NONE,
    [HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT]: HarmBlockThreshold.BLOCK_NONE,
  },
  temperature: 0.8,
  maxOutputTokens: 2048,
};

const HARM_CATEGORIES = Object.values(HarmCategory);

export function toModelParams(
  model: string,
  settings: GenerationSettings
): ModelParams {
  const safetySettings: SafetySetting[] = [];
  for (const category of HARM_CATEGORIES) {
    const threshold = settings.safetyThresholds[category];
    if (threshold) {
      safetySettings.push({ category, threshold });
    }
  }

  return {
    model,
    safetySettings,
    generationConfig: {
      temperature: settings.temperature,
      maxOutputTokens: settings.maxOutputTokens,
    },
  };
}

/**
 * Text carried by a streamed chunk, or "" when the chunk has no candidate
 * content (blocked by safety filters, or an empty final chunk).
 */
export function chunkText(chunk: GenerateContentResponse): string {
  const parts = chunk.candidates?.[0]?.content?.parts;
  if (!parts || parts.length === 0) return "";
  return parts.map((part) => part.text ?? "").join("");
}

// ── Aggregator ─────────────────────────────────────────────

export async function aggregateStreamedText(
  client: GenerationClient,
  model: string,
  prompt: string,
  settings: GenerationSettings,
  onChunk?: StreamCallback
): Promise<string> {
  const generativeModel = client.getGenerativeModel(
    toModelParams(model, settings)
  );

  const t0 = Date.now();
  const result = await generativeModel.generateContentStream(prompt);
  // Rejects together with the stream; the caller gets the stream's error.
  result.response.catch((error: unknown) => {
    console.error(
      "[gemini-stream] stream failed:",
      error instanceof Error ? error.message : String(error)
    );
  });

  const texts: string[] = [];
  for await (const chunk of result.stream) {
    const text = chunkText(chunk);
    onChunk?.({ index: texts.length, text });
    texts.push(text);
  }

  const response = texts.join(" ");
  console.log(
    `[gemini-stream] done: ${texts.length} chunks, ${response.length} chars, ${Date.now() - t0}ms`
  );
  return response;
}
