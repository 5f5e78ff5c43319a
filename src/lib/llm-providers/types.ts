import type {
  GenerateContentResponse,
  HarmBlockThreshold,
  HarmCategory,
  ModelParams,
} from "@google/generative-ai";

/**
 * Generation parameters for a recipe request.
 */
export interface GenerationSettings {
  safetyThresholds: Partial<Record<HarmCategory, HarmBlockThreshold>>;
  temperature: number;
  maxOutputTokens: number;
}

export interface StreamChunk {
  index: number;
  text: string;
}

export type StreamCallback = (chunk: StreamChunk) => void;

/** The part of a Gemini model the aggregator talks to. */
export interface StreamingModel {
  generateContentStream(
    request: string
  ): Promise<{
    stream: AsyncIterable<GenerateContentResponse>;
    /** Settles with the whole reply; rejects with the stream's error. */
    response: Promise<unknown>;
  }>;
}

export interface GenerationClient {
  getGenerativeModel(params: ModelParams): StreamingModel;
}
