import { Router } from "express";
import { GoogleGenerativeAIFetchError } from "@google/generative-ai";
import { buildChefPrompt } from "../lib/chef-prompt.js";
import { renderRecipesHtml } from "../lib/recipe-markdown.js";
import { parseSelection } from "../lib/selection.js";
import {
  CHEF_GENERATION_SETTINGS,
  MODEL_ID,
  aggregateStreamedText,
} from "../lib/llm-providers/gemini.js";
import {
  getGenerationClient,
  MISSING_API_KEY_MESSAGE,
} from "../lib/llm-providers/index.js";
import type { GenerationClient } from "../lib/llm-providers/types.js";
import {
  CUISINES,
  DIETARY_PREFERENCES,
  SELECTION_DEFAULTS,
  WINE_PREFERENCES,
} from "../lib/types.js";
import type { ChefOptions, RecipeResult } from "../lib/types.js";

interface GenerationFailure {
  status: number;
  error: string;
}

function describeFailure(error: unknown): GenerationFailure {
  const message = error instanceof Error ? error.message : String(error);

  if (message.includes(MISSING_API_KEY_MESSAGE)) {
    return { status: 500, error: "Recipe generation not configured" };
  }
  if (error instanceof GoogleGenerativeAIFetchError && error.status === 429) {
    return { status: 429, error: "Rate limit exceeded" };
  }
  return { status: 500, error: "Failed to generate recipes" };
}

export function createChefRouter(
  getClient: () => GenerationClient = getGenerationClient
): Router {
  const router = Router();

  // GET /api/chef/options
  router.get("/options", (_req, res) => {
    const options: ChefOptions = {
      cuisines: CUISINES,
      dietaryPreferences: DIETARY_PREFERENCES,
      winePreferences: WINE_PREFERENCES,
      defaults: SELECTION_DEFAULTS,
    };
    res.json(options);
  });

  // POST /api/chef/prompt
  router.post("/prompt", (req, res) => {
    const parsed = parseSelection(req.body);
    if (parsed.error !== undefined) {
      res.status(400).json({ error: parsed.error });
      return;
    }
    res.json({ prompt: buildChefPrompt(parsed.selection) });
  });

  // POST /api/chef/recipes
  router.post("/recipes", async (req, res) => {
    const parsed = parseSelection(req.body);
    if (parsed.error !== undefined) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    const prompt = buildChefPrompt(parsed.selection);

    try {
      const recipes = await aggregateStreamedText(
        getClient(),
        MODEL_ID,
        prompt,
        CHEF_GENERATION_SETTINGS
      );
      console.log("[chef] recipes:", recipes);

      const result: RecipeResult = {
        recipes,
        recipesHtml: renderRecipesHtml(recipes),
        prompt,
      };
      res.json(result);
    } catch (error) {
      console.error("[chef] recipe generation error:", error);
      const { status, error: message } = describeFailure(error);
      res.status(status).json({ error: message });
    }
  });

  // POST /api/chef/recipes/stream (SSE)
  router.post("/recipes/stream", async (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const send = (event: string, data: unknown) => {
      res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    };

    const parsed = parseSelection(req.body);
    if (parsed.error !== undefined) {
      send("error", { message: parsed.error });
      res.end();
      return;
    }

    const prompt = buildChefPrompt(parsed.selection);
    send("prompt", { prompt });

    try {
      const recipes = await aggregateStreamedText(
        getClient(),
        MODEL_ID,
        prompt,
        CHEF_GENERATION_SETTINGS,
        (chunk) => send("chunk", chunk)
      );
      console.log("[chef] recipes:", recipes);

      const result: RecipeResult = {
        recipes,
        recipesHtml: renderRecipesHtml(recipes),
        prompt,
      };
      send("complete", result);
      res.end();
    } catch (error) {
      console.error("[chef] recipe stream error:", error);
      send("error", { message: describeFailure(error).error });
      res.end();
    }
  });

  return router;
}

export default createChefRouter();
