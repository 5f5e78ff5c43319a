import "dotenv/config";
import { createApp } from "./app.js";
import { MODEL_ID } from "./lib/llm-providers/gemini.js";

const PORT = process.env.PORT || 3001;

const app = createApp();

app.listen(PORT, () => {
  console.log(`AI Chef server running on http://localhost:${PORT} (model ${MODEL_ID})`);
});
