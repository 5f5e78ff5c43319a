import { fileURLToPath } from "url";
import express from "express";
import type { Router } from "express";
import cors from "cors";
import chefRoutes from "./routes/chef.js";

const PUBLIC_DIR = fileURLToPath(new URL("../public", import.meta.url));

export function createApp(chefRouter: Router = chefRoutes) {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(express.static(PUBLIC_DIR));

  app.use("/api/chef", chefRouter);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}
