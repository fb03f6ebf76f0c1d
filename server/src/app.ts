import express from "express";
import cors from "cors";
import helmet from "helmet";
import { env } from "./config/env.js";
import { errorHandler } from "./middleware/error-handler.js";
import { apiLimiter } from "./middleware/rate-limit.js";
import { healthRouter } from "./routes/health.js";
import { strategyRouter } from "./routes/strategy.js";

export function createApp() {
  const app = express();

  // Trust proxy (reverse proxy in front of the API)
  app.set("trust proxy", 1);

  // ─── Security ───────────────────────────────────────────────────────────────
  app.use(helmet());

  app.use(
    cors({
      origin: env.FRONTEND_URL,
      methods: ["GET", "POST"],
      allowedHeaders: ["Content-Type"],
    })
  );

  // ─── Body Parsing ──────────────────────────────────────────────────────────
  app.use(express.json({ limit: "100kb" }));

  // ─── Rate Limiting ───────────────────────────────────────────────────────
  app.use("/api", apiLimiter);

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use("/api/health", healthRouter);
  app.use("/api/strategy", strategyRouter);

  // ─── Error Handling ─────────────────────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
