import { Router, Request, Response, NextFunction } from "express";
import { env } from "../config/env.js";
import { strategyLimiter } from "../middleware/rate-limit.js";
import { AppError } from "../middleware/error-handler.js";
import { strategyRequestSchema } from "../utils/strategy-validators.js";
import { listTracks } from "../utils/track-catalog.js";
import { getProvider } from "../services/providers/index.js";
import { runStrategy } from "../services/strategy-run.js";

export const strategyRouter = Router();

// ─── POST /api/strategy — Plan a race from weighted history ─────────────────

strategyRouter.post(
  "/",
  strategyLimiter,
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = strategyRequestSchema.parse(req.body);
      const provider = getProvider(env.DATA_PROVIDER);
      if (!provider) {
        throw new AppError(500, `Unknown data provider "${env.DATA_PROVIDER}"`, "UNKNOWN_PROVIDER");
      }

      const report = await runStrategy(request, provider);
      res.json(report);
    } catch (err) {
      next(err);
    }
  }
);

// ─── GET /api/strategy/tracks — Circuit catalog ──────────────────────────────

strategyRouter.get("/tracks", (_req: Request, res: Response) => {
  res.set("Cache-Control", "public, max-age=3600");
  res.json({ tracks: listTracks() });
});
