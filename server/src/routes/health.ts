import { Router } from "express";
import { env } from "../config/env.js";
import { getProviderIds } from "../services/providers/index.js";

export const healthRouter = Router();

healthRouter.get("/", (_req, res) => {
  res.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    dataProvider: env.DATA_PROVIDER,
    availableProviders: getProviderIds(),
  });
});
