import { z } from "zod";
import { env } from "../config/env.js";

// ─── Strategy run request (CLI flags and POST /api/strategy body) ────────────

export const strategyRequestSchema = z.object({
  year: z.coerce.number().int().min(2018).max(2100),
  grandPrix: z.string().min(1).max(100).trim(),
  driver: z
    .string()
    .min(1)
    .max(10)
    .transform((v) => v.trim().toUpperCase()),
  team: z.string().min(1).max(100).trim(),
  raceLaps: z.coerce.number().int().min(1).max(200),
  condition: z.enum(["auto", "dry", "wet", "mixed"]).default("auto"),
  pitLossSec: z.coerce.number().nonnegative().max(120).default(env.PIT_LOSS_SEC),
});

export type StrategyRequest = z.infer<typeof strategyRequestSchema>;
