import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const envSchema = z.object({
  // Historical data
  DATA_PROVIDER: z.enum(["local", "openf1"]).default("local"),
  DATA_DIR: z.string().min(1).default("./race-data"),
  OPENF1_BASE_URL: z.string().url().default("https://api.openf1.org"),

  // Strategy defaults
  PIT_LOSS_SEC: z.coerce.number().nonnegative().default(21),
  MAX_STOPS: z.coerce.number().int().min(1).max(4).default(2),
  TOP_K: z.coerce.number().int().min(1).max(50).default(5),
  STINT_MARGIN_LAPS: z.coerce.number().int().min(0).default(6),
  STINT_STEP_LAPS: z.coerce.number().int().min(1).default(2),
  MIN_STINT_LAPS: z.coerce.number().int().min(1).default(5),
  WET_SHARE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.25),
  // Scales wet experience before the wet-compound slope discount (1 = rainfall treated as on/off)
  RAIN_INTENSITY_SCALE: z.coerce.number().nonnegative().default(1),

  // URLs
  FRONTEND_URL: z.string().url().default("http://localhost:5173"),

  // General
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().default(3000),
});

export const env = envSchema.parse(process.env);

export type Env = z.infer<typeof envSchema>;
