import rateLimit from "express-rate-limit";

/**
 * Strategy runs: 10 per minute per IP (each run loads a season of history)
 */
export const strategyLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 10,
  message: { error: "Too many strategy runs. Please try again in a minute.", code: "RATE_LIMITED" },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * General API: 100 requests per minute per IP
 */
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  message: { error: "Too many requests. Please slow down.", code: "RATE_LIMITED" },
  standardHeaders: true,
  legacyHeaders: false,
});
