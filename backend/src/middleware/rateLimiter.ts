import rateLimit from "express-rate-limit";
import { PROCESS_RATE_LIMIT, STATUS_RATE_LIMIT } from "@scenegrab/shared";

export const processRateLimiter = rateLimit({
  windowMs: 60 * 60 * 1000, // 1 hour
  limit: PROCESS_RATE_LIMIT,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: {
      code: "RATE_LIMITED",
      message: "Rate limit exceeded",
      userMessage: "You've queued a lot of downloads recently. Please wait before submitting more.",
    },
  },
});

export const statusRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: STATUS_RATE_LIMIT,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: {
      code: "RATE_LIMITED",
      message: "Too many status requests",
      userMessage: "Too many requests. Please slow down.",
    },
  },
});
