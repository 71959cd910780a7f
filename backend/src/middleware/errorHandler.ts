import { Request, Response, NextFunction } from "express";
import type { ErrorResponse } from "@scenegrab/shared";
import { AppError } from "../utils/errors";
import { logger } from "../utils/logger";

export function errorHandler(err: Error, req: Request, res: Response<ErrorResponse>, _next: NextFunction): void {
  if (err instanceof AppError) {
    logger.warn(`${req.method} ${req.originalUrl} → ${err.name}: ${err.message}`, {
      code: err.code,
      statusCode: err.statusCode,
    });
    res.status(err.statusCode).json({
      error: {
        code: err.code,
        message: err.message,
        userMessage: err.userMessage,
      },
    });
    return;
  }

  // body-parser marks malformed JSON with a 4xx status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({
      error: {
        code: "CONFIG_ERROR",
        message: err.message,
        userMessage: "The request body is not valid JSON.",
      },
    });
    return;
  }

  logger.error("Unhandled error", {
    name: err.name,
    message: err.message,
    stack: err.stack,
  });

  res.status(500).json({
    error: {
      code: "INTERNAL_ERROR",
      message: "An unexpected error occurred",
      userMessage: "Something went wrong. Please try again.",
    },
  });
}
