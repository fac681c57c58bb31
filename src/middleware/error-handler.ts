import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { AppError, badRequestError, fileTooLargeError, invalidPayloadError } from "../engine/errors.js";

interface ErrorBody {
  error: {
    code: string;
    message: string;
  };
}

function isBodyTooLarge(err: Error): boolean {
  return "type" in err && err.type === "entity.too.large";
}

// Express and body-parser tag client errors (undecodable params, bad
// charsets, aborted requests) with a 4xx `status`.
function clientStatus(err: Error): number | undefined {
  if (!("status" in err) || typeof err.status !== "number") return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

// Translates framework errors (multer, body-parser) into AppErrors.
// `maxSize` is the configured single file limit, used in the message.
function normalize(err: Error, maxSize: number): Error {
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") return fileTooLargeError(undefined, maxSize);
    return invalidPayloadError(`Invalid upload: ${err.message}`);
  }
  if (isBodyTooLarge(err)) return fileTooLargeError(undefined, maxSize);
  const status = clientStatus(err);
  if (status !== undefined) return badRequestError(status, err.message);
  return err;
}

export function errorHandler(maxSize: number) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const mapped = normalize(err, maxSize);

    if (mapped instanceof AppError) {
      const body: ErrorBody = {
        error: {
          code: mapped.code,
          message: mapped.message,
        },
      };
      res.status(mapped.status).json(body);
      return;
    }

    console.error("ERROR:", err);
    res.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message: "Internal server error",
      },
    });
  };
}
