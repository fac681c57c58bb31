import type { Request, Response, NextFunction } from "express";

export class AppError extends Error {
  code: string;
  status: number;

  constructor(code: string, status: number, message: string) {
    super(message);
    this.code = code;
    this.status = status;
  }
}

export function notFoundError(entity: string, id: string): AppError {
  return new AppError("NOT_FOUND", 404, `${entity} ${id} not found`);
}

export function invalidPayloadError(msg: string): AppError {
  return new AppError("INVALID_PAYLOAD", 400, msg);
}

export function badRequestError(status: number, msg: string): AppError {
  return new AppError("BAD_REQUEST", status, msg);
}

export function unsupportedMediaTypeError(type: string | undefined): AppError {
  return new AppError(
    "UNSUPPORTED_MEDIA_TYPE",
    415,
    `Unsupported content type: ${type ?? "(none)"}`,
  );
}

export function conflictError(msg: string): AppError {
  return new AppError("CONFLICT", 409, msg);
}

export function fileTooLargeError(size: number | undefined, max: number): AppError {
  const msg = size === undefined
    ? `File too large (max ${max} bytes)`
    : `File too large: ${size} bytes (max ${max})`;
  return new AppError("FILE_TOO_LARGE", 413, msg);
}

export function fileLimitError(limit: number): AppError {
  return new AppError("FILE_LIMIT_REACHED", 403, `File limit reached (${limit})`);
}

/** True for Node filesystem errors carrying the given errno code. */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}
