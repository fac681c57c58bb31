import type { Request, Response, NextFunction } from "express";

export function noCache() {
  return (_req: Request, res: Response, next: NextFunction) => {
    res.set({
      "Cache-Control": "no-cache, no-store, must-revalidate",
      Pragma: "no-cache",
      Expires: "0",
    });
    next();
  };
}
