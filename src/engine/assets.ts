import fsp from "node:fs/promises";
import path from "node:path";
import express, { type Express } from "express";
import { asyncHandler, hasErrorCode, notFoundError } from "./errors.js";

// Browser builds shipped inside npm packages, served under /js/.
const VENDOR_SCRIPTS = new Map<string, string[]>([
  ["marked.min.js", ["marked", "marked.min.js"]],
  ["purify.min.js", ["dompurify", "dist", "purify.min.js"]],
]);

export function registerAssetRoutes(app: Express, staticRoot: string, vendorRoot: string): void {
  app.get(
    "/js/:file",
    asyncHandler(async (req, res) => {
      const file = req.params.file;
      const segments = VENDOR_SCRIPTS.get(file);
      if (!segments) {
        throw notFoundError("Script", file);
      }

      let script: Buffer;
      try {
        script = await fsp.readFile(path.join(vendorRoot, ...segments));
      } catch (err) {
        if (hasErrorCode(err, "ENOENT")) throw notFoundError("Script", file);
        throw err;
      }

      res.type("js");
      res.send(script);
    }),
  );

  app.use(
    express.static(staticRoot, {
      index: false,
      redirect: false,
      cacheControl: false,
      etag: false,
      lastModified: false,
    }),
  );
}
