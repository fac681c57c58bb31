import express from "express";
import morgan from "morgan";
import cors from "cors";
import type { Config } from "./config/index.js";
import type { FileStorage } from "./storage/storage.js";
import { NoteHandler } from "./engine/note-handler.js";
import { FileHandler } from "./engine/file-handler.js";
import { registerFileRoutes, registerNoteRoutes } from "./engine/router.js";
import { registerAssetRoutes } from "./engine/assets.js";
import { noCache } from "./middleware/no-cache.js";
import { errorHandler } from "./middleware/error-handler.js";

export interface AppOptions {
  /** Access logging; disabled by tests. */
  accessLog?: boolean;
}

export function createApp(cfg: Config, storage: FileStorage, opts: AppOptions = {}): express.Express {
  const { file_limit: fileLimit, single_file_size_limit: maxSize } = cfg.storage;

  const app = express();
  app.disable("x-powered-by");

  if (opts.accessLog ?? true) {
    app.use(
      morgan(":date[clf] :status :method :url :response-time ms", {
        stream: { write: (msg: string) => process.stdout.write(msg) },
      }),
    );
  }
  // Notes are public by URL; let other origins read them (e.g. `?raw`).
  app.use(cors());
  app.use(noCache());

  app.get("/_health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // Uploads and assets come first: their paths would otherwise match /:note.
  registerFileRoutes(app, new FileHandler(storage, fileLimit, maxSize), maxSize);
  registerAssetRoutes(app, cfg.assets.static_root, cfg.assets.vendor_root);
  registerNoteRoutes(app, new NoteHandler(storage, { fileLimit, singleFileSizeLimit: maxSize }), maxSize);

  // Must be last middleware
  app.use(errorHandler(maxSize));

  return app;
}
