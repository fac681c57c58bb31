import express, { Router, type Express } from "express";
import multer from "multer";
import type { NoteHandler } from "./note-handler.js";
import type { FileHandler } from "./file-handler.js";

// Form encoding can triple the size of a note, so the parser limit is
// looser than the stored-size limit the handler enforces.
function bodyLimit(maxSize: number): number {
  return Math.max(maxSize * 3 + 1024, 100 * 1024);
}

export function registerFileRoutes(app: Express, handler: FileHandler, maxSize: number): void {
  // Busboy reads filename parameters as latin1 unless told otherwise.
  const options = {
    storage: multer.memoryStorage(),
    limits: { fileSize: maxSize, files: 1 },
    defParamCharset: "utf8",
  };
  const upload = multer(options);

  app.post("/upload", upload.single("file"), handler.upload);
  app.get("/_tmp/:file", handler.serve);
}

export function registerNoteRoutes(app: Express, handler: NoteHandler, maxSize: number): void {
  const notes = Router();
  const limit = bodyLimit(maxSize);

  notes.get("/", handler.root);
  notes.get("/:note", handler.get);
  notes.post(
    "/:note",
    express.urlencoded({ extended: false, limit }),
    express.raw({ type: ["text/*", "application/octet-stream"], limit }),
    handler.save,
  );

  app.use("/", notes);
}
