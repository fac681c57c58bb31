import type { Request, Response } from "express";
import type { FileStorage } from "../storage/storage.js";
import {
  asyncHandler,
  fileLimitError,
  fileTooLargeError,
  unsupportedMediaTypeError,
} from "./errors.js";
import { isValidNoteId, randomNoteId } from "./note-id.js";
import { renderNotePage } from "./page.js";
import { noteUrl, qrSvg } from "./share.js";

export interface NoteLimits {
  fileLimit: number;
  singleFileSizeLimit: number;
}

const CLI_AGENTS = ["curl", "Wget"];

function wantsRaw(req: Request): boolean {
  if (req.query.raw !== undefined) return true;
  const ua = req.get("user-agent") ?? "";
  return CLI_AGENTS.some((prefix) => ua.startsWith(prefix));
}

// Form posts carry the note in the `text` field; raw bodies are kept as sent.
// A body neither parser accepted is refused rather than read as empty.
function noteBody(req: Request): Buffer {
  const body: unknown = req.body;
  if (Buffer.isBuffer(body)) return body;

  if (req.is("application/x-www-form-urlencoded")) {
    if (typeof body === "object" && body !== null && "text" in body && typeof body.text === "string") {
      return Buffer.from(body.text, "utf-8");
    }
    return Buffer.alloc(0);
  }

  // req.is() is null when the request has no body at all.
  if (req.is("*/*") === null || req.get("content-length") === "0") {
    return Buffer.alloc(0);
  }
  throw unsupportedMediaTypeError(req.get("content-type"));
}

function redirectToFreshNote(res: Response): void {
  res.redirect(303, `/${randomNoteId()}`);
}

export class NoteHandler {
  private storage: FileStorage;
  private limits: NoteLimits;

  constructor(storage: FileStorage, limits: NoteLimits) {
    this.storage = storage;
    this.limits = limits;
  }

  root = (_req: Request, res: Response): void => {
    redirectToFreshNote(res);
  };

  get = asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.note;
    if (!isValidNoteId(id)) {
      redirectToFreshNote(res);
      return;
    }

    if (req.query.qr !== undefined) {
      res.type("svg");
      res.send(await qrSvg(noteUrl(req, id)));
      return;
    }

    const content = await this.storage.read(id);

    if (wantsRaw(req)) {
      res.type("text/plain; charset=utf-8");
      res.send(content ?? Buffer.alloc(0));
      return;
    }

    res.type("html");
    res.send(renderNotePage({ id, content: content?.toString("utf-8") ?? "" }));
  });

  save = asyncHandler(async (req: Request, res: Response) => {
    const id = req.params.note;
    if (!isValidNoteId(id)) {
      redirectToFreshNote(res);
      return;
    }

    const data = noteBody(req);
    const { fileLimit, singleFileSizeLimit } = this.limits;

    if (data.length > singleFileSizeLimit) {
      console.warn(`WARN: note ${id} rejected, ${data.length} bytes exceeds ${singleFileSizeLimit}`);
      throw fileTooLargeError(data.length, singleFileSizeLimit);
    }

    if (data.length === 0) {
      await this.storage.remove(id);
      res.json({ data: { id, size: 0 } });
      return;
    }

    if (!(await this.storage.exists(id)) && (await this.storage.count()) >= fileLimit) {
      console.warn(`WARN: note ${id} rejected, file limit ${fileLimit} reached`);
      throw fileLimitError(fileLimit);
    }

    await this.storage.write(id, data);
    res.json({ data: { id, size: data.length } });
  });
}
