import type { Request, Response } from "express";
import type { FileStorage } from "../storage/storage.js";
import {
  asyncHandler,
  conflictError,
  fileLimitError,
  fileTooLargeError,
  invalidPayloadError,
  notFoundError,
} from "./errors.js";
import { extensionOf, isImageName, storedUploadName } from "./upload-name.js";

const MAX_NAME_ATTEMPTS = 100;

export class FileHandler {
  private storage: FileStorage;
  private fileLimit: number;
  private maxSize: number;

  constructor(storage: FileStorage, fileLimit: number, maxSize: number) {
    this.storage = storage;
    this.fileLimit = fileLimit;
    this.maxSize = maxSize;
  }

  upload = asyncHandler(async (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      throw invalidPayloadError("Missing file in form data");
    }

    if (file.size > this.maxSize) {
      console.warn(`WARN: upload rejected, ${file.size} bytes exceeds ${this.maxSize}`);
      throw fileTooLargeError(file.size, this.maxSize);
    }

    if ((await this.storage.count()) >= this.fileLimit) {
      console.warn(`WARN: upload rejected, file limit ${this.fileLimit} reached`);
      throw fileLimitError(this.fileLimit);
    }

    const name = await this.store(file.originalname, file.buffer);

    res.status(201).json({
      data: {
        name,
        url: `/_tmp/${encodeURIComponent(name)}`,
        size: file.size,
        mime_type: file.mimetype || "application/octet-stream",
        is_image: isImageName(name),
      },
    });
  });

  serve = asyncHandler(async (req: Request, res: Response) => {
    const name = req.params.file;
    if (name.startsWith(".") || name.includes("/") || name.includes("\\")) {
      throw notFoundError("File", name);
    }

    const buffer = await this.storage.read(name);
    if (!buffer) {
      throw notFoundError("File", name);
    }

    const ext = extensionOf(name);
    res.type(ext === "" ? "application/octet-stream" : ext);
    res.set({
      "Content-Disposition": `inline; filename="${encodeURIComponent(name)}"`,
      // Uploads share the editor's origin; never let them run script there.
      "Content-Security-Policy": "sandbox",
      "X-Content-Type-Options": "nosniff",
    });
    res.send(buffer);
  });

  private async store(original: string, buffer: Buffer): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const name = storedUploadName(original, now, attempt);
      if (await this.storage.create(name, buffer)) return name;
    }
    throw conflictError(`No free name for upload ${original}`);
  }
}
