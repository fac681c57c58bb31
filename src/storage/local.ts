import fsp from "node:fs/promises";
import path from "node:path";
import { hasErrorCode } from "../engine/errors.js";
import type { FileStorage } from "./storage.js";

/** Local filesystem storage: one flat directory, one file per name. */
export class LocalStorage implements FileStorage {
  constructor(private basePath: string) {}

  async init(): Promise<void> {
    await fsp.mkdir(this.basePath, { recursive: true });
  }

  async read(name: string): Promise<Buffer | null> {
    try {
      return await fsp.readFile(this.resolve(name));
    } catch (err) {
      if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "EISDIR")) return null;
      throw err;
    }
  }

  async write(name: string, data: Buffer): Promise<void> {
    await fsp.writeFile(this.resolve(name), data);
  }

  async create(name: string, data: Buffer): Promise<boolean> {
    try {
      await fsp.writeFile(this.resolve(name), data, { flag: "wx" });
      return true;
    } catch (err) {
      if (hasErrorCode(err, "EEXIST")) return false;
      throw err;
    }
  }

  async remove(name: string): Promise<void> {
    try {
      await fsp.unlink(this.resolve(name));
    } catch (err) {
      if (!hasErrorCode(err, "ENOENT")) throw err;
    }
  }

  async exists(name: string): Promise<boolean> {
    try {
      const stat = await fsp.stat(this.resolve(name));
      return stat.isFile();
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) return false;
      throw err;
    }
  }

  async count(): Promise<number> {
    const entries = await fsp.readdir(this.basePath, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).length;
  }

  private resolve(name: string): string {
    if (name === "" || name.startsWith(".") || path.basename(name) !== name || name.includes("\\")) {
      throw new Error(`Invalid storage name: ${JSON.stringify(name)}`);
    }
    return path.join(this.basePath, name);
  }
}
