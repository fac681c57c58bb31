import path from "node:path";

const IMAGE_EXTENSIONS = new Set(["png", "jpg", "jpeg", "gif", "webp", "bmp", "svg"]);

/** Lower-cased extension without the dot, or "" when there is none. */
export function extensionOf(name: string): string {
  return path.extname(name).slice(1).toLowerCase();
}

export function isImageName(name: string): boolean {
  return IMAGE_EXTENSIONS.has(extensionOf(name));
}

/**
 * Reduces a client-supplied file name to a single safe path segment:
 * reserved and control characters become "_", leading dots are dropped.
 */
export function sanitizeFilename(name: string): string {
  const cleaned = name
    .replace(/[\\/:*?"<>|\u0000-\u001f\u007f]/g, "_")
    .replace(/^\.+/, "")
    .trim();
  return cleaned === "" ? "file" : cleaned;
}

/** Stored name for an upload; `attempt` > 0 disambiguates a taken name. */
export function storedUploadName(original: string, unixSeconds: number, attempt = 0): string {
  const stamp = attempt === 0 ? `${unixSeconds}` : `${unixSeconds}-${attempt}`;
  return `${stamp}_${sanitizeFilename(original)}`;
}
