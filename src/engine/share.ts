import type { Request } from "express";
import QRCode from "qrcode";

/** Absolute URL of a note as seen by the requesting client. */
export function noteUrl(req: Request, id: string): string {
  return `${req.protocol}://${req.get("host") ?? "localhost"}/${id}`;
}

export function qrSvg(text: string): Promise<string> {
  return QRCode.toString(text, { type: "svg", margin: 1, width: 200 });
}
