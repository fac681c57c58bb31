import { randomInt } from "node:crypto";

const NOTE_ID_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

// No look-alike characters (0/o, 1/l/i, 6/b, 8, u/v).
export const NOTE_ID_ALPHABET = "234579abcdefghjkmnpqrstwxyz";

// Paths owned by other routes.
const RESERVED_IDS = new Set(["_health", "upload"]);

export function isValidNoteId(id: string): boolean {
  return NOTE_ID_PATTERN.test(id) && !RESERVED_IDS.has(id);
}

export function randomNoteId(length = 5): string {
  let id = "";
  for (let i = 0; i < length; i++) {
    id += NOTE_ID_ALPHABET[randomInt(NOTE_ID_ALPHABET.length)];
  }
  return id;
}
