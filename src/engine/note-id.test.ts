import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { isValidNoteId, randomNoteId, NOTE_ID_ALPHABET } from "./note-id.js";

describe("isValidNoteId", () => {
  it("accepts letters, digits, dash and underscore", () => {
    assert.equal(isValidNoteId("abc"), true);
    assert.equal(isValidNoteId("My_Note-42"), true);
    assert.equal(isValidNoteId("x".repeat(64)), true);
  });

  it("rejects empty, overlong and punctuated ids", () => {
    assert.equal(isValidNoteId(""), false);
    assert.equal(isValidNoteId("x".repeat(65)), false);
    assert.equal(isValidNoteId("styles.css"), false);
    assert.equal(isValidNoteId("../etc"), false);
    assert.equal(isValidNoteId("a b"), false);
  });

  it("rejects ids owned by other routes", () => {
    assert.equal(isValidNoteId("_health"), false);
    assert.equal(isValidNoteId("upload"), false);
    assert.equal(isValidNoteId("uploads"), true);
  });
});

describe("randomNoteId", () => {
  it("defaults to five characters from the alphabet", () => {
    for (let i = 0; i < 50; i++) {
      const id = randomNoteId();
      assert.equal(id.length, 5);
      for (const ch of id) {
        assert.ok(NOTE_ID_ALPHABET.includes(ch), `unexpected character ${ch}`);
      }
      assert.equal(isValidNoteId(id), true);
    }
  });

  it("honours a custom length", () => {
    assert.equal(randomNoteId(12).length, 12);
  });
});
