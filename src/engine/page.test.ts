import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { escapeHtml, excerpt, renderNotePage } from "./page.js";

describe("escapeHtml", () => {
  it("escapes markup and quotes", () => {
    assert.equal(
      escapeHtml(`<a href="x">'&'</a>`),
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });
});

describe("excerpt", () => {
  it("keeps short text as is", () => {
    assert.equal(excerpt("hello"), "hello");
    assert.equal(excerpt("a".repeat(150)), "a".repeat(150));
  });

  it("cuts long text and appends an ellipsis", () => {
    assert.equal(excerpt("a".repeat(151)), "a".repeat(150) + "...");
    assert.equal(excerpt("abcdef", 3), "abc...");
  });

  it("counts code points, not UTF-16 units", () => {
    const emoji = "😀".repeat(150);
    assert.equal(excerpt(emoji), emoji);
    assert.equal(excerpt("😀😀😀", 2), "😀😀...");
  });
});

describe("renderNotePage", () => {
  it("embeds the escaped note in the textarea", () => {
    const html = renderNotePage({ id: "abc", content: "<b>hi</b>" });
    assert.ok(html.includes(`autocorrect="off">&lt;b&gt;hi&lt;/b&gt;</textarea>`));
    assert.ok(html.includes("<title>webnote · abc</title>"));
    assert.ok(html.includes(`<body data-note="abc">`));
  });

  it("puts the excerpt in the description meta tag", () => {
    const html = renderNotePage({ id: "abc", content: `say "hi"` });
    assert.ok(html.includes(`<meta name="description" content="📔 say &quot;hi&quot;">`));
  });
});
