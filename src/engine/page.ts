const EXCERPT_LENGTH = 150;

export interface NotePageView {
  id: string;
  content: string;
}

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** First `length` code points of the text, with "..." appended when cut. */
export function excerpt(text: string, length = EXCERPT_LENGTH): string {
  const chars = Array.from(text);
  if (chars.length <= length) return text;
  return chars.slice(0, length).join("") + "...";
}

export function renderNotePage(view: NotePageView): string {
  const id = escapeHtml(view.id);
  const description = escapeHtml(excerpt(view.content));
  const content = escapeHtml(view.content);

  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>webnote · ${id}</title>
    <link rel="icon" href="/favicon.svg" type="image/svg+xml">
    <link rel="stylesheet" href="/styles.css">
    <meta name="description" content="📔 ${description}">
    <script src="/js/marked.min.js"></script>
    <script src="/js/purify.min.js"></script>
</head>
<body data-note="${id}">
    <div id="sidebar" class="sidebar">
        <span class="close-btn" id="closeSidebar">&times;</span>
        <h3>Recent Notes</h3>
        <ul id="history-list"></ul>
    </div>
    <div class="container">
        <textarea id="content" spellcheck="false" autocapitalize="off" autocomplete="off" autocorrect="off">${content}</textarea>
        <button id="copy" class="btn" title="Copy to clipboard">⧉</button>
        <div id="markdown-content" style="display: none"></div>
        <div class="link">
            <a href="/">💡 new</a>
            <a href="#" id="renderMarkdown">note/${id} <span id="renderStatus">🔓</span></a>
            <a href="/${id}?raw" id="rawLink">📄 raw</a>
            <a href="#" id="showQRCode">🔗 share</a>
            <a href="#" id="showHistory">📜 history</a>
            <a href="#" id="uploadTrigger">⤴ upload</a>
        </div>
        <div id="notification" class="notification"></div>
        <div id="qrcodePopup" class="qrcode-popup" style="display: none">
            <img id="qrcode" alt="QR code for this note" width="200" height="200">
        </div>
    </div>
    <input type="file" id="fileInput" style="display: none">
    <script src="/history.js"></script>
    <script src="/script.js"></script>
</body>
</html>
`;
}
