export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function inline(text: string): string {
  return escapeHtml(text).replace(/\*\*(.+?)\*\*/g, "<strong>$1</strong>");
}

const BULLET = /^\s*[-*]\s+(.*)$/;
const HEADING = /^(#{1,6})\s+(.*?)\s*#*$/;

/**
 * Render the Markdown subset model output uses: paragraphs, `-`/`*` bullet lists,
 * `#` headings and bold. Heading levels are shifted by `headingOffset`.
 */
export function markdownToHtml(markdown: string, headingOffset = 2): string {
  const out: string[] = [];
  let paragraph: string[] = [];
  let list: string[] = [];

  const flushParagraph = () => {
    if (paragraph.length > 0) out.push(`<p>${inline(paragraph.join(" "))}</p>`);
    paragraph = [];
  };
  const flushList = () => {
    if (list.length > 0) out.push(`<ul>\n${list.map((item) => `<li>${inline(item)}</li>`).join("\n")}\n</ul>`);
    list = [];
  };

  for (const line of markdown.replace(/\r\n/g, "\n").split("\n")) {
    const heading = line.match(HEADING);
    const bullet = line.match(BULLET);
    if (!line.trim()) {
      flushParagraph();
      flushList();
    } else if (heading?.[1] && heading[2] !== undefined) {
      flushParagraph();
      flushList();
      const level = Math.min(6, heading[1].length + headingOffset);
      out.push(`<h${level}>${inline(heading[2])}</h${level}>`);
    } else if (bullet?.[1] !== undefined) {
      flushParagraph();
      list.push(bullet[1].trim());
    } else {
      flushList();
      paragraph.push(line.trim());
    }
  }
  flushParagraph();
  flushList();
  return out.join("\n");
}

/** Strip Markdown markers for plain-text output such as the PDF. */
export function markdownToPlainLines(markdown: string): string[] {
  return markdown
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((line) =>
      line
        .replace(HEADING, (_m, _hashes: string, text: string) => text.toUpperCase())
        .replace(/^\s*[-*]\s+/, (m) => m.replace(/[-*]/, "•"))
        .replace(/\*\*(.+?)\*\*/g, "$1")
        .replace(/^>\s?/, "")
    );
}
