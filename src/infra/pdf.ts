const PAGE_WIDTH = 595;
const PAGE_HEIGHT = 842;
const TOP_Y = 790;
const BOTTOM_Y = 40;
const LINE_HEIGHT = 14;

/** Lines that fit between the top baseline and the bottom margin. */
export const LINES_PER_PAGE = Math.floor((TOP_Y - BOTTOM_Y) / LINE_HEIGHT) + 1;

function escapePdfText(input: string): string {
  return input
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, "-")
    .replace(/…/g, "...")
    .replace(/•/g, "-")
    .replace(/[^\x20-\x7e\n\r]/g, "?")
    .replace(/\\/g, "\\\\")
    .replace(/\(/g, "\\(")
    .replace(/\)/g, "\\)")
    .replace(/\r/g, "")
    .replace(/\n/g, " ");
}

/**
 * Wrap text to fit within PDF page width.
 * Usable width is ~515 points; 10pt Helvetica averages ~6 points per char, so 80 chars.
 */
export function wrapText(text: string, maxWidth: number = 80): string[] {
  if (text.length <= maxWidth) {
    return [text];
  }

  const indent = text.match(/^\s*/)?.[0] ?? "";
  const words = text.trim().split(/\s+/);
  const wrapped: string[] = [];
  let currentLine = "";

  for (const word of words) {
    if (word.length > maxWidth) {
      if (currentLine) {
        wrapped.push(currentLine.trimEnd());
        currentLine = "";
      }
      for (let i = 0; i < word.length; i += maxWidth) {
        wrapped.push(word.slice(i, i + maxWidth));
      }
      continue;
    }

    const testLine = currentLine ? `${currentLine} ${word}` : `${wrapped.length === 0 ? indent : indent + "  "}${word}`;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) {
        wrapped.push(currentLine.trimEnd());
      }
      currentLine = `${indent}  ${word}`;
    }
  }

  if (currentLine) {
    wrapped.push(currentLine.trimEnd());
  }

  return wrapped.length > 0 ? wrapped : [text];
}

/** Wrap every line, then cut the result into page-sized chunks. */
export function paginateLines(lines: string[]): string[][] {
  const flat = lines.flatMap((line) => wrapText(line));
  const pages: string[][] = [];
  for (let i = 0; i < flat.length; i += LINES_PER_PAGE) {
    pages.push(flat.slice(i, i + LINES_PER_PAGE));
  }
  return pages.length > 0 ? pages : [[]];
}

function buildPageContent(lines: string[], pageNo: number, pageCount: number): string {
  let y = TOP_Y;
  const content: string[] = ["BT", "/F1 10 Tf"];
  for (const line of lines) {
    content.push(`1 0 0 1 40 ${y} Tm (${escapePdfText(line)}) Tj`);
    y -= LINE_HEIGHT;
  }
  content.push("/F1 8 Tf", `1 0 0 1 ${PAGE_WIDTH - 100} 20 Tm (Page ${pageNo} of ${pageCount}) Tj`);
  content.push("ET");
  return content.join("\n");
}

function pushObject(chunks: string[], offsets: number[], objNo: number, body: string): void {
  offsets[objNo] = Buffer.byteLength(chunks.join(""), "utf8");
  chunks.push(`${objNo} 0 obj\n${body}\nendobj\n`);
}

/**
 * Minimal multi-page PDF with the built-in Helvetica font.
 * Objects: 1 catalog, 2 page tree, 3 font, then a page and content stream per page.
 */
export function buildPdf(lines: string[]): Buffer {
  const pages = paginateLines(lines);
  const pdfChunks: string[] = [];
  const offsets: number[] = [];
  pdfChunks.push("%PDF-1.4\n");

  const pageObj = (i: number) => 4 + i * 2;
  const kids = pages.map((_, i) => `${pageObj(i)} 0 R`).join(" ");

  pushObject(pdfChunks, offsets, 1, "<< /Type /Catalog /Pages 2 0 R >>");
  pushObject(pdfChunks, offsets, 2, `<< /Type /Pages /Kids [${kids}] /Count ${pages.length} >>`);
  pushObject(pdfChunks, offsets, 3, "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>");

  pages.forEach((pageLines, i) => {
    const contentNo = pageObj(i) + 1;
    pushObject(
      pdfChunks,
      offsets,
      pageObj(i),
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 ${PAGE_WIDTH} ${PAGE_HEIGHT}] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentNo} 0 R >>`
    );
    const stream = buildPageContent(pageLines, i + 1, pages.length);
    pushObject(pdfChunks, offsets, contentNo, `<< /Length ${Buffer.byteLength(stream, "utf8")} >>\nstream\n${stream}\nendstream`);
  });

  const size = 4 + pages.length * 2;
  const xrefStart = Buffer.byteLength(pdfChunks.join(""), "utf8");
  pdfChunks.push(`xref\n0 ${size}\n0000000000 65535 f \n`);
  for (let i = 1; i < size; i++) {
    const off = offsets[i] ?? 0;
    pdfChunks.push(`${String(off).padStart(10, "0")} 00000 n \n`);
  }
  pdfChunks.push(`trailer\n<< /Size ${size} /Root 1 0 R >>\n`);
  pdfChunks.push(`startxref\n${xrefStart}\n%%EOF\n`);

  return Buffer.from(pdfChunks.join(""), "utf8");
}
