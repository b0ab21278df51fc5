import fs from "node:fs";
import path from "node:path";
import { logger } from "../infra/logger";
import { CorpusUnavailable } from "./errors";
import type { SectionSchemaRegistry } from "./schema";
import type { CorpusFragment } from "./types";

const READABLE_EXTENSIONS = new Set([".md", ".txt"]);
const MARKDOWN_HEADING = /^\s{0,3}#{1,6}\s+(.+?)\s*#*\s*$/;

function isExemplarFile(filename: string): boolean {
  // Blank templates sit next to the approved plans and must not be retrieved
  return !filename.startsWith(".") && !filename.includes("Template");
}

/**
 * Split one exemplar into fragments. A heading is a Markdown heading, or a bare line
 * the registry recognises as a section title; text under unrecognised headings is dropped.
 */
export function splitExemplar(
  sourceDocumentId: string,
  content: string,
  registry: SectionSchemaRegistry
): CorpusFragment[] {
  const fragments: CorpusFragment[] = [];
  let topic: string | null = null;
  let buffer: string[] = [];

  const flush = () => {
    const text = buffer.join("\n").trim();
    if (topic && text) fragments.push({ sourceDocumentId, sectionTopic: topic, text });
    buffer = [];
  };

  for (const line of content.replace(/\r\n/g, "\n").split("\n")) {
    const md = line.match(MARKDOWN_HEADING);
    const bare = md ? null : bareHeadingTopic(line, registry);

    if (md?.[1]) {
      flush();
      topic = registry.matchTopic(md[1]);
    } else if (bare) {
      flush();
      topic = bare;
    } else {
      buffer.push(line);
    }
  }
  flush();
  return fragments;
}

/** A bare line is a heading only when, numbering and colon aside, it is exactly a section title or alias. */
function bareHeadingTopic(line: string, registry: SectionSchemaRegistry): string | null {
  const clean = line
    .trim()
    .replace(/^(?:\d+(?:\.\d+)*\.?\s+)/, "")
    .replace(/:\s*$/, "")
    .toLowerCase();
  if (!clean || clean.length > 80) return null;
  for (const spec of registry.documentOrder()) {
    const names = [spec.title, ...spec.aliases].map((n) => n.toLowerCase());
    if (names.includes(clean)) return spec.sectionId;
  }
  return null;
}

/**
 * Load every exemplar plan under `dir` once. Files are read in name order so fragment
 * load order (the retrieval tie-break) is stable across runs.
 */
export function loadCorpus(dir: string, registry: SectionSchemaRegistry): readonly CorpusFragment[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new CorpusUnavailable(dir, "directory not found");
  }

  const fragments: CorpusFragment[] = [];
  let documents = 0;

  for (const filename of fs.readdirSync(dir).sort()) {
    if (!isExemplarFile(filename)) continue;
    const filePath = path.join(dir, filename);
    if (!fs.statSync(filePath).isFile()) continue;

    const ext = path.extname(filename).toLowerCase();
    if (!READABLE_EXTENSIONS.has(ext)) {
      logger.warn("skipping exemplar with unsupported file type", { file: filename });
      continue;
    }

    const content = fs.readFileSync(filePath, "utf8");
    if (!content.trim()) continue;
    documents++;
    fragments.push(...splitExemplar(filename, content, registry));
  }

  if (documents === 0) {
    throw new CorpusUnavailable(dir, "no readable exemplar documents");
  }

  logger.info("reference corpus loaded", { dir, documents, fragments: fragments.length });
  return Object.freeze(fragments.map((f) => Object.freeze(f)));
}
