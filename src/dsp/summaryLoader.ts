import fs from "node:fs";
import path from "node:path";
import { SummaryNotFound } from "./errors";
import type { ProjectSummary } from "./types";

export type SummaryLoaderOptions = {
  projectsDir?: string;
  readStdin?: () => Promise<string>;
  /** Accept "-" and file paths. Off for identifiers from untrusted callers. Defaults to true. */
  allowPaths?: boolean;
};

/** Folder names under the projects directory; no separators, no dot segments. */
export const PROJECT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function isFile(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isFile();
}

/**
 * Resolve a project summary from, in order: "-" (stdin), a file path,
 * `<projectsDir>/<name>/Summary.md`, or raw multi-word text. With `allowPaths: false`
 * only the last two apply.
 */
export async function loadProjectSummary(
  identifier: string,
  options: SummaryLoaderOptions = {}
): Promise<ProjectSummary> {
  const id = identifier.trim();
  if (!id) throw new SummaryNotFound(identifier);
  const allowPaths = options.allowPaths ?? true;

  if (allowPaths && id === "-") {
    const text = (await (options.readStdin ?? readAllStdin)()).trim();
    if (!text) throw new SummaryNotFound("stdin");
    return { text };
  }

  if (allowPaths && isFile(id)) {
    const text = fs.readFileSync(id, "utf8").trim();
    if (!text) throw new SummaryNotFound(id);
    const base = path.basename(id, path.extname(id));
    return { text, projectName: base.toLowerCase() === "summary" ? path.basename(path.dirname(path.resolve(id))) : base };
  }

  if (PROJECT_NAME_PATTERN.test(id)) {
    const conventional = path.join(options.projectsDir ?? "projects", id, "Summary.md");
    if (isFile(conventional)) {
      const text = fs.readFileSync(conventional, "utf8").trim();
      if (!text) throw new SummaryNotFound(conventional);
      return { text, projectName: id };
    }
  }

  // Raw summaries are prose; a single token is a name we failed to resolve
  if (/\s/.test(id) && id.split(/\s+/).length >= 3) {
    return { text: id };
  }

  throw new SummaryNotFound(identifier);
}
