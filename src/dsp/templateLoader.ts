import fs from "node:fs";
import path from "node:path";
import { logger } from "../infra/logger";

export const TEMPLATE_DIR = path.resolve(__dirname, "../../templates");

function checkTemplatePath(filePath: string, name: string): void {
  if (!fs.existsSync(filePath)) {
    logger.error(`Template file not found: ${name}`, {
      path: filePath,
      templateDir: TEMPLATE_DIR,
      cwd: process.cwd(),
    });
    throw new Error(`Template file not found: ${name} at ${filePath}`);
  }
}

function loadTemplateFile(name: string, dir: string): string {
  const p = path.join(dir, name);
  checkTemplatePath(p, name);
  return fs.readFileSync(p, "utf8");
}

export function loadReportHtml(dir: string = TEMPLATE_DIR): string {
  return loadTemplateFile("dsp-report.html", dir);
}

export function loadReportCss(dir: string = TEMPLATE_DIR): string {
  return loadTemplateFile("styles.css", dir);
}
