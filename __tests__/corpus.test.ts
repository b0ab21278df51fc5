import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadCorpus, splitExemplar } from "../src/dsp/corpus";
import { CorpusUnavailable } from "../src/dsp/errors";
import { SectionSchemaRegistry } from "../src/dsp/schema";
import { section } from "./helpers/fakes";

const registry = new SectionSchemaRegistry([
  section("project_overview", 1, [], { title: "Project Overview" }),
  section("data_storage", 2, [], { title: "Data Storage", aliases: ["Infrastructure"] }),
]);

const PLAN = [
  "# Data Security Plan",
  "",
  "Intro text that belongs to no section.",
  "",
  "## 1. Project Overview",
  "We study genomes.",
  "",
  "## Budget",
  "Money text.",
  "",
  "Data Storage:",
  "Stored on an encrypted server.",
].join("\n");

describe("splitExemplar", () => {
  it("splits on markdown and bare title headings and drops unknown sections", () => {
    expect(splitExemplar("a_plan.md", PLAN, registry)).toEqual([
      { sourceDocumentId: "a_plan.md", sectionTopic: "project_overview", text: "We study genomes." },
      { sourceDocumentId: "a_plan.md", sectionTopic: "data_storage", text: "Stored on an encrypted server." },
    ]);
  });
});

describe("loadCorpus", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dsp-corpus-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads exemplars in file name order and skips templates, dotfiles and other types", () => {
    fs.writeFileSync(path.join(dir, "a_plan.md"), PLAN);
    fs.writeFileSync(path.join(dir, "b_plan.txt"), "INFRASTRUCTURE\nCluster nodes.\n");
    fs.writeFileSync(path.join(dir, "DSP_Template.md"), "## Project Overview\n[fill in]\n");
    fs.writeFileSync(path.join(dir, ".hidden.md"), "## Project Overview\nsecret\n");
    fs.writeFileSync(path.join(dir, "notes.pdf"), "%PDF");
    fs.writeFileSync(path.join(dir, "empty.md"), "   \n");

    const corpus = loadCorpus(dir, registry);

    expect(corpus.map((f) => [f.sourceDocumentId, f.sectionTopic, f.text])).toEqual([
      ["a_plan.md", "project_overview", "We study genomes."],
      ["a_plan.md", "data_storage", "Stored on an encrypted server."],
      ["b_plan.txt", "data_storage", "Cluster nodes."],
    ]);
    expect(Object.isFrozen(corpus)).toBe(true);
    expect(Object.isFrozen(corpus[0])).toBe(true);
  });

  it("fails when the directory is missing", () => {
    const missing = path.join(dir, "nope");
    expect(() => loadCorpus(missing, registry)).toThrow(CorpusUnavailable);
    expect(() => loadCorpus(missing, registry)).toThrow(`Reference corpus unavailable at ${missing}: directory not found`);
  });

  it("fails when no exemplar document is readable", () => {
    fs.writeFileSync(path.join(dir, "DSP_Template.md"), "## Project Overview\n");
    expect(() => loadCorpus(dir, registry)).toThrow(`Reference corpus unavailable at ${dir}: no readable exemplar documents`);
  });
});
