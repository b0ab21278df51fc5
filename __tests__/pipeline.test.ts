import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { persistRunArtifacts } from "../src/dsp/artifacts";
import { projectSlug, runDspPipeline } from "../src/dsp/pipeline";
import type { GenerateOptions, GenerateResult } from "../src/dsp/types";
import { InMemoryArtifactStore, reply, ScriptedClient, section, sectionOf } from "./helpers/fakes";

const SECTIONS_YAML = `sections:
  - id: overview
    title: Overview
    ordinal: 1
    instructions: Describe the project.
    fields:
      - name: body
        type: markdown
        rule: { min_length: 10 }
  - id: storage
    title: Storage
    ordinal: 2
    depends_on: [overview]
    instructions: Describe where the data is stored.
    fields:
      - name: body
        type: markdown
        rule: { min_length: 10 }
`;

const EXEMPLAR = `# Overview
The lab studies anonymised survey responses from partner clinics.

# Storage
Data sits on an encrypted server in a locked room.
`;

const OPTIONS: GenerateOptions = {
  maxConcurrency: 2,
  retrievalK: 2,
  retryLimit: 0,
  allowPartialOutput: true,
  cancelGraceMs: 0,
};

const noSleep = { sleep: async () => undefined };

describe("runDspPipeline", () => {
  let root: string;
  let corpusDir: string;
  let outputDir: string;
  let sectionsPath: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "dsp-pipeline-"));
    corpusDir = path.join(root, "corpus");
    outputDir = path.join(root, "out");
    sectionsPath = path.join(root, "sections.yaml");
    await fs.mkdir(corpusDir);
    await fs.writeFile(path.join(corpusDir, "approved_plan.md"), EXEMPLAR, "utf8");
    await fs.writeFile(sectionsPath, SECTIONS_YAML, "utf8");
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("names the project from extracted metadata and writes every output file", async () => {
    const client = new ScriptedClient((prompt) =>
      prompt.stage === "METADATA_EXTRACT"
        ? reply({ projectName: "Genome Study", piName: "Dr. Test" })
        : reply({ body: `Generated text for ${sectionOf(prompt)}.` })
    );
    const store = new InMemoryArtifactStore();

    const result = await runDspPipeline({
      runId: "run-1",
      summary: { text: "A study of anonymised survey responses." },
      options: OPTIONS,
      client,
      corpusDir,
      outputDir,
      sectionsPath,
      store,
      retry: noSleep,
      now: () => new Date("2026-01-02T03:04:05.000Z"),
    });

    expect(result.status).toBe("complete");
    expect(result.document.metadata.projectName).toBe("Genome Study");
    expect(client.stagesCalled()).toEqual(["METADATA_EXTRACT", "section:overview", "section:storage"]);
    expect(client.callsFor("overview")[0]?.text).toContain("PI: Dr. Test");

    const dir = path.join(outputDir, "Genome_Study");
    expect(result.files).toEqual({
      pdf: path.join(dir, "Genome_Study_DSP.pdf"),
      html: path.join(dir, "Genome_Study_DSP.html"),
      markdown: path.join(dir, "Genome_Study_DSP.md"),
      log: path.join(dir, "Genome_Study_generation_log.json"),
    });
    const markdown = await fs.readFile(result.files.markdown, "utf8");
    expect(markdown.split("\n")[0]).toBe("# Data Security Plan: Genome Study");
    expect(markdown.split("\n")[1]).toBe("Generated: 2026-01-02T03:04:05.000Z");
    const pdf = await fs.readFile(result.files.pdf);
    expect(pdf.subarray(0, 8).toString("latin1")).toBe("%PDF-1.4");

    expect(await store.list("run-1")).toEqual(["document", "section_overview", "section_storage"]);
  });

  it("keeps the caller's project name and records failed sections", async () => {
    const client = new ScriptedClient((prompt) =>
      sectionOf(prompt) === "storage" ? { rawText: "not json", finishReason: "stop" } : reply({ body: "Overview body text." })
    );
    const store = new InMemoryArtifactStore();

    const result = await runDspPipeline({
      runId: "run-2",
      summary: { text: "A study of anonymised survey responses.", projectName: "Survey Study" },
      options: OPTIONS,
      client,
      corpusDir,
      outputDir,
      sectionsPath,
      extractMetadata: false,
      store,
      retry: noSleep,
    });

    expect(result.status).toBe("partial");
    expect(result.failures.map((f) => f.sectionId)).toEqual(["storage"]);
    expect(client.stagesCalled()).toEqual(["section:overview", "section:storage"]);
    expect(result.files.markdown).toBe(path.join(outputDir, "Survey_Study", "Survey_Study_DSP.md"));
    expect(await store.list("run-2")).toEqual(["document", "error_storage", "section_overview", "section_storage"]);
    expect((await store.read("run-2", "error_storage"))?.payload).toEqual({
      error: result.failures[0]?.reason,
      rawSnippet: "not json",
    });
  });

  it("fails the run without calling the model when the corpus is missing", async () => {
    const client = new ScriptedClient(() => reply({ body: "unused body text" }));
    const store = new InMemoryArtifactStore();

    const result = await runDspPipeline({
      runId: "run-3",
      summary: { text: "A study.", projectName: "Lost Corpus" },
      options: OPTIONS,
      client,
      corpusDir: path.join(root, "missing"),
      outputDir,
      sectionsPath,
      extractMetadata: false,
      store,
    });

    expect(result.status).toBe("failed");
    expect(client.calls).toHaveLength(0);
    expect(result.document.sections.map((s) => s.status)).toEqual(["not_attempted", "not_attempted"]);
    expect(await store.list("run-3")).toEqual(["document", "error_run", "section_overview", "section_storage"]);
  });

  it("rejects a cyclic schema before the metadata call", async () => {
    await fs.writeFile(
      sectionsPath,
      SECTIONS_YAML.replace("    instructions: Describe the project.", "    depends_on: [storage]\n    instructions: Describe the project."),
      "utf8"
    );
    const client = new ScriptedClient(() => reply({ projectName: "Never Called" }));

    const result = await runDspPipeline({
      runId: "run-4",
      summary: { text: "A study of anonymised survey responses.", projectName: "Cycle Study" },
      options: OPTIONS,
      client,
      corpusDir,
      outputDir,
      sectionsPath,
      retry: noSleep,
    });

    expect(result.status).toBe("failed");
    expect(result.abortReason).toBe("Section dependency cycle: overview -> storage -> overview");
    expect(client.calls).toHaveLength(0);
  });

  it("checks the corpus before the metadata call", async () => {
    const client = new ScriptedClient(() => reply({ projectName: "Never Called" }));

    const result = await runDspPipeline({
      runId: "run-5",
      summary: { text: "A study.", projectName: "Lost Corpus" },
      options: OPTIONS,
      client,
      corpusDir: path.join(root, "missing"),
      outputDir,
      sectionsPath,
      retry: noSleep,
    });

    expect(result.status).toBe("failed");
    expect(client.calls).toHaveLength(0);
  });

  it("lets caller metadata win over extracted facts", async () => {
    const client = new ScriptedClient((prompt) =>
      prompt.stage === "METADATA_EXTRACT"
        ? reply({ piName: "Dr. Extracted", department: "Genomics" })
        : reply({ body: `Generated text for ${sectionOf(prompt)}.` })
    );

    await runDspPipeline({
      runId: "run-6",
      summary: { text: "A study of anonymised survey responses.", projectName: "Override Study" },
      options: OPTIONS,
      client,
      corpusDir,
      outputDir,
      sectionsPath,
      metadata: { piName: "Dr. Test", isCui: true },
      retry: noSleep,
    });

    const prompt = client.callsFor("overview")[0]?.text ?? "";
    expect(prompt).toContain("PI: Dr. Test\n");
    expect(prompt).toContain("Department: Genomics\n");
    expect(prompt).toContain("CUI: Yes\n");
  });
});

describe("persistRunArtifacts", () => {
  it("stores the run summary alongside each section", async () => {
    const store = new InMemoryArtifactStore();
    const spec = section("overview", 1);
    const result: GenerateResult = {
      status: "complete",
      failures: [],
      document: {
        metadata: { projectName: "P", generatedAt: "2026-01-01T00:00:00.000Z", model: "fake/test-model", promptVersion: "v" },
        sections: [
          {
            sectionId: spec.sectionId,
            title: spec.title,
            ordinal: 1,
            status: "valid",
            validationStatus: { kind: "valid" },
            structuredFields: { body: "Overview body text." },
            rawText: "{}",
            attempts: 1,
            retrievedFrom: [],
          },
        ],
      },
    };

    await persistRunArtifacts(store, "run-9", result);

    expect(await store.list("run-9")).toEqual(["document", "section_overview"]);
    expect((await store.read("run-9", "document"))?.payload).toEqual({
      status: "complete",
      abortReason: null,
      failures: [],
      document: result.document,
    });
  });
});

describe("projectSlug", () => {
  it("keeps letters and digits only", () => {
    expect(projectSlug("  Genome Study (2026)! ")).toBe("Genome_Study_2026");
    expect(projectSlug("***")).toBe("Untitled_Project");
  });
});
