import { describe, it, expect } from "vitest";
import { DEFAULT_GENERATE_OPTIONS, generate, isDocumentComplete, type GenerateDeps } from "../src/dsp/assembler";
import { loadCorpus } from "../src/dsp/corpus";
import { PROMPT_VERSION_STRING } from "../src/dsp/prompts";
import type { CorpusFragment, GenerateOptions, SectionResult, SectionSpec } from "../src/dsp/types";
import { FatalFailure, TransientFailure } from "../src/llm/errors";
import type { GenerationPrompt, GenerationResponse } from "../src/llm/types";
import { reply, ScriptedClient, section, sectionOf } from "./helpers/fakes";

const summary = { text: "Genomic sequencing study on an encrypted workstation.", projectName: "Genome Study" };
const GENERATED_AT = "2026-01-02T03:04:05.000Z";
const SHORT_REASON = 'invalid after repair: field "body" violates minLength:10';

const corpus: CorpusFragment[] = [
  { sourceDocumentId: "doc1.md", sectionTopic: "a", text: "Approved genomic wording." },
  { sourceDocumentId: "doc2.md", sectionTopic: "b", text: "Approved storage wording." },
];

function options(overrides: Partial<GenerateOptions> = {}): GenerateOptions {
  return { ...DEFAULT_GENERATE_OPTIONS, retrievalK: 2, maxConcurrency: 1, cancelGraceMs: 1000, ...overrides };
}

function deps(client: ScriptedClient, sections: SectionSpec[], overrides: Partial<GenerateDeps> = {}): GenerateDeps {
  return {
    client,
    sections,
    corpus,
    now: () => new Date(GENERATED_AT),
    retry: { sleep: async () => undefined, random: () => 0 },
    ...overrides,
  };
}

const good = (prompt: GenerationPrompt): GenerationResponse => reply({ body: `Valid content for ${sectionOf(prompt)}.` });

/** Answers every section validly except the listed ones, which always answer too short. */
const failing =
  (...ids: string[]) =>
  (prompt: GenerationPrompt): GenerationResponse =>
    ids.includes(sectionOf(prompt)) ? reply({ body: "short" }) : good(prompt);

const statuses = (sections: SectionResult[]) => sections.map((s) => [s.sectionId, s.status]);
const abc = () => [section("a", 1), section("b", 2), section("c", 3)];

describe("generate", () => {
  it("completes when every section validates", async () => {
    const client = new ScriptedClient(good);
    const result = await generate(summary, options(), deps(client, abc()));

    expect(result.status).toBe("complete");
    expect(result.failures).toEqual([]);
    expect(result.document.metadata).toEqual({
      projectName: "Genome Study",
      generatedAt: GENERATED_AT,
      model: "fake/test-model",
      promptVersion: PROMPT_VERSION_STRING,
    });
    expect(statuses(result.document.sections)).toEqual([
      ["a", "valid"],
      ["b", "valid"],
      ["c", "valid"],
    ]);
    expect(result.document.sections[0]?.retrievedFrom).toEqual(["doc1.md"]);
    expect(result.document.sections[2]?.retrievedFrom).toEqual([]);
    expect(isDocumentComplete(result.document)).toBe(true);
  });

  it("returns a partial document when one section fails validation", async () => {
    const client = new ScriptedClient(failing("b"));
    const result = await generate(summary, options(), deps(client, abc()));

    expect(result.status).toBe("partial");
    expect(statuses(result.document.sections)).toEqual([
      ["a", "valid"],
      ["b", "failed"],
      ["c", "valid"],
    ]);
    expect(result.failures).toEqual([{ sectionId: "b", status: "failed", reason: SHORT_REASON }]);
    expect(result.document.sections[1]).toMatchObject({
      attempts: 2,
      structuredFields: {},
      validationStatus: { kind: "constraint_violation", field: "body", rule: "minLength:10" },
    });
    expect(client.callsFor("b")).toHaveLength(2);
    expect(isDocumentComplete(result.document)).toBe(false);
  });

  it("retries transient adapter failures inside a section", async () => {
    let failuresLeft = 2;
    const client = new ScriptedClient((prompt) => {
      if (sectionOf(prompt) === "a" && failuresLeft-- > 0) {
        throw new TransientFailure("server_error", "upstream 503", { status: 503 });
      }
      return good(prompt);
    });
    const result = await generate(summary, options({ retryLimit: 3 }), deps(client, abc()));

    expect(result.status).toBe("complete");
    expect(client.callsFor("a")).toHaveLength(3);
    expect(result.document.sections[0]?.attempts).toBe(1);
  });

  it("fails before any generation call on a dependency cycle", async () => {
    const client = new ScriptedClient(good);
    const result = await generate(
      summary,
      options(),
      deps(client, [section("b", 2, ["a"]), section("a", 1, ["b"])])
    );

    expect(result.status).toBe("failed");
    expect(client.calls).toHaveLength(0);
    expect(result.abortReason).toBe("Section dependency cycle: a -> b -> a");
    expect(statuses(result.document.sections)).toEqual([
      ["a", "not_attempted"],
      ["b", "not_attempted"],
    ]);
  });

  it("fails before any generation call when the corpus is unavailable", async () => {
    const client = new ScriptedClient(good);
    const missing = "/nonexistent/dsp-corpus";
    const result = await generate(
      summary,
      options(),
      deps(client, abc(), {
        corpus: (registry) => loadCorpus(missing, registry),
      })
    );

    expect(result.status).toBe("failed");
    expect(result.abortReason).toBe(`Reference corpus unavailable at ${missing}: directory not found`);
    expect(client.calls).toHaveLength(0);
  });

  it("skips every transitive dependent of a failed section", async () => {
    const client = new ScriptedClient(failing("a"));
    const sections = [section("a", 1), section("b", 2, ["a"]), section("c", 3, ["b"]), section("d", 4)];
    const result = await generate(summary, options({ maxConcurrency: 2 }), deps(client, sections));

    expect(result.status).toBe("partial");
    expect(statuses(result.document.sections)).toEqual([
      ["a", "failed"],
      ["b", "skipped_dependency_failed"],
      ["c", "skipped_dependency_failed"],
      ["d", "valid"],
    ]);
    expect(result.document.sections[1]?.reason).toBe(`depends on section "a", which failed: ${SHORT_REASON}`);
    expect(client.callsFor("b")).toHaveLength(0);
    expect(client.callsFor("c")).toHaveLength(0);
  });

  it("feeds facts of completed dependencies into later sections", async () => {
    const client = new ScriptedClient(good);
    const sections = [section("a", 1, [], { title: "A", digestFields: ["body"] }), section("b", 2, ["a"])];
    await generate(summary, options(), deps(client, sections));

    expect(client.callsFor("b")[0]?.text).toContain("[A]\n- body: Valid content for a.");
  });

  it("never runs more than maxConcurrency generation calls at once", async () => {
    const client = new ScriptedClient(async (prompt) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return good(prompt);
    });
    const sections = ["a", "b", "c", "d", "e"].map((id, i) => section(id, i + 1));
    const result = await generate(summary, options({ maxConcurrency: 2 }), deps(client, sections));

    expect(result.status).toBe("complete");
    expect(client.maxInFlight).toBe(2);
  });

  it("aborts on the first failure when partial output is disabled", async () => {
    const client = new ScriptedClient(failing("a"));
    const result = await generate(summary, options({ allowPartialOutput: false }), deps(client, abc()));

    const reason = 'section "a" failed and partial output is disabled';
    expect(result.status).toBe("failed");
    expect(result.abortReason).toBe(reason);
    expect(statuses(result.document.sections)).toEqual([
      ["a", "failed"],
      ["b", "not_attempted"],
      ["c", "not_attempted"],
    ]);
    expect(result.document.sections[1]?.reason).toBe(reason);
    expect(client.callsFor("b")).toHaveLength(0);
  });

  it("aborts the run on a systemic adapter failure", async () => {
    const client = new ScriptedClient(() => {
      throw new FatalFailure("authentication", "bad key", { status: 401 });
    });
    const result = await generate(summary, options(), deps(client, abc()));

    expect(result.status).toBe("failed");
    expect(result.abortReason).toBe('systemic generation failure in "a": bad key');
    expect(result.document.sections[0]).toMatchObject({ status: "failed", reason: "authentication: bad key", attempts: 1 });
    expect(statuses(result.document.sections).slice(1)).toEqual([
      ["b", "not_attempted"],
      ["c", "not_attempted"],
    ]);
    expect(client.calls).toHaveLength(1);
  });

  it("keeps going after a section-local fatal failure", async () => {
    const client = new ScriptedClient((prompt) => {
      if (sectionOf(prompt) === "b") throw new FatalFailure("content_policy", "blocked");
      return good(prompt);
    });
    const result = await generate(summary, options(), deps(client, abc()));

    expect(result.status).toBe("partial");
    expect(result.failures).toEqual([{ sectionId: "b", status: "failed", reason: "content_policy: blocked" }]);
  });

  it("records two attempts when the repair call fails", async () => {
    const client = new ScriptedClient((prompt) => {
      if (sectionOf(prompt) !== "b") return good(prompt);
      if (client.callsFor("b").length === 1) return reply({ body: "short" });
      throw new FatalFailure("invalid_request", "bad request");
    });
    const result = await generate(summary, options(), deps(client, abc()));

    expect(result.status).toBe("partial");
    expect(result.document.sections[1]).toMatchObject({
      status: "failed",
      reason: "invalid_request: bad request",
      attempts: 2,
    });
  });

  it("stops scheduling after cancellation and keeps finished sections", async () => {
    const controller = new AbortController();
    const client = new ScriptedClient((prompt) => {
      controller.abort();
      return good(prompt);
    });
    const result = await generate(summary, options({ signal: controller.signal }), deps(client, abc()));

    expect(result.status).toBe("partial");
    expect(result.abortReason).toBe("run cancelled");
    expect(statuses(result.document.sections)).toEqual([
      ["a", "valid"],
      ["b", "not_attempted"],
      ["c", "not_attempted"],
    ]);
  });

  it("abandons in-flight calls once the grace period ends", async () => {
    const controller = new AbortController();
    const client = new ScriptedClient(() => {
      controller.abort();
      return new Promise<GenerationResponse>(() => undefined);
    });
    const result = await generate(summary, options({ signal: controller.signal, cancelGraceMs: 10 }), deps(client, abc()));

    expect(result.status).toBe("failed");
    expect(result.document.sections[0]).toMatchObject({ status: "failed", reason: "abandoned after run cancellation" });
  });

  it("attempts nothing when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const client = new ScriptedClient(good);
    const result = await generate(summary, options({ signal: controller.signal }), deps(client, abc()));

    expect(result.status).toBe("failed");
    expect(client.calls).toHaveLength(0);
    expect(result.failures.map((f) => f.status)).toEqual(["not_attempted", "not_attempted", "not_attempted"]);
  });

  it("stops scheduling when the run deadline passes", async () => {
    const client = new ScriptedClient(async (prompt) => {
      await new Promise((resolve) => setTimeout(resolve, 30));
      return good(prompt);
    });
    const result = await generate(summary, options({ runTimeoutMs: 5 }), deps(client, abc()));

    expect(result.status).toBe("partial");
    expect(result.abortReason).toBe("run timed out after 5ms");
    expect(statuses(result.document.sections).map(([, status]) => status)).toEqual(["valid", "not_attempted", "not_attempted"]);
  });

  it("defaults the project name", async () => {
    const client = new ScriptedClient(good);
    const result = await generate({ text: summary.text }, options(), deps(client, [section("a", 1)]));
    expect(result.document.metadata.projectName).toBe("Untitled Project");
  });

  it("rejects invalid options", async () => {
    const client = new ScriptedClient(good);
    await expect(generate(summary, options({ maxConcurrency: 0 }), deps(client, abc()))).rejects.toThrow(RangeError);
  });
});
