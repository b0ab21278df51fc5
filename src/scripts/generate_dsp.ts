import "dotenv/config";
import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { RedisArtifactStore } from "../dsp/artifacts";
import { exitCodeFor, parseGenerateArgs, USAGE } from "../dsp/cliArgs";
import { readPipelineEnv } from "../dsp/config";
import { runDspPipeline } from "../dsp/pipeline";
import { loadProjectSummary } from "../dsp/summaryLoader";
import { errorMessage, logger } from "../infra/logger";
import { closeRedis } from "../infra/redis";
import { LlmViaApi } from "../llm";

function readVersion(): string {
  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, "../../package.json"), "utf8"));
  return raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string" ? raw.version : "0.0.0";
}

async function main(): Promise<number> {
  const args = parseGenerateArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.version) {
    console.log(readVersion());
    return 0;
  }
  if (!args.summary) {
    console.error(USAGE);
    return 1;
  }
  if (args.verbose) process.env.LOG_LEVEL = "debug";

  const env = readPipelineEnv();
  const loaded = await loadProjectSummary(args.summary, { projectsDir: env.projectsDir });
  const runId = randomUUID();

  const result = await runDspPipeline({
    runId,
    summary: { ...loaded, projectName: args.projectName ?? loaded.projectName },
    options: {
      ...env.options,
      maxConcurrency: args.maxConcurrency ?? env.options.maxConcurrency,
      retrievalK: args.retrievalK ?? env.options.retrievalK,
      retryLimit: args.retryLimit ?? env.options.retryLimit,
      allowPartialOutput: args.noPartial ? false : env.options.allowPartialOutput,
    },
    metadata: args.metadata,
    client: new LlmViaApi(),
    corpusDir: env.corpusDir,
    outputDir: args.output ? path.resolve(args.output) : env.outputDir,
    // artifacts only when a Redis is configured
    store: process.env.REDIS_URL?.trim() ? new RedisArtifactStore() : undefined,
  });
  await closeRedis();

  console.log(`Status: ${result.status}`);
  for (const failure of result.failures) {
    console.log(`  ${failure.sectionId}: ${failure.status} (${failure.reason})`);
  }
  console.log(`PDF:  ${result.files.pdf}`);
  console.log(`HTML: ${result.files.html}`);
  console.log(`MD:   ${result.files.markdown}`);
  console.log(`Log:  ${result.files.log}`);
  return exitCodeFor(result.status);
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    logger.error("dsp generation failed", { error: errorMessage(err) });
    process.exit(1);
  });
