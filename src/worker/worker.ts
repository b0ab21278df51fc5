import "dotenv/config";
import { Worker } from "bullmq";
import { RedisArtifactStore, writeErrorArtifact } from "../dsp/artifacts";
import { readPipelineEnv } from "../dsp/config";
import { mergeOptions } from "../dsp/jobRequest";
import { runDspPipeline } from "../dsp/pipeline";
import { loadProjectSummary } from "../dsp/summaryLoader";
import { closeRedis, getRedis } from "../infra/redis";
import { errorMessage, logger } from "../infra/logger";
import { LlmViaApi } from "../llm";
import { DSP_QUEUE_NAME, JOB_NAME_GENERATE_DSP, toJobError, type GenerateDspPayload } from "../queues/dspQueue";

// Fail fast on startup
if (!process.env.REDIS_URL?.trim()) {
  throw new Error("REDIS_URL is required. Set it in .env");
}

const env = readPipelineEnv();
const store = new RedisArtifactStore();
const client = new LlmViaApi();

const dspWorker = new Worker<GenerateDspPayload>(
  DSP_QUEUE_NAME,
  async (job) => {
    if (job.name !== JOB_NAME_GENERATE_DSP) {
      logger.warn("dsp job ignored: wrong job name", { jobName: job.name });
      return null;
    }
    const { runId, projectName } = job.data;
    logger.info("dsp job started", { runId, jobId: job.id, attempt: job.attemptsMade + 1 });

    try {
      // job summaries come from API callers: text or a project name, never a path
      const loaded = await loadProjectSummary(job.data.summary, { projectsDir: env.projectsDir, allowPaths: false });
      const result = await runDspPipeline({
        runId,
        summary: { ...loaded, projectName: projectName ?? loaded.projectName },
        options: mergeOptions(env.options, job.data.options),
        metadata: job.data.metadata,
        client,
        corpusDir: env.corpusDir,
        outputDir: env.outputDir,
        store,
      });
      return { runId, status: result.status, files: result.files, failures: result.failures.length };
    } catch (err) {
      throw toJobError(err);
    }
  },
  { connection: getRedis(), concurrency: 1 }
);

dspWorker.on("completed", (job, value) => {
  logger.info("dsp job completed", { runId: job.data.runId, result: value });
});

dspWorker.on("failed", (job, err) => {
  const runId = job?.data.runId;
  logger.error("dsp job failed", { runId, jobId: job?.id, error: err.message, errorType: err.name });
  if (runId) {
    writeErrorArtifact(store, runId, "job", err.message).catch((storeErr: unknown) => {
      logger.warn("failed to record job error artifact", { runId, error: errorMessage(storeErr) });
    });
  }
});

async function shutdown() {
  logger.info("worker shutting down");
  await dspWorker.close();
  await closeRedis();
  process.exit(0);
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);

logger.info("worker started (dsp queue)");
