import { Queue, UnrecoverableError } from "bullmq";
import { DspError } from "../dsp/errors";
import { getRedis } from "../infra/redis";
import type { GenerateOptions, MetadataOverrides } from "../dsp/types";

export const DSP_QUEUE_NAME = "dsp";
export const JOB_NAME_GENERATE_DSP = "generateDsp";

export type DspJobOptions = Partial<Pick<GenerateOptions, "maxConcurrency" | "retrievalK" | "retryLimit" | "allowPartialOutput">>;

export type GenerateDspPayload = {
  runId: string;
  /** Raw summary text, or a project name under the projects directory. Never read as a path. */
  summary: string;
  projectName?: string;
  options?: DspJobOptions;
  metadata?: MetadataOverrides;
};

let queue: Queue<GenerateDspPayload> | null = null;

export function getDspQueue(): Queue<GenerateDspPayload> {
  if (!queue) {
    queue = new Queue<GenerateDspPayload>(DSP_QUEUE_NAME, {
      connection: getRedis(),
      defaultJobOptions: {
        removeOnComplete: { count: 1000 },
        attempts: 3,
        backoff: {
          type: "exponential",
          delay: 5000,
        },
      },
    });
  }
  return queue;
}

export async function enqueueDspJob(payload: GenerateDspPayload): Promise<void> {
  // jobId = runId so the API can look the job up again
  await getDspQueue().add(JOB_NAME_GENERATE_DSP, payload, { jobId: payload.runId });
}

/** Missing summaries and broken configuration fail the job at once; retrying cannot fix them. */
export function toJobError(err: unknown): unknown {
  if (err instanceof DspError) {
    return new UnrecoverableError(`${err.name}: ${err.message}`);
  }
  return err;
}
