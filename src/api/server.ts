import "dotenv/config";
import { randomUUID } from "node:crypto";
import http from "node:http";
import { RedisArtifactStore, type ArtifactStore } from "../dsp/artifacts";
import { parseJobRequest } from "../dsp/jobRequest";
import { errorMessage, logger } from "../infra/logger";
import { enqueueDspJob, getDspQueue, type GenerateDspPayload } from "../queues/dspQueue";

export type DspApiDeps = {
  enqueue: (payload: GenerateDspPayload) => Promise<void>;
  /** BullMQ job state, or null when no job has that id. */
  jobState: (runId: string) => Promise<string | null>;
  store: ArtifactStore;
  newRunId?: () => string;
};

function sendJSON(res: http.ServerResponse, statusCode: number, body: object) {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

const JOB_PATH = /^\/dsp\/jobs\/([A-Za-z0-9_-]+)$/;

export function createDspServer(deps: DspApiDeps): http.Server {
  const newRunId = deps.newRunId ?? randomUUID;

  return http.createServer(async (req, res) => {
    const pathname = req.url?.split("?")[0];

    if (req.method === "GET" && pathname === "/health") {
      res.statusCode = 200;
      res.setHeader("Content-Type", "text/plain");
      res.end("OK");
      return;
    }

    try {
      if (req.method === "POST" && pathname === "/dsp/jobs") {
        let body: unknown;
        try {
          body = JSON.parse(await readBody(req));
        } catch {
          sendJSON(res, 400, { error: "body must be valid JSON" });
          return;
        }
        const parsed = parseJobRequest(body);
        if (!parsed.ok) {
          sendJSON(res, 400, { error: parsed.error });
          return;
        }
        const runId = newRunId();
        await deps.enqueue({ runId, ...parsed.request });
        logger.info("dsp job enqueued", { runId, projectName: parsed.request.projectName });
        sendJSON(res, 202, { runId });
        return;
      }

      const match = req.method === "GET" ? pathname?.match(JOB_PATH) : null;
      if (match?.[1]) {
        const runId = match[1];
        const state = await deps.jobState(runId);
        const artifact = await deps.store.read(runId, "document");
        if (state === null && !artifact) {
          sendJSON(res, 404, { error: "unknown run" });
          return;
        }
        sendJSON(res, 200, { runId, state: state ?? "unknown", result: artifact?.payload ?? null });
        return;
      }

      sendJSON(res, 404, { error: "not found" });
    } catch (err) {
      logger.error("api request failed", { method: req.method, path: pathname, error: errorMessage(err) });
      sendJSON(res, 500, { error: "internal error" });
    }
  });
}

if (require.main === module) {
  if (!process.env.REDIS_URL?.trim()) {
    throw new Error("REDIS_URL is required. Set it in .env");
  }
  const port = Number(process.env.PORT ?? 3000);
  const server = createDspServer({
    enqueue: enqueueDspJob,
    jobState: async (runId) => {
      const job = await getDspQueue().getJob(runId);
      return job ? job.getState() : null;
    },
    store: new RedisArtifactStore(),
  });
  server.listen(port, () => {
    logger.info("api listening on", `http://localhost:${port}`);
  });
}
