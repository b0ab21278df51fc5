import "dotenv/config";
import { closeRedis } from "../infra/redis";
import { DSP_QUEUE_NAME, getDspQueue } from "../queues/dspQueue";

async function main() {
  console.log("=== DSP Queue Diagnostics ===\n");

  console.log("Environment Variables:");
  console.log("  REDIS_URL:", process.env.REDIS_URL ? "✅ Set" : "❌ Missing");
  console.log("  GEMINI_API_KEY:", process.env.GEMINI_API_KEY ? "✅ Set" : "❌ Missing");
  console.log("  OPENAI_API_KEY:", process.env.OPENAI_API_KEY ? "✅ Set" : "❌ Missing");
  console.log("  GROQ_API_KEY:", process.env.GROQ_API_KEY ? "✅ Set" : "❌ Missing");
  console.log();

  const queue = getDspQueue();
  const counts = await queue.getJobCounts("waiting", "active", "completed", "failed", "delayed");

  console.log(`Queue "${DSP_QUEUE_NAME}" Status:`);
  for (const [state, count] of Object.entries(counts)) {
    console.log(`  ${state}: ${count}`);
  }
  console.log();

  if ((counts.failed ?? 0) > 0) {
    console.log("⚠️  Failed jobs found! Check worker logs for details.");
    for (const job of await queue.getFailed(0, 4)) {
      console.log(`  ${job.id}: ${job.failedReason}`);
    }
  }

  await queue.close();
  await closeRedis();
}

main().catch(console.error);
