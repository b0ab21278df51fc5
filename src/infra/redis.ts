import Redis from "ioredis";

let connection: Redis | null = null;

/**
 * Shared ioredis connection for the dsp queue and the run artifact store.
 * BullMQ workers need `maxRetriesPerRequest: null` on the connection they are given.
 */
export function getRedis(): Redis {
  const url = process.env.REDIS_URL?.trim();
  if (!url) {
    throw new Error("REDIS_URL is required for the dsp queue and artifact store. Set it in .env");
  }
  if (!connection) {
    connection = new Redis(url, { maxRetriesPerRequest: null });
  }
  return connection;
}

export async function closeRedis(): Promise<void> {
  if (!connection) return;
  const current = connection;
  connection = null;
  await current.quit();
}
