import type { ConnectionOptions } from 'bullmq';

export function createRedisConnectionOptions(redisUrl: string): ConnectionOptions {
  return {
    url: redisUrl,
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  };
}
