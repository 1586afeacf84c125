import type { ConnectionOptions } from 'bullmq';

export function createRedisConnectionOptions(redisUrl: string, kind: 'api' | 'worker'): ConnectionOptions {
  return {
    url: redisUrl,
    maxRetriesPerRequest: kind === 'worker' ? null : 1,
    enableReadyCheck: true,
  };
}
