import { config } from '../config.js';
import { InProcessJobQueue } from './inProcessQueue.js';
import { RedisJobQueue } from './redisQueue.js';
import type { JobQueue } from './types.js';

export function createJobQueue(): JobQueue {
  if (config.queueBackend === 'redis') {
    return new RedisJobQueue(config.redisUrl, config.maxConcurrentJobs);
  }
  return new InProcessJobQueue(config.maxConcurrentJobs);
}
