import type { ApplicationEvent } from '../lifecycle/types.js';
import { TERMINAL_TRIGGERS } from '../events/ApplicationEventTypes.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';

/**
 * Redis Streams utilities for publishing application transitions.
 *
 * Stream key pattern: `af:events:{applicationId}`
 *
 * The af_application_events table remains the permanent audit trail; the
 * stream exists for live consumers in other processes.
 */

/** The subset of the ioredis client the stream helpers call. */
export interface StreamClient {
  xadd(key: string, ...args: string[]): Promise<string | null>;
  expire(key: string, seconds: number): Promise<number>;
  del(key: string): Promise<number>;
}

/** Build the canonical stream key for an application. */
export function streamKey(applicationId: string): string {
  return `af:events:${applicationId}`;
}

/**
 * Flatten an event into XADD field/value pairs. Null fields are omitted.
 */
export function streamFields(event: ApplicationEvent): string[] {
  const fields: string[] = [];
  for (const [k, v] of Object.entries(event)) {
    if (v !== undefined && v !== null) {
      fields.push(k, String(v));
    }
  }
  return fields;
}

/**
 * Publish an event via XADD with MAXLEN ~1000.
 * Returns the message ID assigned by Redis.
 */
export async function xaddEvent(redis: StreamClient, event: ApplicationEvent): Promise<string | null> {
  return redis.xadd(streamKey(event.applicationId), 'MAXLEN', '~', '1000', '*', ...streamFields(event));
}

export async function deleteStream(redis: StreamClient, applicationId: string): Promise<number> {
  return redis.del(streamKey(applicationId));
}

/**
 * Set a TTL on the stream key so it auto-expires after the retention period.
 *
 * @param ttlSeconds - Time to live in seconds (default: 86400 = 24 hours)
 */
export async function setStreamTTL(redis: StreamClient, applicationId: string, ttlSeconds = 86400): Promise<void> {
  await redis.expire(streamKey(applicationId), ttlSeconds);
}

/**
 * Mirrors committed events onto per-application streams. Publishing never
 * blocks or fails a transition: errors are logged and dropped.
 */
export class RedisEventPublisher {
  private readonly logger: Logger;

  constructor(
    private readonly redis: StreamClient,
    private readonly ttlSeconds = 86400,
    logger?: Logger,
  ) {
    this.logger = (logger ?? getLogger()).child({ component: 'redis-events' });
  }

  async publish(event: ApplicationEvent): Promise<void> {
    try {
      await xaddEvent(this.redis, event);
      if (TERMINAL_TRIGGERS.has(event.trigger)) {
        await setStreamTTL(this.redis, event.applicationId, this.ttlSeconds);
      }
    } catch (err) {
      this.logger.warn('Failed to publish event to Redis stream', {
        applicationId: event.applicationId,
        sequence: event.sequence,
        error: errorMessage(err),
      });
    }
  }
}
