import { EventEmitter } from 'eventemitter3';
import type { CommitTransitionInput, Repository } from '../db/types.js';
import type { Application, ApplicationEvent } from '../lifecycle/types.js';
import { replayApplication, seedOf } from '../lifecycle/replay.js';
import type { RedisEventPublisher } from '../lib/redis-streams.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';

export type EventListener = (event: ApplicationEvent) => void;

interface EventLogEvents {
  appended: (event: ApplicationEvent) => void;
}

export interface EventLogOptions {
  publisher?: RedisEventPublisher;
  logger?: Logger;
}

/**
 * Append-only transition log. Appends go through the repository's
 * compare-and-swap so the event and the projection update land together;
 * subscribers only ever see committed events, in commit order.
 */
export class EventLog {
  private readonly emitter = new EventEmitter<EventLogEvents>();
  private readonly publisher?: RedisEventPublisher;
  private readonly logger: Logger;

  constructor(
    private readonly repo: Repository,
    opts: EventLogOptions = {},
  ) {
    this.publisher = opts.publisher;
    this.logger = (opts.logger ?? getLogger()).child({ component: 'event-log' });
  }

  /** Returns the stored event, or null if the application moved on first. */
  async append(input: CommitTransitionInput): Promise<ApplicationEvent | null> {
    const stored = await this.repo.commitTransition(input);
    if (!stored) return null;

    this.emitter.emit('appended', stored);
    if (this.publisher) {
      this.publisher.publish(stored).catch((err) => {
        this.logger.warn('Event publish failed', { applicationId: stored.applicationId, error: errorMessage(err) });
      });
    }
    return stored;
  }

  history(applicationId: string): Promise<ApplicationEvent[]> {
    return this.repo.listEvents(applicationId);
  }

  /** Events with a global position greater than `position`, oldest first. */
  after(position: number, limit = 100): Promise<ApplicationEvent[]> {
    return this.repo.listEventsAfter(position, limit);
  }

  /**
   * Receive every committed event (optionally for one application).
   * Returns an unsubscribe function.
   */
  subscribe(listener: EventListener, filter: { applicationId?: string } = {}): () => void {
    const wrapped = (event: ApplicationEvent) => {
      if (filter.applicationId && event.applicationId !== filter.applicationId) return;
      try {
        listener(event);
      } catch (err) {
        this.logger.error('Event subscriber threw', {
          applicationId: event.applicationId,
          sequence: event.sequence,
          error: errorMessage(err),
        });
      }
    };
    this.emitter.on('appended', wrapped);
    return () => {
      this.emitter.off('appended', wrapped);
    };
  }

  /** Replay the stored events of `app` over its creation seed. */
  async rebuild(app: Application): Promise<Application> {
    return replayApplication(seedOf(app), await this.history(app.id));
  }
}
