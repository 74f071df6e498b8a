/**
 * Pipeline event publisher.
 *
 * Emits stable, versioned events for every run and entry lifecycle change,
 * persists them as the run's queryable history, and fans them out to
 * in-process subscribers.
 */

import { v4 as uuid } from 'uuid';
import { PipelineEvent, PipelineEventType, EventSubscription } from '../domain/events';
import { PipelineRun } from '../domain/run';
import { Store } from '../storage/store';
import { logger } from '../logger';

export const EVENT_SCHEMA_VERSION = '1.0.0';

const log = logger.child({ module: 'publisher' });

export class DataPlanePublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private store: Store) {}

  /** Publish a run lifecycle event. */
  async publishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<PipelineEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      payload: {
        state: run.state,
        ref: run.trigger.ref,
        eventType: run.trigger.eventType,
        releaseEligible: run.releaseEligible,
        exitCode: run.exitCode,
        error: run.error,
      },
    });
  }

  /** Publish a matrix entry lifecycle event. */
  async publishEntryEvent(
    run: PipelineRun,
    platformId: string,
    eventType: PipelineEventType,
  ): Promise<PipelineEvent> {
    const entry = run.entries[platformId];
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      platformId,
      artifactName: entry?.artifactName,
      payload: {
        status: entry?.status,
        durationMs: entry?.durationMs,
        error: entry?.error,
      },
    });
  }

  /** Persist and deliver an event. */
  async publishEvent(event: PipelineEvent): Promise<PipelineEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (this.matchesSubscription(event, sub)) {
        try {
          sub.callback(event);
        } catch (err) {
          log.warn('Event subscriber threw', {
            subscriptionId: sub.id,
            eventType: event.type,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query a run's event history. */
  async getEventsByRun(runId: string, eventTypes?: PipelineEventType[]): Promise<PipelineEvent[]> {
    return this.store.events.listByRun(runId, { eventTypes, limit: 1000 });
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
