import { randomUUID } from 'node:crypto';

import type { BusTelemetry } from './telemetry.js';
import { NoopTelemetry } from './telemetry.js';

export type Observer<TEvent> = (event: TEvent) => void | Promise<void>;

export interface SubscribeOptions {
  /** Optional subscriber identifier for logs/metrics. */
  name?: string;
}

export interface Subscription {
  unsubscribe(): void;
  isActive(): boolean;
}

export interface EventBusConfig {
  telemetry?: BusTelemetry;
}

interface Subscriber<TEvent> {
  sid: string;
  name: string;
  observer: Observer<TEvent>;
  active: boolean;
}

/**
 * In-process multicast of typed events.
 *
 * `publish` snapshots the current observers and calls each one in turn.
 * An observer that throws (or rejects) is reported to telemetry and the
 * remaining observers still receive the event.
 */
export class EventBus<TEvent extends { readonly kind: string }> {
  private readonly telemetry: BusTelemetry;
  private readonly subscribers = new Map<string, Subscriber<TEvent>>();

  constructor(cfg: EventBusConfig = {}) {
    this.telemetry = cfg.telemetry ?? NoopTelemetry;
  }

  subscribe(observer: Observer<TEvent>, options: SubscribeOptions = {}): Subscription {
    const sid = randomUUID();
    const name = options.name?.trim() || sid;
    const sub: Subscriber<TEvent> = { sid, name, observer, active: true };
    this.subscribers.set(sid, sub);

    return {
      unsubscribe: () => {
        sub.active = false;
        this.subscribers.delete(sid);
      },
      isActive: () => sub.active,
    };
  }

  publish(event: TEvent): void {
    this.telemetry.published(event.kind);

    const snapshot = Array.from(this.subscribers.values());
    for (const sub of snapshot) {
      if (!sub.active) continue;
      this.deliver(sub, event);
    }
  }

  /** Number of active observers. */
  size(): number {
    return this.subscribers.size;
  }

  private deliver(sub: Subscriber<TEvent>, event: TEvent): void {
    try {
      const result = sub.observer(event);
      if (result instanceof Promise) {
        void result.then(
          () => this.telemetry.delivered(event.kind),
          (err: unknown) => this.reportFailure(sub, event, err)
        );
        return;
      }
      this.telemetry.delivered(event.kind);
    } catch (err) {
      this.reportFailure(sub, event, err);
    }
  }

  private reportFailure(sub: Subscriber<TEvent>, event: TEvent, err: unknown): void {
    this.telemetry.handlerThrew(event.kind);
    this.telemetry.error('bus observer threw', {
      subscriber: sub.name,
      kind: event.kind,
      err: err instanceof Error ? err.message : String(err),
    });
  }
}
