// ============================================
// Event Bus - Type-Safe Synchronous Pub/Sub
// ============================================

import type { GameEvent } from './types';

/** Anything with a string discriminant can travel on a bus. */
export interface TypedEvent {
  type: string;
}

export type EventHandler<E> = (event: E) => void;

export type EventOfType<E extends TypedEvent, T extends E['type']> = Extract<E, { type: T }>;

/**
 * Handle returned by subscribe(). cancel() is idempotent.
 */
export interface SubscriptionToken {
  readonly type: string;
  readonly active: boolean;
  cancel(): void;
}

function isEventOfType<E extends TypedEvent, T extends E['type']>(
  event: E,
  type: T
): event is EventOfType<E, T> {
  return event.type === type;
}

class Subscription<E extends TypedEvent> implements SubscriptionToken {
  private canceled = false;

  constructor(
    readonly type: E['type'],
    private readonly deliver: EventHandler<E>,
    private readonly detach: (subscription: Subscription<E>) => void
  ) {}

  get active(): boolean {
    return !this.canceled;
  }

  cancel(): void {
    if (this.canceled) return;
    this.canceled = true;
    this.detach(this);
  }

  dispatch(event: E): void {
    // Checked per delivery: a handler earlier in the same dispatch may have
    // canceled this subscription.
    if (this.canceled) return;
    this.deliver(event);
  }
}

/**
 * EventBus - delivers each published event synchronously to every handler
 * subscribed to its exact `type`, in subscription order, before publish()
 * returns.
 *
 * The handler list is snapshotted before dispatch: subscribing during a
 * dispatch does not add to it. Handler exceptions are not caught; a throwing
 * handler aborts delivery to the handlers after it.
 */
export class EventBus<E extends TypedEvent = GameEvent> {
  private subscriptions = new Map<E['type'], Subscription<E>[]>();

  /**
   * Subscribe to an event type (type-safe)
   * @returns token whose cancel() unsubscribes
   */
  subscribe<T extends E['type']>(
    type: T,
    handler: EventHandler<EventOfType<E, T>>
  ): SubscriptionToken {
    const subscription = new Subscription<E>(
      type,
      (event) => {
        if (isEventOfType(event, type)) handler(event);
      },
      (sub) => this.detach(sub)
    );

    const list = this.subscriptions.get(type) ?? [];
    list.push(subscription);
    this.subscriptions.set(type, list);
    return subscription;
  }

  publish(event: E): void {
    const list = this.subscriptions.get(event.type);
    if (!list || list.length === 0) return;

    for (const subscription of list.slice()) {
      subscription.dispatch(event);
    }
  }

  subscriberCount(type: E['type']): number {
    return this.subscriptions.get(type)?.length ?? 0;
  }

  /**
   * Cancel every live subscription (engine teardown).
   */
  clear(): void {
    const all = [...this.subscriptions.values()].flat();
    this.subscriptions.clear();
    for (const subscription of all) {
      subscription.cancel();
    }
  }

  private detach(subscription: Subscription<E>): void {
    const list = this.subscriptions.get(subscription.type);
    if (!list) return;
    const remaining = list.filter((s) => s !== subscription);
    if (remaining.length === 0) {
      this.subscriptions.delete(subscription.type);
    } else {
      this.subscriptions.set(subscription.type, remaining);
    }
  }
}

export type GameEventBus = EventBus<GameEvent>;
