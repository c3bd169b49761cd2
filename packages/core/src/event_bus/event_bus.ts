import { EventEmitter } from 'events';
import { randomBytes } from 'crypto';

import type {
  EventOf,
  EventHandler,
  EventSubscription,
  GradewatchEvent,
  GradewatchEventType,
} from './types';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';

const WILDCARD = '*';

function generateSubscriptionId(): string {
  return `subscription:${Date.now()}-${randomBytes(5).toString('hex')}`;
}

function isEventOf<K extends GradewatchEventType>(event: GradewatchEvent, type: K): event is EventOf<K> {
  return event.type === type;
}

/**
 * Event Stream interface
 */
export interface IEventStream {
  publish(event: GradewatchEvent): void;

  subscribe<K extends GradewatchEventType>(
    eventType: K,
    handler: EventHandler<EventOf<K>>
  ): EventSubscription;

  subscribeToAll(handler: EventHandler<GradewatchEvent>): EventSubscription;

  unsubscribe(subscriptionId: string): boolean;

  getSubscriptions(): EventSubscription[];

  /**
   * Clear all subscriptions (for testing/cleanup)
   */
  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

export type EventBusOptions = {
  logger?: Logger;
};

/**
 * In-process EventBus on top of Node's EventEmitter.
 *
 * Handlers are invoked synchronously on publish; async handlers keep running
 * in the background and are tracked so `waitForIdle()` can await them.
 * A failing handler is logged and never reaches the publisher.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private subscriptions: Map<string, EventSubscription>;
  private pendingHandlers: Set<Promise<void>>;
  private logger: Logger;

  constructor(options: EventBusOptions = {}) {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.pendingHandlers = new Set();
    this.logger = options.logger ?? silentLogger;

    // One listener per scheduled target plus CLI observers
    this.emitter.setMaxListeners(100);
  }

  publish(event: GradewatchEvent): void {
    if (!event.type || typeof event.type !== 'string') {
      throw new Error('Event must have a valid type string');
    }

    if (!event.timestamp || typeof event.timestamp !== 'number') {
      throw new Error('Event must have a valid timestamp number');
    }

    if (!event.source || typeof event.source !== 'string') {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);
    this.emitter.emit(WILDCARD, event);
  }

  subscribe<K extends GradewatchEventType>(
    eventType: K,
    handler: EventHandler<EventOf<K>>
  ): EventSubscription {
    return this.register(eventType, (event) => {
      if (isEventOf(event, eventType)) {
        return handler(event);
      }
    });
  }

  /**
   * Subscribe to all events (wildcard subscription)
   * Used by the CLI to print lifecycle events in verbose mode.
   */
  subscribeToAll(handler: EventHandler<GradewatchEvent>): EventSubscription {
    return this.register(WILDCARD, handler);
  }

  private register(
    eventType: GradewatchEventType | typeof WILDCARD,
    handler: EventHandler<GradewatchEvent>
  ): EventSubscription {
    const listener = (event: GradewatchEvent): void => {
      const handlerPromise = (async () => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Error in event handler for ${eventType}:`, error);
        }
      })();

      this.pendingHandlers.add(handlerPromise);
      void handlerPromise.finally(() => {
        this.pendingHandlers.delete(handlerPromise);
      });
    };

    const subscription: EventSubscription = {
      id: generateSubscriptionId(),
      eventType,
      listener,
      metadata: {
        createdAt: Date.now(),
      },
    };

    this.emitter.on(eventType, listener);
    this.subscriptions.set(subscription.id, subscription);

    return subscription;
  }

  /**
   * @returns true if subscription was found and removed, false otherwise
   */
  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }

    this.emitter.removeListener(subscription.eventType, subscription.listener);
    this.subscriptions.delete(subscriptionId);

    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.subscriptions.values());
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
  }

  getSubscriptionCount(eventType: GradewatchEventType | typeof WILDCARD): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Wait for all pending event handlers to complete.
   *
   * @param options.timeout - Maximum time to wait in ms (default: 5000)
   *
   * @example
   * ```typescript
   * scheduler.forceCycle('12345:s1#grades');
   * await eventBus.waitForIdle();
   * expect(received).toHaveLength(2);
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        this.logger.warn(`EventBus.waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise((resolve) => setTimeout(resolve, 10)),
      ]);
    }
  }
}
