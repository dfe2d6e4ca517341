/**
 * Event Bus
 *
 * Routes DomainEvents emitted by record writes to registered
 * EventSubscriber handlers.
 *
 *   - Subscribers are registered at startup
 *   - A failing subscriber is logged and captured, never rethrown
 *     to the record write that emitted the event
 *   - Supports exact match ("task.created"), entity prefix ("task.*")
 *     and wildcard ("*") subscriptions
 */

import type { DomainEvent, EventSubscriber } from "@keepsync/contracts";
import { captureException } from "../observability/index.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("event-bus");

/** All registered subscribers, keyed by event type pattern */
const subscribers = new Map<string, EventSubscriber[]>();

/**
 * Register an event subscriber.
 */
export function subscribe(subscriber: EventSubscriber): void {
  const existing = subscribers.get(subscriber.eventType) ?? [];
  existing.push(subscriber);
  subscribers.set(subscriber.eventType, existing);
}

/**
 * Register multiple subscribers at once.
 */
export function subscribeAll(subs: EventSubscriber[]): void {
  for (const sub of subs) {
    subscribe(sub);
  }
}

/**
 * Returns the subscription patterns an event type matches:
 * the exact type, its "<prefix>.*" form, and "*".
 */
function patternsFor(type: string): string[] {
  const patterns = [type];
  const dot = type.indexOf(".");
  if (dot > 0) patterns.push(`${type.slice(0, dot)}.*`);
  patterns.push("*");
  return patterns;
}

/**
 * Publish a domain event to all matching subscribers.
 *
 * All matching handlers are invoked concurrently via Promise.allSettled.
 * Failed handlers are logged but never re-thrown.
 */
export async function publish(event: DomainEvent): Promise<void> {
  const enrichedEvent: DomainEvent = {
    ...event,
    timestamp: event.timestamp ?? new Date(),
  };

  const handlers: EventSubscriber[] = [];
  for (const pattern of patternsFor(enrichedEvent.type)) {
    const matched = subscribers.get(pattern);
    if (matched) handlers.push(...matched);
  }

  if (handlers.length === 0) return;

  const results = await Promise.allSettled(
    handlers.map((sub) => sub.handler(enrichedEvent))
  );

  for (let i = 0; i < results.length; i++) {
    const result = results[i];
    if (result.status === "rejected") {
      const reason = result.reason instanceof Error
        ? result.reason
        : new Error(String(result.reason));
      logger.error(`Subscriber "${handlers[i].name}" failed`, {
        eventType: enrichedEvent.type,
        error: reason.message,
      });
      captureException(reason, {
        subscriber: handlers[i].name,
        eventType: enrichedEvent.type,
      });
    }
  }
}

/**
 * Returns the count of registered subscribers (for testing/debugging).
 */
export function getSubscriberCount(): number {
  let count = 0;
  for (const subs of subscribers.values()) {
    count += subs.length;
  }
  return count;
}

/**
 * Clears all registered subscribers.
 * Used for test isolation.
 */
export function clearSubscribers(): void {
  subscribers.clear();
}
