/**
 * Domain Event Subscribers
 *
 * Reactive logic that responds to the events records publish after a
 * successful write. Subscribers are registered at startup via the
 * platform's event bus; a failing subscriber never breaks the write that
 * emitted the event.
 */

import type { EventSubscriber } from "@keepsync/contracts";

/**
 * Logs a project deletion. The project's tasks were deleted with it.
 */
const onProjectDeleted: EventSubscriber = {
  eventType: "project.deleted",
  name: "LogProjectDeleted",
  async handler(event) {
    console.log(`[subscriber] Project ${String(event.payload.id)} deleted with its tasks`);
  },
};

/**
 * Logs all record creations.
 *
 * Listens for: "*" (wildcard, receives ALL events) and keeps "*.created".
 */
const auditLogCreations: EventSubscriber = {
  eventType: "*",
  name: "AuditLogCreations",
  async handler(event) {
    if (!event.type.endsWith(".created")) return;

    const entity = event.type.split(".")[0];
    console.log(`[audit] ${entity} record created: ${String(event.payload.id)}`);
  },
};

/**
 * All domain event subscribers.
 * Registered with the platform's event bus at startup.
 */
export const eventSubscribers: EventSubscriber[] = [onProjectDeleted, auditLogCreations];
