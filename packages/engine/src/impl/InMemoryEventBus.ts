/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus used by the config engine by default.
 *
 * @module @evalconf/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { describeError } from "../contracts/ConfigErrors.js";
import { createConsoleLogger } from "./consoleLogger.js";

/**
 * In-memory EventBus implementation.
 *
 * Handlers run synchronously in subscription order. Handlers registered for
 * "*" run after the type-specific ones. A throwing handler is logged and does
 * not stop delivery to the rest, so a faulty subscriber cannot fail a run.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("run:completed", (event) => {
 *     console.log("Tasks declared:", event.data?.taskCount);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();

    constructor(private readonly logger: EngineLogger = createConsoleLogger("EventBus")) {}

    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    /**
     * Remove subscriptions for one event type; no argument or "*" clears all.
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers subscribed to an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        for (const handler of handlers) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("Event handler failed", {
                    type : event.type,
                    error: describeError(error),
                });
            }
        }
    }
}
