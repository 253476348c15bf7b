/**
 * @fileoverview EventBus Contract
 *
 * Events the config engine emits while loading defaults, registering
 * builders and running scripts. Dispatch is synchronous and in-process;
 * ordering is preserved within a single event type.
 *
 * @module @evalconf/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Run ID for correlating events of one script run */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Registry event types.
 */
export type RegistryEventType =
    | "defaults:loaded"
    | "builder:registered";

/**
 * Script run event types.
 */
export type RunEventType =
    | "run:started"
    | "task:registered"
    | "run:completed"
    | "run:failed";

/**
 * All known event types.
 */
export type EventType = RegistryEventType | RunEventType;

/**
 * Event handler function signature.
 */
export type EventHandler = (event: EventPayload) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("task:registered", (event) => {
 *     console.log("Task declared:", event.data?.task);
 * });
 *
 * engine.load("./experiment.eval.js");
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type, or all of them.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional run ID
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
