/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Basic event emission and subscription
 * - Wildcard subscriptions
 * - Unsubscribe and clear
 * - Failing handlers
 *
 * @module @evalconf/engine/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createMockLogger } from "./fixtures/types.js";

const STARTED: EventPayload = {
    type     : "run:started",
    timestamp: "2025-01-15T10:00:00.000Z",
    traceId  : "run_abc_1",
    data     : { script: "baseline.eval.js" },
};

const COMPLETED: EventPayload = {
    type     : "run:completed",
    timestamp: "2025-01-15T10:00:01.000Z",
    traceId  : "run_abc_1",
    data     : { script: "baseline.eval.js", taskCount: 2 },
};

describe("InMemoryEventBus", () => {
    let logger: EngineLogger;
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
    });

    describe("subscribe and emit", () => {
        // Scenario: Basic subscription receives emitted events
        it("should call handler when matching event is emitted", () => {
            const handler = vi.fn();

            eventBus.subscribe("run:started", handler);
            eventBus.emit(STARTED);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith(STARTED);
        });

        // Scenario: Handler not called for other event types
        it("should not call handler for non-matching event type", () => {
            const handler = vi.fn();

            eventBus.subscribe("run:failed", handler);
            eventBus.emit(STARTED);

            expect(handler).not.toHaveBeenCalled();
        });

        // Scenario: Handlers run in subscription order
        it("should call handlers in subscription order", () => {
            const calls: string[] = [];

            eventBus.subscribe("run:started", () => calls.push("first"));
            eventBus.subscribe("run:started", () => calls.push("second"));
            eventBus.emit(STARTED);

            expect(calls).toEqual(["first", "second"]);
        });
    });

    describe("wildcard subscription", () => {
        // Scenario: Wildcard handler receives all events
        it("should call wildcard handler for any event type", () => {
            const wildcardHandler = vi.fn();

            eventBus.subscribe("*", wildcardHandler);
            eventBus.emit(STARTED);
            eventBus.emit(COMPLETED);

            expect(wildcardHandler).toHaveBeenNthCalledWith(1, STARTED);
            expect(wildcardHandler).toHaveBeenNthCalledWith(2, COMPLETED);
        });

        // Scenario: Specific handlers run before wildcard handlers
        it("should call specific handlers before wildcard handlers", () => {
            const calls: string[] = [];

            eventBus.subscribe("*", () => calls.push("wildcard"));
            eventBus.subscribe("run:started", () => calls.push("specific"));
            eventBus.emit(STARTED);

            expect(calls).toEqual(["specific", "wildcard"]);
        });
    });

    describe("unsubscribe and clear", () => {
        // Scenario: Unsubscribed handler not called
        it("should not call handler after unsubscribe", () => {
            const handler = vi.fn();

            const subscription = eventBus.subscribe("run:started", handler);
            eventBus.emit(STARTED);
            subscription.unsubscribe();
            eventBus.emit(STARTED);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(eventBus.handlerCount("run:started")).toBe(0);
            expect(() => subscription.unsubscribe()).not.toThrow();
        });

        // Scenario: Clear one event type
        it("should remove handlers for one event type", () => {
            const started = vi.fn();
            const completed = vi.fn();
            eventBus.subscribe("run:started", started);
            eventBus.subscribe("run:completed", completed);

            eventBus.clear("run:started");
            eventBus.emit(STARTED);
            eventBus.emit(COMPLETED);

            expect(started).not.toHaveBeenCalled();
            expect(completed).toHaveBeenCalledTimes(1);
        });

        // Scenario: Clear everything
        it("should remove all handlers when clearing without a type", () => {
            eventBus.subscribe("run:started", vi.fn());
            eventBus.subscribe("*", vi.fn());

            eventBus.clear();

            expect(eventBus.handlerCount("run:started")).toBe(0);
            expect(eventBus.handlerCount("*")).toBe(0);
        });
    });

    describe("error handling", () => {
        // Scenario: Handler error doesn't break other handlers
        it("should log a failing handler and keep delivering", () => {
            const successHandler = vi.fn();
            const wildcardHandler = vi.fn();

            eventBus.subscribe("run:started", () => {
                throw new Error("subscriber broke");
            });
            eventBus.subscribe("run:started", successHandler);
            eventBus.subscribe("*", wildcardHandler);
            eventBus.emit(STARTED);

            expect(successHandler).toHaveBeenCalledTimes(1);
            expect(wildcardHandler).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("Event handler failed", {
                type : "run:started",
                error: "subscriber broke",
            });
        });
    });

    describe("createEvent", () => {
        // Scenario: Factory fills in timestamp and trace id
        it("should build a payload with a timestamp", () => {
            const event = createEvent("task:registered", { task: "crossfold" }, "run_abc_2");

            expect(event.type).toBe("task:registered");
            expect(event.traceId).toBe("run_abc_2");
            expect(event.data).toEqual({ task: "crossfold" });
            expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
        });
    });
});
