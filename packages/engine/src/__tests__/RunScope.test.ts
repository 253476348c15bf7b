/**
 * @fileoverview Unit tests for RunScope and ScopeTracker
 *
 * Tests cover:
 * - Declaration order and hand-over on end()
 * - Registration outside any run
 * - Nested and concurrent runs
 *
 * @module @evalconf/engine/__tests__/RunScope
 */

import { describe, it, expect, beforeEach } from "vitest";
import { RunScope, ScopeTracker } from "../runtime/RunScope.js";
import { TrainTestTask } from "./fixtures/types.js";

function names(tasks: readonly { name: string }[]): string[] {
    return tasks.map(task => task.name);
}

function tick(): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, 0));
}

describe("RunScope", () => {
    // Scenario: Tasks kept in declaration order
    it("should return tasks in the order they were registered", () => {
        const scope = new RunScope();
        const first = new TrainTestTask("first", 5);
        const second = new TrainTestTask("second", 10);

        expect(scope.register(first)).toBe(true);
        expect(scope.register(second)).toBe(true);
        expect(scope.size).toBe(2);

        const tasks = scope.end();
        expect(tasks).toHaveLength(2);
        expect(tasks[0]).toBe(first);
        expect(tasks[1]).toBe(second);
    });

    // Scenario: Ended scope drops late registrations
    it("should refuse tasks after end()", () => {
        const scope = new RunScope();
        scope.end();

        expect(scope.active).toBe(false);
        expect(scope.register(new TrainTestTask("late", 1))).toBe(false);
        expect(scope.end()).toEqual([]);
    });

    // Scenario: Handed-over list is not aliased by the scope
    it("should not keep a reference to the returned list", () => {
        const scope = new RunScope();
        scope.register(new TrainTestTask("only", 1));

        const tasks = scope.end();
        scope.register(new TrainTestTask("after", 1));

        expect(names(tasks)).toEqual(["only"]);
    });

    // Scenario: Every scope gets its own id
    it("should assign distinct run ids", () => {
        expect(new RunScope().id).not.toBe(new RunScope().id);
    });
});

describe("ScopeTracker", () => {
    let tracker: ScopeTracker;

    beforeEach(() => {
        tracker = new ScopeTracker();
    });

    // Scenario: No active run
    it("should ignore registrations outside a run", () => {
        expect(tracker.current()).toBeUndefined();
        expect(tracker.register(new TrainTestTask("stray", 1))).toBe(false);

        const scope = tracker.begin();
        tracker.run(scope, () => {
            tracker.register(new TrainTestTask("inside", 1));
        });

        expect(names(scope.end())).toEqual(["inside"]);
    });

    // Scenario: Binding removed after run, even on throw
    it("should unbind the scope when the run throws", () => {
        const scope = tracker.begin();

        expect(() => tracker.run(scope, () => {
            tracker.register(new TrainTestTask("before-failure", 1));
            throw new Error("boom");
        })).toThrow("boom");

        expect(tracker.current()).toBeUndefined();
        expect(names(scope.end())).toEqual(["before-failure"]);
    });

    // Scenario: Nested run hides the parent scope
    it("should isolate a nested run from its parent", () => {
        const outer = tracker.begin();
        const inner = tracker.begin();

        tracker.run(outer, () => {
            tracker.register(new TrainTestTask("outer-1", 1));
            tracker.run(inner, () => {
                expect(tracker.current()).toBe(inner);
                tracker.register(new TrainTestTask("inner-1", 1));
            });
            tracker.register(new TrainTestTask("outer-2", 1));
        });

        expect(names(outer.end())).toEqual(["outer-1", "outer-2"]);
        expect(names(inner.end())).toEqual(["inner-1"]);
    });

    // Scenario: Interleaved async runs keep their own tasks
    it("should keep concurrent async runs apart", async () => {
        const declare = async (prefix: string, count: number): Promise<string[]> => {
            const scope = tracker.begin();
            await tracker.run(scope, async () => {
                for (let i = 1; i <= count; i++) {
                    tracker.register(new TrainTestTask(`${prefix}-${i}`, i));
                    await tick();
                }
            });
            return names(scope.end());
        };

        const [left, right] = await Promise.all([declare("left", 3), declare("right", 2)]);

        expect(left).toEqual(["left-1", "left-2", "left-3"]);
        expect(right).toEqual(["right-1", "right-2"]);
    });

    // Scenario: Continuation running after the run has ended
    it("should drop registrations from continuations of an ended run", async () => {
        const scope = tracker.begin();
        let late: Promise<boolean> = Promise.resolve(true);

        tracker.run(scope, () => {
            late = tick().then(() => tracker.register(new TrainTestTask("late", 1)));
        });
        const tasks = scope.end();

        expect(await late).toBe(false);
        expect(tasks).toEqual([]);
    });
});
