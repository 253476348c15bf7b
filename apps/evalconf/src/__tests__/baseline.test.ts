/**
 * @fileoverview End-to-end tests: bundled config, manifests, user modules and
 * the baseline script
 *
 * @module __tests__/baseline
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { fileURLToPath } from "url";
import { ConfigurationError, createEnvironment, type ConfigEngine, type EngineLogger } from "@evalconf/engine";
import { loadEngineConfig } from "../config/index.js";
import { createEngine } from "../createEngine.js";
import { formatEnvironment } from "../report.js";
import { Metric } from "../domain/index.js";

const CONFIG_PATH = fileURLToPath(new URL("../../config/engine.yml", import.meta.url));
const BASELINE_SCRIPT = fileURLToPath(new URL("../../scripts/baseline.eval.js", import.meta.url));

describe("baseline configuration", () => {
    let logger: EngineLogger;
    let engine: ConfigEngine;

    beforeEach(async () => {
        logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        engine = await createEngine(loadEngineConfig(CONFIG_PATH), logger);
    });

    // Scenario: Bundled script against bundled manifests and user modules
    it("should declare the baseline tasks", async () => {
        const environment = await engine.load(BASELINE_SCRIPT);

        expect(formatEnvironment(environment)).toEqual([
            "3 tasks declared",
            "  1. baseline-crossfold: 5-fold crossfold on csv data/ratings.csv (delimiter ',', header); metrics rmse, ndcg@10",
            "  2. baseline-holdout: holdout 20% on csv data/ratings.csv (delimiter ',', header); metrics rmse",
            "  3. baseline-smoke: smoke run on 500 ratings",
            "result: baseline",
        ]);
        expect(logger.info).toHaveBeenCalledWith("Baseline experiments declared");
    });

    // Scenario: Domain validation failure inside a script
    it("should report builder validation failures as configuration errors", async () => {
        const error = await engine.load({ name: "no-source.eval.js", text: "task(build('crossfold'))" })
            .then(() => undefined, (failure: unknown) => failure);

        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toHaveProperty(
            "message",
            "error running configuration script no-source.eval.js: task crossfold needs a data source"
        );
    });
});

describe("formatEnvironment", () => {
    // Scenario: Task without describe() and a structured result
    it("should fall back to task names and print results as JSON", () => {
        const environment = createEnvironment([{ name: "plain-task" }], { folds: 5 });

        expect(formatEnvironment(environment)).toEqual([
            "1 task declared",
            "  1. plain-task",
            "result: {\"folds\":5}",
        ]);
    });

    // Scenario: No tasks, no result
    it("should report an empty run", () => {
        expect(formatEnvironment(createEnvironment([], undefined))).toEqual([
            "0 tasks declared",
            "result: (none)",
        ]);
    });

    // Scenario: Domain object as result
    it("should serialise domain objects in the result", () => {
        const environment = createEnvironment([], new Metric("ndcg", 10));

        expect(formatEnvironment(environment)).toEqual([
            "0 tasks declared",
            "result: {\"name\":\"ndcg\",\"cutoff\":10}",
        ]);
    });

    // Scenario: Results with no JSON form
    it("should print a bigint result as text", () => {
        expect(formatEnvironment(createEnvironment([], 10n))).toEqual([
            "0 tasks declared",
            "result: 10",
        ]);
    });

    it("should print a cyclic result without failing", () => {
        const looped: { self?: unknown } = {};
        looped.self = looped;

        expect(formatEnvironment(createEnvironment([], looped))).toEqual([
            "0 tasks declared",
            "result: [object Object]",
        ]);
    });
});
