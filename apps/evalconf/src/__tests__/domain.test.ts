/**
 * @fileoverview Unit tests for the built-in domain builders
 *
 * @module domain/__tests__/domain
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError, getDefaultBuilder } from "@evalconf/engine";
import {
    CrossfoldTaskBuilder,
    CsvDataSource,
    CsvDataSourceBuilder,
    DataSource,
    HoldoutTaskBuilder,
    Metric,
    MetricBuilder,
    registerDomainTypes,
} from "../domain/index.js";

function ratings(): CsvDataSource {
    const builder = new CsvDataSourceBuilder();
    builder.path = "data/ratings.csv";
    return builder.build();
}

describe("CsvDataSourceBuilder", () => {
    // Scenario: Defaults plus a path
    it("should build a comma-separated source with a header", () => {
        const source = ratings();

        expect(source).toBeInstanceOf(DataSource);
        expect(source.describe()).toBe("csv data/ratings.csv (delimiter ',', header)");
    });

    // Scenario: Tab delimiter without header
    it("should show a tab delimiter escaped", () => {
        const builder = new CsvDataSourceBuilder();
        builder.path = "data/ratings.tsv";
        builder.delimiter = "\t";
        builder.hasHeader = false;

        expect(builder.build().describe()).toBe("csv data/ratings.tsv (delimiter '\\t')");
    });

    // Scenario: Missing path
    it("should require a path", () => {
        expect(() => new CsvDataSourceBuilder().build()).toThrow(ConfigurationError);
        expect(() => new CsvDataSourceBuilder().build()).toThrow("csv data source needs a path");
    });

    // Scenario: Multi-character delimiter
    it("should reject a delimiter longer than one character", () => {
        const builder = new CsvDataSourceBuilder();
        builder.path = "data/ratings.csv";
        builder.delimiter = "::";

        expect(() => builder.build()).toThrow("csv delimiter must be one character, got '::'");
    });
});

describe("Metric", () => {
    // Scenario: Metric names its own builder
    it("should declare MetricBuilder as its default builder", () => {
        expect(getDefaultBuilder(Metric)).toBe(MetricBuilder);
    });

    // Scenario: Label with and without cutoff
    it("should label metrics with their cutoff", () => {
        const builder = new MetricBuilder();
        expect(builder.build().label).toBe("rmse");

        builder.name = "ndcg";
        builder.cutoff = 10;
        expect(builder.build().label).toBe("ndcg@10");
    });

    // Scenario: Invalid cutoff
    it("should reject a cutoff below one", () => {
        const builder = new MetricBuilder();
        builder.cutoff = 0;

        expect(() => builder.build()).toThrow("metric rmse: cutoff must be a positive integer");
    });
});

describe("train/test builders", () => {
    // Scenario: Crossfold task
    it("should build a crossfold task", () => {
        const builder = new CrossfoldTaskBuilder();
        builder.name = "baseline";
        builder.source = ratings();
        builder.metrics = [new Metric("rmse", null), new Metric("ndcg", 10)];

        const task = builder.build();

        expect(task.split).toEqual({ kind: "crossfold", folds: 5 });
        expect(task.describe()).toBe(
            "baseline: 5-fold crossfold on csv data/ratings.csv (delimiter ',', header); metrics rmse, ndcg@10"
        );
    });

    // Scenario: Holdout task without metrics
    it("should build a holdout task", () => {
        const builder = new HoldoutTaskBuilder();
        builder.source = ratings();
        builder.testFraction = 0.25;

        expect(builder.build().describe()).toBe(
            "holdout: holdout 25% on csv data/ratings.csv (delimiter ',', header); metrics none"
        );
    });

    // Scenario: No data source
    it("should require a data source", () => {
        expect(() => new CrossfoldTaskBuilder().build()).toThrow("task crossfold needs a data source");
    });

    // Scenario: Too few folds
    it("should reject fewer than two folds", () => {
        const builder = new CrossfoldTaskBuilder();
        builder.source = ratings();
        builder.folds = 1;

        expect(() => builder.build()).toThrow("task crossfold: folds must be an integer of at least 2");
    });

    // Scenario: Holdout fraction out of range
    it("should reject a test fraction outside (0, 1)", () => {
        const builder = new HoldoutTaskBuilder();
        builder.source = ratings();
        builder.testFraction = 1;

        expect(() => builder.build()).toThrow("task holdout: testFraction must be between 0 and 1");
    });

    // Scenario: Metrics that are not Metric instances
    it("should reject metrics given as plain names", () => {
        const builder = new CrossfoldTaskBuilder();
        builder.source = ratings();
        builder.metrics = ["rmse"];

        expect(() => builder.build()).toThrow(
            "task crossfold: metrics must be built with build(type(\"Metric\"))"
        );
    });
});

describe("registerDomainTypes", () => {
    // Scenario: Names scripts and manifests rely on
    it("should define the built-in types under evalconf names", () => {
        const types = registerDomainTypes();

        expect(types.load("evalconf.data.DataSource")).toBe(DataSource);
        expect(types.load("evalconf.eval.HoldoutTaskBuilder")).toBe(HoldoutTaskBuilder);
        expect(types.names()).toHaveLength(8);
    });
});
