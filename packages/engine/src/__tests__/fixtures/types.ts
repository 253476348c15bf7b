/**
 * Sample domain types, builders and host fakes shared by the engine tests.
 */

import { vi } from "vitest";
import type { Builder } from "../../contracts/Builder.js";
import { DEFAULT_BUILDER } from "../../contracts/Builder.js";
import type { EvalTask } from "../../contracts/EvalTask.js";
import type { EngineLogger } from "../../contracts/Logger.js";
import type { ResourceHandle, ResourceLocator } from "../../contracts/ResourceLocator.js";
import { ResourceReadError } from "../../contracts/ConfigErrors.js";
import { StaticTypeLoader } from "../../impl/StaticTypeLoader.js";

export abstract class DataSource {
    abstract readonly path: string;
}

export class CsvDataSource extends DataSource {
    constructor(readonly path: string, readonly delimiter: string) {
        super();
    }
}

export class CsvDataSourceBuilder implements Builder<CsvDataSource> {
    path = "ratings.csv";
    delimiter = ",";

    build(): CsvDataSource {
        return new CsvDataSource(this.path, this.delimiter);
    }
}

export class TsvDataSourceBuilder implements Builder<CsvDataSource> {
    path = "ratings.tsv";

    build(): CsvDataSource {
        return new CsvDataSource(this.path, "\t");
    }
}

export class MetricBuilder implements Builder<Metric> {
    label = "rmse";

    build(): Metric {
        return new Metric(this.label);
    }
}

export class Metric {
    static [DEFAULT_BUILDER] = MetricBuilder;

    constructor(readonly label: string) {}
}

/** Inherits Metric's marker property but must not use it. */
export class TopNMetric extends Metric {}

export class TrainTestTask implements EvalTask {
    constructor(readonly name: string, readonly folds: number) {}
}

export class CrossfoldTaskBuilder implements Builder<TrainTestTask> {
    name = "crossfold";
    folds = 5;

    build(): TrainTestTask {
        return new TrainTestTask(this.name, this.folds);
    }
}

export class NotABuilder {
    make(): string {
        return "nothing";
    }
}

/**
 * Type loader preloaded with the sample types under `test.*` names.
 */
export function createSampleTypes(): StaticTypeLoader {
    return new StaticTypeLoader()
        .define("test.data.DataSource", DataSource)
        .define("test.data.CsvDataSource", CsvDataSource)
        .define("test.data.CsvDataSourceBuilder", CsvDataSourceBuilder)
        .define("test.data.TsvDataSourceBuilder", TsvDataSourceBuilder)
        .define("test.metrics.Metric", Metric)
        .define("test.metrics.MetricBuilder", MetricBuilder)
        .define("test.eval.TrainTestTask", TrainTestTask)
        .define("test.eval.CrossfoldTaskBuilder", CrossfoldTaskBuilder)
        .define("test.misc.NotABuilder", NotABuilder);
}

/**
 * In-memory resource locator. Resources are returned in the order added.
 * A resource added with `null` text fails when read.
 */
export class MemoryResourceLocator implements ResourceLocator {
    private readonly resources: Array<{ path: string; origin: string; text: string | null }> = [];
    readonly lookups: string[] = [];

    add(path: string, origin: string, text: string | null): this {
        this.resources.push({ path, origin, text });
        return this;
    }

    find(path: string): ResourceHandle[] {
        this.lookups.push(path);
        return this.resources
            .filter(resource => resource.path === path)
            .map(({ origin, text }) => ({
                origin,
                read: () => {
                    if (text === null) {
                        throw new ResourceReadError(origin, { cause: new Error("permission denied") });
                    }
                    return text;
                },
            }));
    }
}

/**
 * Logger whose methods are spies.
 */
export function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}
