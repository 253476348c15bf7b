/**
 * @fileoverview Train/test evaluation tasks
 *
 * Scripts declare these through the named builders `crossfold` and
 * `holdout` (see `resources/eval-config/methods/`).
 *
 * @module domain/eval/TrainTestTask
 */

import { ConfigurationError, type Builder, type EvalTask } from "@evalconf/engine";
import { isDataSource, type DataSource } from "../data/DataSource.js";
import { Metric } from "../metrics/Metric.js";

/**
 * How ratings are split into train and test data.
 */
export type SplitMethod =
    | { readonly kind: "crossfold"; readonly folds: number }
    | { readonly kind: "holdout"; readonly testFraction: number };

export class TrainTestTask implements EvalTask {
    constructor(
        readonly name: string,
        readonly source: DataSource,
        readonly split: SplitMethod,
        readonly metrics: readonly Metric[]
    ) {}

    describe(): string {
        const split = this.split.kind === "crossfold"
            ? `${this.split.folds}-fold crossfold`
            : `holdout ${Math.round(this.split.testFraction * 100)}%`;
        const metrics = this.metrics.length > 0 ? this.metrics.map(metric => metric.label).join(", ") : "none";
        return `${this.name}: ${split} on ${this.source.describe()}; metrics ${metrics}`;
    }
}

/**
 * Fields shared by the train/test builders.
 */
abstract class TrainTestTaskBuilder implements Builder<TrainTestTask> {
    abstract name: string;
    source: unknown = null;
    metrics: unknown = [];

    abstract build(): TrainTestTask;

    protected requireSource(): DataSource {
        if (!isDataSource(this.source)) {
            throw new ConfigurationError(`task ${this.name} needs a data source`);
        }
        return this.source;
    }

    protected requireMetrics(): Metric[] {
        // Arrays built by scripts come from another realm; Array.isArray sees through that
        if (!Array.isArray(this.metrics)) {
            throw new ConfigurationError(`task ${this.name}: metrics must be a list`);
        }
        const metrics: Metric[] = [];
        for (const metric of this.metrics) {
            if (!(metric instanceof Metric)) {
                throw new ConfigurationError(`task ${this.name}: metrics must be built with build(type("Metric"))`);
            }
            metrics.push(metric);
        }
        return metrics;
    }
}

export class CrossfoldTaskBuilder extends TrainTestTaskBuilder {
    name = "crossfold";
    folds = 5;

    build(): TrainTestTask {
        if (!Number.isInteger(this.folds) || this.folds < 2) {
            throw new ConfigurationError(`task ${this.name}: folds must be an integer of at least 2`);
        }
        return new TrainTestTask(
            this.name,
            this.requireSource(),
            { kind: "crossfold", folds: this.folds },
            this.requireMetrics()
        );
    }
}

export class HoldoutTaskBuilder extends TrainTestTaskBuilder {
    name = "holdout";
    testFraction = 0.2;

    build(): TrainTestTask {
        if (!(this.testFraction > 0 && this.testFraction < 1)) {
            throw new ConfigurationError(`task ${this.name}: testFraction must be between 0 and 1`);
        }
        return new TrainTestTask(
            this.name,
            this.requireSource(),
            { kind: "holdout", testFraction: this.testFraction },
            this.requireMetrics()
        );
    }
}
