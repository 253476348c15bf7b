/**
 * @fileoverview Accuracy metrics
 *
 * @module domain/metrics/Metric
 */

import { ConfigurationError, DEFAULT_BUILDER, type Builder } from "@evalconf/engine";

export class MetricBuilder implements Builder<Metric> {
    name = "rmse";
    cutoff: number | null = null;

    build(): Metric {
        if (this.cutoff !== null && (!Number.isInteger(this.cutoff) || this.cutoff < 1)) {
            throw new ConfigurationError(`metric ${this.name}: cutoff must be a positive integer`);
        }
        return new Metric(this.name, this.cutoff);
    }
}

/**
 * A named metric, optionally computed over the top-N of each list.
 *
 * Carries its own default builder, so it needs no manifest entry.
 */
export class Metric {
    static [DEFAULT_BUILDER] = MetricBuilder;

    constructor(
        readonly name: string,
        readonly cutoff: number | null
    ) {}

    get label(): string {
        return this.cutoff === null ? this.name : `${this.name}@${this.cutoff}`;
    }
}
