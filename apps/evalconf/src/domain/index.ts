/**
 * @fileoverview Domain barrel exports and type registration
 *
 * @module domain
 */

import { StaticTypeLoader } from "@evalconf/engine";
import { CsvDataSource, CsvDataSourceBuilder, DataSource } from "./data/DataSource.js";
import { CrossfoldTaskBuilder, HoldoutTaskBuilder, TrainTestTask } from "./eval/TrainTestTask.js";
import { Metric, MetricBuilder } from "./metrics/Metric.js";

export { CsvDataSource, CsvDataSourceBuilder, DataSource, isDataSource } from "./data/DataSource.js";
export { CrossfoldTaskBuilder, HoldoutTaskBuilder, TrainTestTask, type SplitMethod } from "./eval/TrainTestTask.js";
export { Metric, MetricBuilder } from "./metrics/Metric.js";

/**
 * Namespaces scripts can use short type names from.
 */
export const DOMAIN_IMPORTS = ["evalconf.data", "evalconf.eval", "evalconf.metrics"] as const;

/**
 * Define the built-in domain types under their `evalconf.*` names.
 *
 * @param types - Loader to extend (default: a new one)
 * @returns The same loader
 */
export function registerDomainTypes(types: StaticTypeLoader = new StaticTypeLoader()): StaticTypeLoader {
    return types
        .define("evalconf.data.DataSource", DataSource)
        .define("evalconf.data.CsvDataSource", CsvDataSource)
        .define("evalconf.data.CsvDataSourceBuilder", CsvDataSourceBuilder)
        .define("evalconf.eval.TrainTestTask", TrainTestTask)
        .define("evalconf.eval.CrossfoldTaskBuilder", CrossfoldTaskBuilder)
        .define("evalconf.eval.HoldoutTaskBuilder", HoldoutTaskBuilder)
        .define("evalconf.metrics.Metric", Metric)
        .define("evalconf.metrics.MetricBuilder", MetricBuilder);
}
