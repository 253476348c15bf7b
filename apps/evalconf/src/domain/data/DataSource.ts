/**
 * @fileoverview Rating data sources
 *
 * `DataSource` is the abstract type scripts ask for; the default builder
 * manifest maps it to {@link CsvDataSourceBuilder}.
 *
 * @module domain/data/DataSource
 */

import { ConfigurationError, type Builder } from "@evalconf/engine";

/**
 * Source of user/item ratings for an evaluation.
 */
export abstract class DataSource {
    abstract readonly path: string;

    /** One-line summary for reports */
    abstract describe(): string;
}

/**
 * Delimited text file with one rating per line.
 */
export class CsvDataSource extends DataSource {
    constructor(
        readonly path: string,
        readonly delimiter: string,
        readonly hasHeader: boolean
    ) {
        super();
    }

    describe(): string {
        const delimiter = this.delimiter === "\t" ? "\\t" : this.delimiter;
        return `csv ${this.path} (delimiter '${delimiter}'${this.hasHeader ? ", header" : ""})`;
    }
}

export class CsvDataSourceBuilder implements Builder<CsvDataSource> {
    path = "";
    delimiter = ",";
    hasHeader = true;

    build(): CsvDataSource {
        if (this.path.trim().length === 0) {
            throw new ConfigurationError("csv data source needs a path");
        }
        if (this.delimiter.length !== 1) {
            throw new ConfigurationError(`csv delimiter must be one character, got '${this.delimiter}'`);
        }
        return new CsvDataSource(this.path, this.delimiter, this.hasHeader);
    }
}

/**
 * Type guard for data sources coming back from scripts.
 */
export function isDataSource(value: unknown): value is DataSource {
    return value instanceof DataSource;
}
