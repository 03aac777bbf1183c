import { ParquetField, ParquetSchema } from "parquetjs-lite";

import { ColumnSpec, ColumnType, DailyTable } from "../../types";

export const LOCATION_COLUMN = "location_id";
export const TIMESTAMP_COLUMN = "timestamp";
export const DATE_COLUMN = "date";
export const SAMPLE_COUNT_COLUMN = "sample_count";

/** Key/value metadata stored in the Parquet footer. */
export const METADATA_KEYS = {
	table: "weather.table",
	metrics: "weather.metrics",
	columns: "weather.columns",
	interval: "weather.interval",
	locations: "weather.locations"
} as const;

export function countColumn( metric: string ): string {
	return `${ metric }_count`;
}

export function hourlyColumns( metrics: readonly string[] ): ColumnSpec[] {
	return [
		{ name: LOCATION_COLUMN, type: "string", optional: false },
		{ name: TIMESTAMP_COLUMN, type: "timestamp", optional: false },
		...metrics.map( ( metric ): ColumnSpec => ( { name: metric, type: "double", optional: true } ) )
	];
}

/** Per metric: its aggregate columns in policy order, then its count column. */
export function dailyColumnSpecs( daily: Pick<DailyTable, "metrics" | "columns"> ): ColumnSpec[] {
	const specs: ColumnSpec[] = [
		{ name: LOCATION_COLUMN, type: "string", optional: false },
		{ name: DATE_COLUMN, type: "date", optional: false },
		{ name: SAMPLE_COUNT_COLUMN, type: "int32", optional: false }
	];
	for ( const metric of daily.metrics ) {
		for ( const column of daily.columns.filter( ( candidate ) => candidate.metric === metric ) ) {
			specs.push( { name: column.name, type: "double", optional: true } );
		}
		specs.push( { name: countColumn( metric ), type: "int32", optional: false } );
	}
	return specs;
}

/** Timestamps are stored as INT64 epoch milliseconds; parquetjs-lite cannot read back TIMESTAMP_MILLIS statistics. */
const PARQUET_TYPES: Readonly<Record<ColumnType, string>> = {
	string: "UTF8",
	timestamp: "INT64",
	date: "UTF8",
	double: "DOUBLE",
	int32: "INT32"
};

export function toParquetSchema( columns: readonly ColumnSpec[] ): ParquetSchema {
	const fields: Record<string, ParquetField> = {};
	for ( const column of columns ) {
		fields[ column.name ] = { type: PARQUET_TYPES[ column.type ], optional: column.optional };
	}
	return new ParquetSchema( fields );
}
