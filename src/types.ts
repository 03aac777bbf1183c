/** Geographic coordinates. The 1st element is the latitude, and the 2nd element is the longitude. */
export type GeoCoordinates = [number, number];

/** A named point for which weather is tracked. */
export interface Location {
	/** Stable identifier used as the key of every table (e.g. "new_york"). */
	id: string;
	/** Display name from the location registry. */
	name: string;
	latitude: number;
	longitude: number;
	/** IANA timezone the provider reports local wall-clock times in (e.g. "Europe/Berlin"). */
	timezone: string;
}

/** A closed interval of UTC calendar dates. Both ends use the YYYY-MM-DD format. */
export interface DateInterval {
	start: string;
	end: string;
}

/** Where a sequence of observations came from. Archive data is observed, forecast data is predicted. */
export type SourceKind = "archive" | "forecast";

/**
 * A single metric reading. "No data" is its own variant so that aggregation code can never mistake it for zero.
 */
export type MetricValue =
	| { readonly kind: "value"; readonly value: number }
	| { readonly kind: "missing" };

export const MISSING: MetricValue = Object.freeze( { kind: "missing" } );

export function metricValue( value: number ): MetricValue {
	return { kind: "value", value };
}

export function isPresent( value: MetricValue | undefined ): value is { readonly kind: "value"; readonly value: number } {
	return value !== undefined && value.kind === "value";
}

/** One hourly reading for one location. */
export interface ObservationRecord {
	locationId: string;
	/** Unix epoch milliseconds, UTC, aligned to the start of an hour. */
	timestamp: number;
	/** One entry per metric of the table schema. */
	metrics: Readonly<Record<string, MetricValue>>;
}

/**
 * The merged hourly table. Records are ordered by (locationId, timestamp) ascending and every
 * (locationId, timestamp) pair occurs at most once.
 */
export interface UnifiedHourlyTable {
	/** The metric columns, in output order. */
	metrics: readonly string[];
	records: readonly ObservationRecord[];
}

export type AggregateFn = "min" | "max" | "mean" | "sum" | "circular_mean";

/** Which aggregate functions are computed for which metric when rolling hours up into days. */
export type AggregationPolicy = Readonly<Record<string, readonly AggregateFn[]>>;

/** A column of the daily table that holds one aggregate of one metric. */
export interface DailyColumn {
	/** Column name, `<metric>_<fn>`. */
	name: string;
	metric: string;
	fn: AggregateFn;
}

/** One aggregated row per location and UTC calendar day. */
export interface DailySummaryRecord {
	locationId: string;
	/** UTC calendar date (YYYY-MM-DD). */
	date: string;
	/** Number of hourly records of this day. Always between 1 and 24. */
	sampleCount: number;
	/** Aggregate values keyed by DailyColumn name. */
	values: Readonly<Record<string, MetricValue>>;
	/** Non-missing hourly values per aggregated metric. */
	counts: Readonly<Record<string, number>>;
}

export interface DailyTable {
	/** The aggregated metrics, in output order. */
	metrics: readonly string[];
	columns: readonly DailyColumn[];
	records: readonly DailySummaryRecord[];
}

export type ColumnType = "string" | "timestamp" | "date" | "double" | "int32";

export interface ColumnSpec {
	name: string;
	type: ColumnType;
	optional: boolean;
}

export type ArtifactFormat = "parquet" | "csv";

/** Metadata about a persisted table. */
export interface ArtifactDescriptor {
	/** Logical name, e.g. "hourly" or "daily". */
	name: string;
	path: string;
	format: ArtifactFormat;
	rowCount: number;
	schema: readonly ColumnSpec[];
	/** ISO 8601 instant the artifact was written at. */
	producedAt: string;
	interval: DateInterval;
	/** Location ids covered by the artifact, sorted. */
	locations: readonly string[];
}

/** Hours that a source should have delivered for a location but did not. */
export interface RangeGap {
	locationId: string;
	source: SourceKind;
	expectedHours: number;
	receivedHours: number;
	/** Unix epoch milliseconds of every hour without a record. */
	missingTimestamps: readonly number[];
}

/**
 * Result of a validation.
 */
export interface ValidationResult {
	/** Whether the validation passed */
	valid: boolean;

	/** Errors (blocking) */
	errors: string[];

	/** Warnings (non-blocking) */
	warnings: string[];
}
