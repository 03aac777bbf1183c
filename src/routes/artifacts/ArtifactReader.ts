import { ParquetReader, ParquetRow } from "parquetjs-lite";
import { z } from "zod";

import {
	DailySummaryRecord,
	DailyTable,
	MISSING,
	MetricValue,
	ObservationRecord,
	UnifiedHourlyTable,
	metricValue
} from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import {
	DATE_COLUMN,
	LOCATION_COLUMN,
	METADATA_KEYS,
	SAMPLE_COUNT_COLUMN,
	TIMESTAMP_COLUMN,
	countColumn
} from "./schema";

const metricsSchema = z.array( z.string() );
const columnsSchema = z.array( z.object( {
	name: z.string(),
	metric: z.string(),
	fn: z.enum( [ "min", "max", "mean", "sum", "circular_mean" ] )
} ) );

interface ParquetContents {
	metadata: Record<string, string>;
	rows: ParquetRow[];
}

async function readParquet( file: string ): Promise<ParquetContents> {
	let reader: ParquetReader;
	try {
		reader = await ParquetReader.openFile( file );
	} catch ( err ) {
		throw new CodedError(
			ErrorCode.ReadFailure,
			`Could not open ${ file }: ${ err instanceof Error ? err.message : String( err ) }`,
			{ cause: err }
		);
	}

	try {
		const metadata = reader.getMetadata();
		const cursor = reader.getCursor();
		const rows: ParquetRow[] = [];
		let row = await cursor.next();
		while ( row ) {
			rows.push( row );
			row = await cursor.next();
		}
		return { metadata, rows };
	} catch ( err ) {
		throw new CodedError(
			ErrorCode.ReadFailure,
			`Could not read ${ file }: ${ err instanceof Error ? err.message : String( err ) }`,
			{ cause: err }
		);
	} finally {
		await reader.close();
	}
}

function readJsonMetadata<T>( contents: ParquetContents, key: string, schema: z.ZodType<T>, file: string ): T {
	const raw = contents.metadata[ key ];
	if ( raw === undefined ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file } carries no '${ key }' metadata` );
	}
	let value: unknown;
	try {
		value = JSON.parse( raw );
	} catch ( err ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file }: '${ key }' metadata is not JSON`, { cause: err } );
	}
	const parsed = schema.safeParse( value );
	if ( !parsed.success ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file }: '${ key }' metadata is malformed` );
	}
	return parsed.data;
}

function expectTable( contents: ParquetContents, table: "hourly" | "daily", file: string ): void {
	const actual = contents.metadata[ METADATA_KEYS.table ];
	if ( actual !== table ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file } holds a '${ actual ?? "unknown" }' table, expected '${ table }'` );
	}
}

function readString( row: ParquetRow, column: string, file: string ): string {
	const value = row[ column ];
	if ( typeof value !== "string" ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file }: column '${ column }' is not a string` );
	}
	return value;
}

function readInteger( row: ParquetRow, column: string, file: string ): number {
	const value = row[ column ];
	const number = typeof value === "bigint" ? Number( value ) : value;
	if ( typeof number !== "number" || !Number.isInteger( number ) ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file }: column '${ column }' is not an integer` );
	}
	return number;
}

function readTimestamp( row: ParquetRow, column: string, file: string ): number {
	const value = row[ column ];
	if ( value instanceof Date ) {
		return value.getTime();
	}
	const millis = typeof value === "bigint" ? Number( value ) : value;
	if ( typeof millis !== "number" || !Number.isInteger( millis ) ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file }: column '${ column }' is not a timestamp` );
	}
	return millis;
}

/** Absent and null cells are MISSING. */
function readMetric( row: ParquetRow, column: string, file: string ): MetricValue {
	const value = row[ column ];
	if ( value === undefined || value === null ) {
		return MISSING;
	}
	if ( typeof value !== "number" ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ file }: column '${ column }' is not numeric` );
	}
	return metricValue( value );
}

export async function readHourlyArtifact( file: string ): Promise<UnifiedHourlyTable> {
	const contents = await readParquet( file );
	expectTable( contents, "hourly", file );
	const metrics = readJsonMetadata( contents, METADATA_KEYS.metrics, metricsSchema, file );

	const records: ObservationRecord[] = contents.rows.map( ( row ) => {
		const values: Record<string, MetricValue> = {};
		for ( const metric of metrics ) {
			values[ metric ] = readMetric( row, metric, file );
		}
		return {
			locationId: readString( row, LOCATION_COLUMN, file ),
			timestamp: readTimestamp( row, TIMESTAMP_COLUMN, file ),
			metrics: values
		};
	} );

	return { metrics, records };
}

export async function readDailyArtifact( file: string ): Promise<DailyTable> {
	const contents = await readParquet( file );
	expectTable( contents, "daily", file );
	const metrics = readJsonMetadata( contents, METADATA_KEYS.metrics, metricsSchema, file );
	const columns = readJsonMetadata( contents, METADATA_KEYS.columns, columnsSchema, file );

	const records: DailySummaryRecord[] = contents.rows.map( ( row ) => {
		const values: Record<string, MetricValue> = {};
		for ( const column of columns ) {
			values[ column.name ] = readMetric( row, column.name, file );
		}
		const counts: Record<string, number> = {};
		for ( const metric of metrics ) {
			counts[ metric ] = readInteger( row, countColumn( metric ), file );
		}
		return {
			locationId: readString( row, LOCATION_COLUMN, file ),
			date: readString( row, DATE_COLUMN, file ),
			sampleCount: readInteger( row, SAMPLE_COUNT_COLUMN, file ),
			values,
			counts
		};
	} );

	return { metrics, columns, records };
}
