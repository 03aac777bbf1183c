import { createHash } from "node:crypto";
import path from "node:path";
import { ParquetRow, ParquetWriter } from "parquetjs-lite";

import {
	ArtifactDescriptor,
	ColumnSpec,
	DailyTable,
	DateInterval,
	UnifiedHourlyTable,
	isPresent
} from "../../types";
import { intervalBounds } from "../time";
import { writeAtomically } from "./atomic";
import {
	DATE_COLUMN,
	LOCATION_COLUMN,
	METADATA_KEYS,
	SAMPLE_COUNT_COLUMN,
	TIMESTAMP_COLUMN,
	countColumn,
	dailyColumnSpecs,
	hourlyColumns,
	toParquetSchema
} from "./schema";

export interface ArtifactOptions {
	/** Directory the artifact is written to. Created if missing. */
	outputDir: string;
	/** Logical table name, e.g. "hourly". */
	name: string;
	interval: DateInterval;
	/** Location ids the run was restricted to. Adds a hash of the ids to the path when given. */
	locations?: readonly string[];
}

/** First 10 hex characters of the sha256 over the sorted, comma joined location ids. */
export function locationsHash( locations: readonly string[] ): string {
	const joined = [ ...locations ].sort().join( "," );
	return createHash( "sha256" ).update( joined ).digest( "hex" ).slice( 0, 10 );
}

/**
 * The canonical path of an artifact:
 * `<outputDir>/<name>__<start>__<end>[__<locations hash>].<extension>`.
 * The same name, interval and location set always map to the same path.
 */
export function artifactPath( options: ArtifactOptions, extension = "parquet" ): string {
	const parts = [ options.name, options.interval.start, options.interval.end ];
	if ( options.locations && options.locations.length > 0 ) {
		parts.push( locationsHash( options.locations ) );
	}
	return path.join( options.outputDir, `${ parts.join( "__" ) }.${ extension }` );
}

/** Location ids an artifact covers, sorted. */
export function coveredLocations( options: ArtifactOptions, rows: readonly { locationId: string }[] ): string[] {
	const ids = options.locations ?? rows.map( ( row ) => row.locationId );
	return Array.from( new Set( ids ) ).sort();
}

async function writeParquet(
	target: string,
	columns: readonly ColumnSpec[],
	rows: readonly ParquetRow[],
	metadata: Record<string, string>
): Promise<void> {
	await writeAtomically( target, async ( tempPath ) => {
		const writer = await ParquetWriter.openFile( toParquetSchema( columns ), tempPath );
		try {
			for ( const [ key, value ] of Object.entries( metadata ) ) {
				writer.setMetadata( key, value );
			}
			for ( const row of rows ) {
				await writer.appendRow( row );
			}
		} finally {
			await writer.close();
		}
	} );
}

/** Writes the hourly table. Missing metric values become Parquet nulls. */
export async function writeHourlyArtifact(
	table: UnifiedHourlyTable,
	options: ArtifactOptions
): Promise<ArtifactDescriptor> {
	intervalBounds( options.interval );
	const target = artifactPath( options );
	const columns = hourlyColumns( table.metrics );
	const locations = coveredLocations( options, table.records );

	const rows = table.records.map( ( record ) => {
		const row: ParquetRow = {
			[ LOCATION_COLUMN ]: record.locationId,
			[ TIMESTAMP_COLUMN ]: record.timestamp
		};
		for ( const metric of table.metrics ) {
			const value = record.metrics[ metric ];
			if ( isPresent( value ) ) {
				row[ metric ] = value.value;
			}
		}
		return row;
	} );

	await writeParquet( target, columns, rows, {
		[ METADATA_KEYS.table ]: "hourly",
		[ METADATA_KEYS.metrics ]: JSON.stringify( table.metrics ),
		[ METADATA_KEYS.interval ]: JSON.stringify( options.interval ),
		[ METADATA_KEYS.locations ]: JSON.stringify( locations )
	} );

	console.log( `[ArtifactWriter] ${ options.name }: ${ rows.length } rows -> ${ target }` );

	return {
		name: options.name,
		path: target,
		format: "parquet",
		rowCount: rows.length,
		schema: columns,
		producedAt: new Date().toISOString(),
		interval: options.interval,
		locations
	};
}

/** Writes the daily table with one aggregate column per (metric, fn) and one count column per metric. */
export async function writeDailyArtifact(
	daily: DailyTable,
	options: ArtifactOptions
): Promise<ArtifactDescriptor> {
	intervalBounds( options.interval );
	const target = artifactPath( options );
	const columns = dailyColumnSpecs( daily );
	const locations = coveredLocations( options, daily.records );

	const rows = daily.records.map( ( record ) => {
		const row: ParquetRow = {
			[ LOCATION_COLUMN ]: record.locationId,
			[ DATE_COLUMN ]: record.date,
			[ SAMPLE_COUNT_COLUMN ]: record.sampleCount
		};
		for ( const column of daily.columns ) {
			const value = record.values[ column.name ];
			if ( isPresent( value ) ) {
				row[ column.name ] = value.value;
			}
		}
		for ( const metric of daily.metrics ) {
			row[ countColumn( metric ) ] = record.counts[ metric ] ?? 0;
		}
		return row;
	} );

	await writeParquet( target, columns, rows, {
		[ METADATA_KEYS.table ]: "daily",
		[ METADATA_KEYS.metrics ]: JSON.stringify( daily.metrics ),
		[ METADATA_KEYS.columns ]: JSON.stringify( daily.columns ),
		[ METADATA_KEYS.interval ]: JSON.stringify( options.interval ),
		[ METADATA_KEYS.locations ]: JSON.stringify( locations )
	} );

	console.log( `[ArtifactWriter] ${ options.name }: ${ rows.length } rows -> ${ target }` );

	return {
		name: options.name,
		path: target,
		format: "parquet",
		rowCount: rows.length,
		schema: columns,
		producedAt: new Date().toISOString(),
		interval: options.interval,
		locations
	};
}

function isDailyTable( table: UnifiedHourlyTable | DailyTable ): table is DailyTable {
	return "columns" in table;
}

/** Writes either table kind to its canonical path. */
export async function writeArtifact(
	table: UnifiedHourlyTable | DailyTable,
	options: ArtifactOptions
): Promise<ArtifactDescriptor> {
	return isDailyTable( table ) ? writeDailyArtifact( table, options ) : writeHourlyArtifact( table, options );
}
