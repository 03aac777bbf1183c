import {
	ArtifactDescriptor,
	ColumnSpec,
	DailyTable,
	MetricValue,
	UnifiedHourlyTable,
	isPresent
} from "../../types";
import { ArtifactOptions, artifactPath, coveredLocations } from "./ArtifactWriter";
import { writeTextAtomically } from "./atomic";
import { countColumn, dailyColumnSpecs, hourlyColumns } from "./schema";

function escapeCell( value: string ): string {
	return /[",\r\n]/.test( value ) ? `"${ value.replace( /"/g, "\"\"" ) }"` : value;
}

/** Missing values are empty cells. */
function metricCell( value: MetricValue | undefined ): string {
	return isPresent( value ) ? String( value.value ) : "";
}

export function hourlyToCsv( table: UnifiedHourlyTable ): string {
	const header = hourlyColumns( table.metrics ).map( ( column ) => column.name );
	const lines = table.records.map( ( record ) => [
		escapeCell( record.locationId ),
		new Date( record.timestamp ).toISOString(),
		...table.metrics.map( ( metric ) => metricCell( record.metrics[ metric ] ) )
	].join( "," ) );
	return [ header.map( escapeCell ).join( "," ), ...lines ].join( "\n" ) + "\n";
}

export function dailyToCsv( daily: DailyTable ): string {
	const columns = dailyColumnSpecs( daily );
	const lines = daily.records.map( ( record ) => {
		const cells: Record<string, string> = {
			location_id: escapeCell( record.locationId ),
			date: record.date,
			sample_count: String( record.sampleCount )
		};
		for ( const column of daily.columns ) {
			cells[ column.name ] = metricCell( record.values[ column.name ] );
		}
		for ( const metric of daily.metrics ) {
			cells[ countColumn( metric ) ] = String( record.counts[ metric ] ?? 0 );
		}
		return columns.map( ( column ) => cells[ column.name ] ?? "" ).join( "," );
	} );
	return [ columns.map( ( column ) => escapeCell( column.name ) ).join( "," ), ...lines ].join( "\n" ) + "\n";
}

async function writeCsv(
	contents: string,
	schema: readonly ColumnSpec[],
	rowCount: number,
	locations: readonly string[],
	options: ArtifactOptions
): Promise<ArtifactDescriptor> {
	const target = artifactPath( options, "csv" );
	await writeTextAtomically( target, contents );
	console.log( `[ArtifactWriter] ${ options.name } CSV mirror: ${ rowCount } rows -> ${ target }` );
	return {
		name: options.name,
		path: target,
		format: "csv",
		rowCount,
		schema,
		producedAt: new Date().toISOString(),
		interval: options.interval,
		locations
	};
}

export async function writeHourlyCsv( table: UnifiedHourlyTable, options: ArtifactOptions ): Promise<ArtifactDescriptor> {
	return writeCsv(
		hourlyToCsv( table ),
		hourlyColumns( table.metrics ),
		table.records.length,
		coveredLocations( options, table.records ),
		options
	);
}

export async function writeDailyCsv( daily: DailyTable, options: ArtifactOptions ): Promise<ArtifactDescriptor> {
	return writeCsv(
		dailyToCsv( daily ),
		dailyColumnSpecs( daily ),
		daily.records.length,
		coveredLocations( options, daily.records ),
		options
	);
}
