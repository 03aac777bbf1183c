import {
	AggregateFn,
	AggregationPolicy,
	DailyColumn,
	DailySummaryRecord,
	DailyTable,
	MISSING,
	MetricValue,
	ObservationRecord,
	UnifiedHourlyTable,
	isPresent,
	metricValue
} from "../../types";
import { DEFAULT_AGGREGATION_POLICY, validatePolicy } from "./policy";
import { degreesToRadians, normalizeWindDirection, radiansToDegrees } from "../normalization/converters";
import { utcDayKey } from "../time";

/**
 * Rolls the hourly table up into one row per (location, UTC calendar day).
 *
 * Counting: `sampleCount` is the number of hourly records of the day, each record counting as one
 * unit whatever its missing values. Every aggregated metric also gets `<metric>_count`, the number of
 * its non-missing hourly values, and its aggregates are computed over exactly those values. An
 * aggregate over zero values is MISSING.
 */

function circularMean( degrees: readonly number[] ): number | undefined {
	let sin = 0;
	let cos = 0;
	for ( const value of degrees ) {
		sin += Math.sin( degreesToRadians( value ) );
		cos += Math.cos( degreesToRadians( value ) );
	}
	sin /= degrees.length;
	cos /= degrees.length;
	// Opposing directions cancel out and leave no meaningful mean.
	if ( Math.hypot( sin, cos ) < 1e-9 ) {
		return undefined;
	}
	return normalizeWindDirection( radiansToDegrees( Math.atan2( sin, cos ) ) );
}

export function applyAggregate( fn: AggregateFn, values: readonly number[] ): MetricValue {
	if ( values.length === 0 ) {
		return MISSING;
	}
	switch ( fn ) {
		case "min":
			return metricValue( values.reduce( ( min, value ) => ( value < min ? value : min ), Infinity ) );
		case "max":
			return metricValue( values.reduce( ( max, value ) => ( value > max ? value : max ), -Infinity ) );
		case "sum":
			return metricValue( values.reduce( ( sum, value ) => sum + value, 0 ) );
		case "mean":
			return metricValue( values.reduce( ( sum, value ) => sum + value, 0 ) / values.length );
		case "circular_mean": {
			const mean = circularMean( values );
			return mean === undefined ? MISSING : metricValue( mean );
		}
	}
}

/** The daily columns a policy produces for the metrics of a table, in table order. */
export function dailyColumns( metrics: readonly string[], policy: AggregationPolicy ): DailyColumn[] {
	return metrics.flatMap( ( metric ) =>
		( policy[ metric ] ?? [] ).map( ( fn ) => ( { name: `${ metric }_${ fn }`, metric, fn } ) )
	);
}

interface DayGroup {
	locationId: string;
	date: string;
	records: ObservationRecord[];
}

export function aggregateDaily(
	table: UnifiedHourlyTable,
	policy: AggregationPolicy = DEFAULT_AGGREGATION_POLICY
): DailyTable {
	validatePolicy( policy );

	const metrics = table.metrics.filter( ( metric ) => policy[ metric ] !== undefined );
	const unaggregated = table.metrics.filter( ( metric ) => policy[ metric ] === undefined );
	if ( unaggregated.length > 0 ) {
		console.log( `[DailyAggregator] No aggregation policy for ${ unaggregated.join( ", " ) }; not included in the daily table` );
	}
	const unknown = Object.keys( policy ).filter( ( metric ) => !table.metrics.includes( metric ) );
	if ( unknown.length > 0 ) {
		console.warn( `[DailyAggregator] Policy lists metrics missing from the hourly table: ${ unknown.join( ", " ) }` );
	}

	const columns = dailyColumns( metrics, policy );
	const groups = new Map<string, DayGroup>();

	for ( const record of table.records ) {
		const date = utcDayKey( record.timestamp );
		const key = `${ record.locationId }\u0000${ date }`;
		let group = groups.get( key );
		if ( !group ) {
			group = { locationId: record.locationId, date, records: [] };
			groups.set( key, group );
		}
		group.records.push( record );
	}

	const records: DailySummaryRecord[] = Array.from( groups.values() ).map( ( group ) => {
		const values: Record<string, MetricValue> = {};
		const counts: Record<string, number> = {};

		for ( const metric of metrics ) {
			const present = group.records
				.map( ( record ) => record.metrics[ metric ] )
				.filter( isPresent )
				.map( ( value ) => value.value );
			counts[ metric ] = present.length;
			for ( const fn of policy[ metric ] ?? [] ) {
				values[ `${ metric }_${ fn }` ] = applyAggregate( fn, present );
			}
		}

		return {
			locationId: group.locationId,
			date: group.date,
			sampleCount: group.records.length,
			values,
			counts
		};
	} );

	records.sort( ( a, b ) => {
		if ( a.locationId !== b.locationId ) {
			return a.locationId < b.locationId ? -1 : 1;
		}
		return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
	} );

	console.log( `[DailyAggregator] ${ table.records.length } hourly rows -> ${ records.length } daily rows, ${ columns.length } aggregate columns` );

	return { metrics, columns, records };
}
