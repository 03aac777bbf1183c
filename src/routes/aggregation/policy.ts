import { AggregateFn, AggregationPolicy } from "../../types";
import { CodedError, ErrorCode } from "../../errors";

/**
 * Default roll-up of hourly metrics into daily values.
 *
 * Accumulating metrics (precipitation, rain, snowfall) are summed, never averaged. Wind direction is an
 * angle and uses the circular mean. Metrics without an entry are not aggregated.
 */
export const DEFAULT_AGGREGATION_POLICY: AggregationPolicy = {
	temperature_2m: [ "min", "max", "mean" ],
	relative_humidity_2m: [ "mean" ],
	dew_point_2m: [ "min", "max", "mean" ],
	apparent_temperature: [ "min", "max", "mean" ],
	precipitation: [ "sum" ],
	rain: [ "sum" ],
	snowfall: [ "sum" ],
	cloudcover: [ "mean" ],
	pressure_msl: [ "mean" ],
	windspeed_10m: [ "max", "mean" ],
	winddirection_10m: [ "circular_mean" ]
};

const AGGREGATE_FNS: ReadonlySet<string> = new Set<AggregateFn>( [ "min", "max", "mean", "sum", "circular_mean" ] );

export function isAggregateFn( value: string ): value is AggregateFn {
	return AGGREGATE_FNS.has( value );
}

/** Rejects entries without functions and duplicate functions for a metric. */
export function validatePolicy( policy: AggregationPolicy ): void {
	for ( const [ metric, fns ] of Object.entries( policy ) ) {
		if ( fns.length === 0 ) {
			throw new CodedError( ErrorCode.InvalidConfiguration, `Aggregation policy for '${ metric }' lists no functions` );
		}
		if ( new Set( fns ).size !== fns.length ) {
			throw new CodedError( ErrorCode.InvalidConfiguration, `Aggregation policy for '${ metric }' lists a function twice` );
		}
		for ( const fn of fns ) {
			if ( !isAggregateFn( fn ) ) {
				throw new CodedError( ErrorCode.InvalidConfiguration, `Unknown aggregate '${ fn }' for '${ metric }'` );
			}
		}
	}
}

/**
 * Parses a policy from its textual form, `metric=fn[+fn...]` entries separated by commas
 * (e.g. "temperature_2m=min+max+mean,precipitation=sum").
 */
export function parsePolicy( text: string ): AggregationPolicy {
	const policy: Record<string, AggregateFn[]> = {};
	for ( const entry of text.split( "," ).map( ( part ) => part.trim() ).filter( Boolean ) ) {
		const [ metric, fnList ] = entry.split( "=" ).map( ( part ) => part.trim() );
		if ( !metric || !fnList ) {
			throw new CodedError( ErrorCode.InvalidConfiguration, `Malformed aggregation entry '${ entry }'` );
		}
		const fns = fnList.split( "+" ).map( ( fn ) => fn.trim() );
		const unknown = fns.find( ( fn ) => !isAggregateFn( fn ) );
		if ( unknown !== undefined ) {
			throw new CodedError( ErrorCode.InvalidConfiguration, `Unknown aggregate '${ unknown }' for '${ metric }'` );
		}
		policy[ metric ] = fns.filter( isAggregateFn );
	}
	validatePolicy( policy );
	return policy;
}
