import { DailyTable, MISSING, MetricValue, isPresent, metricValue } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { parseDay, DAY_MS } from "../time";

export interface TrendPoint {
	locationId: string;
	date: string;
	value: MetricValue;
	/** Change against the previous calendar day. MISSING if either day has no value. */
	delta: MetricValue;
	/** Mean of the present values of the trailing `window` calendar days, this day included. */
	rollingMean: MetricValue;
}

/**
 * Day-over-day change and trailing rolling mean of one daily column, per location.
 * Days absent from the table break the day-over-day chain and shrink the rolling window.
 */
export function computeTrends( daily: DailyTable, column: string, window = 7 ): TrendPoint[] {
	if ( !Number.isInteger( window ) || window < 1 ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `Trend window must be a positive integer, got ${ window }` );
	}
	if ( !daily.columns.some( ( candidate ) => candidate.name === column ) ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `Unknown daily column '${ column }'` );
	}

	const byLocation = new Map<string, { day: number; date: string; value: MetricValue }[]>();
	for ( const record of daily.records ) {
		const day = parseDay( record.date );
		if ( day === undefined ) {
			continue;
		}
		const series = byLocation.get( record.locationId ) ?? [];
		series.push( { day, date: record.date, value: record.values[ column ] ?? MISSING } );
		byLocation.set( record.locationId, series );
	}

	const points: TrendPoint[] = [];
	for ( const [ locationId, series ] of byLocation ) {
		series.sort( ( a, b ) => a.day - b.day );

		series.forEach( ( current, index ) => {
			const previous = index > 0 ? series[ index - 1 ] : undefined;
			let delta = MISSING;
			if ( previous && current.day - previous.day === DAY_MS && isPresent( previous.value ) && isPresent( current.value ) ) {
				delta = metricValue( current.value.value - previous.value.value );
			}

			const windowStart = current.day - ( window - 1 ) * DAY_MS;
			const inWindow = series
				.slice( 0, index + 1 )
				.filter( ( entry ) => entry.day >= windowStart )
				.map( ( entry ) => entry.value )
				.filter( isPresent );
			const rollingMean = inWindow.length === 0
				? MISSING
				: metricValue( inWindow.reduce( ( sum, entry ) => sum + entry.value, 0 ) / inWindow.length );

			points.push( { locationId, date: current.date, value: current.value, delta, rollingMean } );
		} );
	}

	return points;
}
