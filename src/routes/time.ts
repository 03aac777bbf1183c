import { TZDate } from "@date-fns/tz";
import { addDays, format } from "date-fns";

import { DateInterval } from "../types";
import { CodedError, ErrorCode } from "../errors";

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const WALL_CLOCK_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?$/;
const EXPLICIT_OFFSET_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const UTC_ZONES = new Set( [ "utc", "gmt", "etc/utc", "etc/gmt", "z" ] );

export function isUtcZone( timezone: string ): boolean {
	return UTC_ZONES.has( timezone.trim().toLowerCase() );
}

/** Whether the runtime knows the IANA timezone. */
export function isValidTimeZone( timezone: string ): boolean {
	try {
		new Intl.DateTimeFormat( "en-US", { timeZone: timezone } );
		return true;
	} catch {
		return false;
	}
}

/**
 * Parses a YYYY-MM-DD calendar date into the epoch milliseconds of its UTC midnight.
 * Returns undefined for malformed or impossible dates such as 2024-02-30.
 */
export function parseDay( day: string ): number | undefined {
	const match = DAY_PATTERN.exec( day );
	if ( !match ) {
		return undefined;
	}
	const [ year, month, date ] = [ Number( match[ 1 ] ), Number( match[ 2 ] ), Number( match[ 3 ] ) ];
	const utc = TZDate.tz( "UTC", year, month - 1, date );
	if ( utc.getFullYear() !== year || utc.getMonth() !== month - 1 || utc.getDate() !== date ) {
		return undefined;
	}
	return utc.getTime();
}

/** The UTC calendar date (YYYY-MM-DD) an instant falls on. */
export function utcDayKey( timestamp: number ): string {
	return format( new TZDate( timestamp, "UTC" ), "yyyy-MM-dd" );
}

/** Shifts a YYYY-MM-DD date by whole days. */
export function shiftDay( day: string, days: number ): string {
	const start = parseDay( day );
	if ( start === undefined ) {
		throw new CodedError( ErrorCode.InvalidInterval, `Invalid date '${ day }'` );
	}
	return format( addDays( new TZDate( start, "UTC" ), days ), "yyyy-MM-dd" );
}

export function isHourAligned( timestamp: number ): boolean {
	return Number.isInteger( timestamp ) && timestamp % HOUR_MS === 0;
}

export interface IntervalBounds {
	/** First hour of the start date (00:00Z). */
	firstHour: number;
	/** Last hour of the end date (23:00Z). */
	lastHour: number;
	days: number;
	expectedHours: number;
}

/** Validates a closed date interval and returns its first and last hour. */
export function intervalBounds( interval: DateInterval ): IntervalBounds {
	const start = parseDay( interval.start );
	const end = parseDay( interval.end );
	if ( start === undefined || end === undefined ) {
		throw new CodedError( ErrorCode.InvalidInterval, `Invalid date interval ${ interval.start } .. ${ interval.end }` );
	}
	if ( end < start ) {
		throw new CodedError( ErrorCode.InvalidInterval, `Interval end ${ interval.end } is before start ${ interval.start }` );
	}

	const days = Math.round( ( end - start ) / DAY_MS ) + 1;
	return { firstHour: start, lastHour: end + 23 * HOUR_MS, days, expectedHours: days * 24 };
}

/** Every hour of the interval, ascending. */
export function hourlyTimestamps( interval: DateInterval ): number[] {
	const { firstHour, expectedHours } = intervalBounds( interval );
	return Array.from( { length: expectedHours }, ( _, i ) => firstHour + i * HOUR_MS );
}

export interface TimestampOptions {
	/** Offset the provider declares for its wall-clock times. Takes precedence over the zone rules. */
	utcOffsetSeconds?: number;
	/** The wall-clock time was already seen in this payload: take the second of two instants. */
	repeated?: boolean;
}

/** The wall-clock time of an instant in `timezone`, encoded as if it were UTC. */
function wallClockOf( instant: number, timezone: string ): number {
	const local = new TZDate( instant, timezone );
	return Date.UTC(
		local.getFullYear(),
		local.getMonth(),
		local.getDate(),
		local.getHours(),
		local.getMinutes(),
		local.getSeconds()
	);
}

/**
 * Converts a provider timestamp to UTC epoch milliseconds.
 *
 * - numbers are unix epoch seconds
 * - strings with `Z` or an explicit offset are absolute instants
 * - other strings are wall-clock times at the declared `utcOffsetSeconds`, or, without one, in
 *   `timezone`. A wall-clock time that occurs twice when daylight saving time ends is the earlier
 *   instant unless `repeated` is set.
 *
 * Returns undefined if the value cannot be read or names a local time the zone skips.
 */
export function toUtcTimestamp( raw: string | number, timezone: string, options: TimestampOptions = {} ): number | undefined {
	if ( typeof raw === "number" ) {
		return Number.isFinite( raw ) ? Math.round( raw * 1000 ) : undefined;
	}

	const text = raw.trim();
	if ( EXPLICIT_OFFSET_PATTERN.test( text ) ) {
		const parsed = Date.parse( text );
		return Number.isNaN( parsed ) ? undefined : parsed;
	}

	const match = WALL_CLOCK_PATTERN.exec( text );
	if ( !match ) {
		return undefined;
	}
	const [ year, month, day, hour, minute, second ] = match.slice( 1 ).map( ( part ) => Number( part ?? 0 ) );
	const wallClock = Date.UTC( year, month - 1, day, hour, minute, second );

	if ( options.utcOffsetSeconds !== undefined ) {
		return wallClock - options.utcOffsetSeconds * 1000;
	}
	if ( isUtcZone( timezone ) ) {
		return wallClock;
	}

	const guess = TZDate.tz( timezone, year, month - 1, day, hour, minute, second ).getTime();
	if ( Number.isNaN( guess ) ) {
		return undefined;
	}
	const candidates = [ guess - HOUR_MS, guess, guess + HOUR_MS ]
		.filter( ( instant ) => wallClockOf( instant, timezone ) === wallClock );
	if ( candidates.length === 0 ) {
		return undefined;
	}
	return options.repeated ? candidates[ candidates.length - 1 ] : candidates[ 0 ];
}
