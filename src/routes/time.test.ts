import { describe, expect, it } from "vitest";

import {
	hourlyTimestamps,
	intervalBounds,
	isHourAligned,
	parseDay,
	shiftDay,
	toUtcTimestamp,
	utcDayKey
} from "./time";
import { CodedError, ErrorCode } from "../errors";

function captureError( fn: () => unknown ): unknown {
	try {
		fn();
	} catch ( err ) {
		return err;
	}
	return undefined;
}

describe( "parseDay", () => {
	it( "returns UTC midnight", () => {
		expect( parseDay( "2024-10-01" ) ).toBe( Date.UTC( 2024, 9, 1 ) );
	} );

	it( "rejects impossible and malformed dates", () => {
		expect( parseDay( "2024-02-30" ) ).toBeUndefined();
		expect( parseDay( "2024-1-01" ) ).toBeUndefined();
		expect( parseDay( "yesterday" ) ).toBeUndefined();
	} );
} );

describe( "intervalBounds", () => {
	it( "covers every hour of a closed interval", () => {
		const bounds = intervalBounds( { start: "2024-10-01", end: "2024-10-03" } );
		expect( bounds ).toEqual( {
			firstHour: Date.UTC( 2024, 9, 1, 0 ),
			lastHour: Date.UTC( 2024, 9, 3, 23 ),
			days: 3,
			expectedHours: 72
		} );
	} );

	it( "accepts a single day", () => {
		expect( hourlyTimestamps( { start: "2024-10-01", end: "2024-10-01" } ) ).toHaveLength( 24 );
	} );

	it( "rejects a reversed interval", () => {
		const error = captureError( () => intervalBounds( { start: "2024-10-03", end: "2024-10-01" } ) );
		expect( error ).toBeInstanceOf( CodedError );
		expect( error instanceof CodedError && error.errCode ).toBe( ErrorCode.InvalidInterval );
	} );
} );

describe( "toUtcTimestamp", () => {
	it( "converts local wall-clock time with the declared zone", () => {
		expect( toUtcTimestamp( "2024-10-02T14:00", "Europe/Berlin" ) ).toBe( Date.UTC( 2024, 9, 2, 12 ) );
		expect( toUtcTimestamp( "2024-01-15T14:00", "Europe/Berlin" ) ).toBe( Date.UTC( 2024, 0, 15, 13 ) );
	} );

	it( "prefers the declared offset over the zone rules", () => {
		expect( toUtcTimestamp( "2024-10-02T01:00", "Europe/Berlin", { utcOffsetSeconds: 3600 } ) ).toBe( Date.UTC( 2024, 9, 2, 0 ) );
		expect( toUtcTimestamp( "2024-10-27T05:00", "Europe/Berlin", { utcOffsetSeconds: 7200 } ) ).toBe( Date.UTC( 2024, 9, 27, 3 ) );
	} );

	it( "tells the two occurrences of the repeated autumn hour apart", () => {
		expect( toUtcTimestamp( "2024-10-27T02:00", "Europe/Berlin" ) ).toBe( Date.UTC( 2024, 9, 27, 0 ) );
		expect( toUtcTimestamp( "2024-10-27T02:00", "Europe/Berlin", { repeated: true } ) ).toBe( Date.UTC( 2024, 9, 27, 1 ) );
	} );

	it( "rejects the hour skipped in spring", () => {
		expect( toUtcTimestamp( "2024-03-31T02:00", "Europe/Berlin" ) ).toBeUndefined();
	} );

	it( "treats GMT wall-clock time as UTC", () => {
		expect( toUtcTimestamp( "2024-10-02T14:00", "GMT" ) ).toBe( Date.UTC( 2024, 9, 2, 14 ) );
	} );

	it( "keeps explicit offsets", () => {
		expect( toUtcTimestamp( "2024-10-02T14:00Z", "Europe/Berlin" ) ).toBe( Date.UTC( 2024, 9, 2, 14 ) );
		expect( toUtcTimestamp( "2024-10-02T14:00+02:00", "UTC" ) ).toBe( Date.UTC( 2024, 9, 2, 12 ) );
	} );

	it( "reads numbers as unix seconds", () => {
		expect( toUtcTimestamp( 1727870400, "Europe/Berlin" ) ).toBe( 1727870400000 );
	} );

	it( "returns undefined for unreadable values", () => {
		expect( toUtcTimestamp( "not a time", "UTC" ) ).toBeUndefined();
		expect( toUtcTimestamp( Number.NaN, "UTC" ) ).toBeUndefined();
	} );
} );

describe( "calendar helpers", () => {
	it( "keys instants by their UTC date", () => {
		expect( utcDayKey( Date.UTC( 2024, 9, 2, 23 ) ) ).toBe( "2024-10-02" );
		expect( utcDayKey( Date.UTC( 2024, 9, 3, 0 ) ) ).toBe( "2024-10-03" );
	} );

	it( "shifts dates across month ends", () => {
		expect( shiftDay( "2024-03-01", -1 ) ).toBe( "2024-02-29" );
		expect( shiftDay( "2024-12-31", 1 ) ).toBe( "2025-01-01" );
	} );

	it( "checks hour alignment", () => {
		expect( isHourAligned( Date.UTC( 2024, 9, 2, 14 ) ) ).toBe( true );
		expect( isHourAligned( Date.UTC( 2024, 9, 2, 14, 30 ) ) ).toBe( false );
	} );
} );
