import { describe, expect, it } from "vitest";

import { loadSettings, parseInterval, parseLocations, slugify } from "./config";
import { DEFAULT_AGGREGATION_POLICY } from "./routes/aggregation/policy";
import { DEFAULT_METRICS } from "./routes/weatherProviders/OpenMeteo";
import { ErrorCode } from "./errors";

describe( "loadSettings", () => {
	it( "falls back to the defaults", () => {
		const settings = loadSettings( {} );

		expect( settings ).toMatchObject( {
			dataDir: "./data",
			configFile: "./config/locations.yaml",
			defaultStartDate: "2024-10-01",
			defaultEndDate: "2024-10-07",
			concurrency: 4,
			port: 3000,
			sentinels: [ -9999 ],
			writeCsv: false,
			aws: { region: undefined, bucket: undefined, prefix: "cloud-weather-data/" }
		} );
		expect( settings.metrics ).toBe( DEFAULT_METRICS );
		expect( settings.aggregationPolicy ).toBe( DEFAULT_AGGREGATION_POLICY );
		expect( Object.keys( settings ).sort() ).toEqual( [
			"aggregationPolicy",
			"aws",
			"concurrency",
			"configFile",
			"dataDir",
			"defaultEndDate",
			"defaultStartDate",
			"metrics",
			"port",
			"sentinels",
			"writeCsv"
		] );
	} );

	it( "reads lists, flags and the aggregation policy", () => {
		const settings = loadSettings( {
			METRICS: "temperature_2m, precipitation",
			SENTINELS: "-9999,-999",
			WRITE_CSV: "1",
			AGGREGATION_POLICY: "temperature_2m=mean",
			S3_BUCKET_NAME: " test-bucket ",
			CONCURRENCY: "8"
		} );

		expect( settings.metrics ).toEqual( [ "temperature_2m", "precipitation" ] );
		expect( settings.sentinels ).toEqual( [ -9999, -999 ] );
		expect( settings.writeCsv ).toBe( true );
		expect( settings.aggregationPolicy ).toEqual( { temperature_2m: [ "mean" ] } );
		expect( settings.aws.bucket ).toBe( "test-bucket" );
		expect( settings.concurrency ).toBe( 8 );
	} );

	it( "rejects unusable values", () => {
		expect( () => loadSettings( { CONCURRENCY: "0" } ) ).toThrow( expect.objectContaining( { errCode: ErrorCode.InvalidConfiguration } ) );
		expect( () => loadSettings( { WRITE_CSV: "maybe" } ) ).toThrow( expect.objectContaining( { errCode: ErrorCode.InvalidConfiguration } ) );
		expect( () => loadSettings( { DEFAULT_START_DATE: "2024-10-08" } ) ).toThrow( expect.objectContaining( { errCode: ErrorCode.InvalidInterval } ) );
	} );
} );

describe( "parseLocations", () => {
	it( "derives ids from names and defaults to UTC", () => {
		const locations = parseLocations( [
			"locations:",
			"  - name: New York",
			"    latitude: 40.71",
			"    longitude: -74.01",
			"    timezone: America/New_York",
			"  - name: Reykjavik",
			"    id: rvk",
			"    latitude: 64.15",
			"    longitude: -21.94"
		].join( "\n" ) );

		expect( locations ).toEqual( [
			{ id: "new_york", name: "New York", latitude: 40.71, longitude: -74.01, timezone: "America/New_York" },
			{ id: "rvk", name: "Reykjavik", latitude: 64.15, longitude: -21.94, timezone: "UTC" }
		] );
	} );

	it( "rejects duplicate ids, unknown timezones and bad coordinates", () => {
		const invalid = expect.objectContaining( { errCode: ErrorCode.InvalidConfiguration } );

		expect( () => parseLocations( "locations:\n  - {name: A, latitude: 1, longitude: 1}\n  - {name: a, latitude: 2, longitude: 2}\n" ) )
			.toThrow( invalid );
		expect( () => parseLocations( "locations:\n  - {name: A, latitude: 1, longitude: 1, timezone: Mars/Olympus}\n" ) )
			.toThrow( invalid );
		expect( () => parseLocations( "locations:\n  - {name: A, latitude: 91, longitude: 1}\n" ) )
			.toThrow( invalid );
	} );

	it( "treats an empty document as an empty registry", () => {
		expect( parseLocations( "" ) ).toEqual( [] );
	} );
} );

describe( "helpers", () => {
	it( "slugifies names", () => {
		expect( slugify( "  São Paulo (Centro) " ) ).toBe( "s_o_paulo_centro" );
	} );

	it( "rejects reversed intervals", () => {
		expect( parseInterval( " 2024-10-01 ", "2024-10-02" ) ).toEqual( { start: "2024-10-01", end: "2024-10-02" } );
		expect( () => parseInterval( "2024-10-02", "2024-10-01" ) ).toThrow( expect.objectContaining( { errCode: ErrorCode.InvalidInterval } ) );
	} );
} );
