import { createHash } from "node:crypto";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ParquetReader } from "parquetjs-lite";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { artifactPath, locationsHash, writeArtifact, writeDailyArtifact, writeHourlyArtifact } from "./ArtifactWriter";
import { readDailyArtifact, readHourlyArtifact } from "./ArtifactReader";
import { DailyTable, MISSING, UnifiedHourlyTable, metricValue } from "../../types";
import { ErrorCode } from "../../errors";

const INTERVAL = { start: "2024-10-01", end: "2024-10-02" };

const hourly: UnifiedHourlyTable = {
	metrics: [ "temperature_2m", "precipitation" ],
	records: [
		{ locationId: "alpha", timestamp: Date.UTC( 2024, 9, 1, 0 ), metrics: { temperature_2m: metricValue( 11.25 ), precipitation: metricValue( 0 ) } },
		{ locationId: "alpha", timestamp: Date.UTC( 2024, 9, 1, 1 ), metrics: { temperature_2m: MISSING, precipitation: metricValue( 0.4 ) } },
		{ locationId: "beta", timestamp: Date.UTC( 2024, 9, 2, 23 ), metrics: { temperature_2m: metricValue( -3.5 ), precipitation: MISSING } }
	]
};

const daily: DailyTable = {
	metrics: [ "temperature_2m", "precipitation" ],
	columns: [
		{ name: "temperature_2m_min", metric: "temperature_2m", fn: "min" },
		{ name: "temperature_2m_max", metric: "temperature_2m", fn: "max" },
		{ name: "precipitation_sum", metric: "precipitation", fn: "sum" }
	],
	records: [
		{
			locationId: "alpha",
			date: "2024-10-01",
			sampleCount: 2,
			values: { temperature_2m_min: metricValue( 11.25 ), temperature_2m_max: metricValue( 11.25 ), precipitation_sum: metricValue( 0.4 ) },
			counts: { temperature_2m: 1, precipitation: 2 }
		},
		{
			locationId: "beta",
			date: "2024-10-02",
			sampleCount: 1,
			values: { temperature_2m_min: metricValue( -3.5 ), temperature_2m_max: metricValue( -3.5 ), precipitation_sum: MISSING },
			counts: { temperature_2m: 1, precipitation: 0 }
		}
	]
};

describe( "artifactPath", () => {
	it( "is derived from name and interval", () => {
		expect( artifactPath( { outputDir: "/out", name: "hourly", interval: INTERVAL } ) )
			.toBe( path.join( "/out", "hourly__2024-10-01__2024-10-02.parquet" ) );
	} );

	it( "adds a hash of the sorted location ids", () => {
		const expected = createHash( "sha256" ).update( "alpha,beta" ).digest( "hex" ).slice( 0, 10 );
		expect( locationsHash( [ "beta", "alpha" ] ) ).toBe( expected );
		expect( artifactPath( { outputDir: "/out", name: "daily", interval: INTERVAL, locations: [ "beta", "alpha" ] }, "csv" ) )
			.toBe( path.join( "/out", `daily__2024-10-01__2024-10-02__${ expected }.csv` ) );
	} );
} );

describe( "Parquet artifacts", () => {
	let directory: string;

	beforeEach( async () => {
		directory = await mkdtemp( path.join( tmpdir(), "artifacts-" ) );
	} );

	afterEach( async () => {
		await rm( directory, { recursive: true, force: true } );
	} );

	it( "round-trips the hourly table", async () => {
		const descriptor = await writeHourlyArtifact( hourly, { outputDir: directory, name: "hourly", interval: INTERVAL } );

		expect( descriptor ).toMatchObject( {
			name: "hourly",
			path: path.join( directory, "hourly__2024-10-01__2024-10-02.parquet" ),
			format: "parquet",
			rowCount: 3,
			interval: INTERVAL,
			locations: [ "alpha", "beta" ]
		} );
		expect( descriptor.schema.map( ( column ) => `${ column.name }:${ column.type }` ) ).toEqual( [
			"location_id:string",
			"timestamp:timestamp",
			"temperature_2m:double",
			"precipitation:double"
		] );
		expect( await readHourlyArtifact( descriptor.path ) ).toEqual( hourly );
	} );

	it( "stores timestamps as epoch milliseconds that open again", async () => {
		const descriptor = await writeHourlyArtifact( hourly, { outputDir: directory, name: "hourly", interval: INTERVAL } );

		const reader = await ParquetReader.openFile( descriptor.path );
		try {
			const first = await reader.getCursor().next();
			expect( first?.timestamp ).toBe( BigInt( Date.UTC( 2024, 9, 1, 0 ) ) );
		} finally {
			await reader.close();
		}
	} );

	it( "round-trips the daily table with its counts", async () => {
		const descriptor = await writeDailyArtifact( daily, { outputDir: directory, name: "daily", interval: INTERVAL } );

		expect( descriptor.schema.map( ( column ) => column.name ) ).toEqual( [
			"location_id",
			"date",
			"sample_count",
			"temperature_2m_min",
			"temperature_2m_max",
			"temperature_2m_count",
			"precipitation_sum",
			"precipitation_count"
		] );
		expect( await readDailyArtifact( descriptor.path ) ).toEqual( daily );
	} );

	it( "overwrites the same artifact on a rerun", async () => {
		const options = { outputDir: directory, name: "hourly", interval: INTERVAL };
		const first = await writeArtifact( hourly, options );
		const firstRows = await readHourlyArtifact( first.path );
		const second = await writeArtifact( hourly, options );

		expect( second.path ).toBe( first.path );
		expect( await readHourlyArtifact( second.path ) ).toEqual( firstRows );
		expect( await readdir( directory ) ).toEqual( [ path.basename( first.path ) ] );
	} );

	it( "refuses to read an artifact as the other table kind", async () => {
		const descriptor = await writeHourlyArtifact( hourly, { outputDir: directory, name: "hourly", interval: INTERVAL } );

		await expect( readDailyArtifact( descriptor.path ) ).rejects.toMatchObject( { errCode: ErrorCode.ReadFailure } );
	} );

	it( "reports a missing file as ReadFailure", async () => {
		await expect( readHourlyArtifact( path.join( directory, "absent.parquet" ) ) )
			.rejects.toMatchObject( { errCode: ErrorCode.ReadFailure } );
	} );

	it( "rejects an invalid interval before writing", async () => {
		await expect( writeHourlyArtifact( hourly, { outputDir: directory, name: "hourly", interval: { start: "2024-10-02", end: "2024-10-01" } } ) )
			.rejects.toMatchObject( { errCode: ErrorCode.InvalidInterval } );
		expect( await readdir( directory ) ).toEqual( [] );
	} );
} );
