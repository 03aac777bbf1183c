import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { PutObjectCommand } from "@aws-sdk/client-s3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { objectKey, uploadArtifacts } from "./S3Archiver";
import { ErrorCode } from "../../errors";

describe( "objectKey", () => {
	it( "joins prefix and file name", () => {
		expect( objectKey( "cloud-weather-data/", "/data/processed/hourly.parquet" ) ).toBe( "cloud-weather-data/hourly.parquet" );
		expect( objectKey( "archive//", "daily.csv" ) ).toBe( "archive/daily.csv" );
		expect( objectKey( "", "/data/manifest.json" ) ).toBe( "manifest.json" );
	} );
} );

describe( "uploadArtifacts", () => {
	let directory: string;
	let files: string[];

	beforeEach( async () => {
		directory = await mkdtemp( path.join( tmpdir(), "s3-" ) );
		files = [ path.join( directory, "hourly.parquet" ), path.join( directory, "manifest.json" ) ];
		await writeFile( files[ 0 ], "PAR1" );
		await writeFile( files[ 1 ], "{}" );
		vi.spyOn( console, "log" ).mockImplementation( () => undefined );
		vi.spyOn( console, "warn" ).mockImplementation( () => undefined );
	} );

	afterEach( async () => {
		vi.restoreAllMocks();
		await rm( directory, { recursive: true, force: true } );
	} );

	it( "puts every file under the prefix", async () => {
		const send = vi.fn( async ( _command: PutObjectCommand ) => ( {} ) );

		const uris = await uploadArtifacts( files, { bucket: "test-bucket", prefix: "cloud-weather-data/", client: { send } } );

		expect( uris ).toEqual( [
			"s3://test-bucket/cloud-weather-data/hourly.parquet",
			"s3://test-bucket/cloud-weather-data/manifest.json"
		] );
		expect( send ).toHaveBeenCalledTimes( 2 );
		const first = send.mock.calls[ 0 ][ 0 ].input;
		expect( first.Bucket ).toBe( "test-bucket" );
		expect( first.Key ).toBe( "cloud-weather-data/hourly.parquet" );
		expect( first.ContentType ).toBe( "application/vnd.apache.parquet" );
		expect( send.mock.calls[ 1 ][ 0 ].input.ContentType ).toBe( "application/json" );
	} );

	it( "skips the upload without a bucket", async () => {
		const send = vi.fn( async ( _command: PutObjectCommand ) => ( {} ) );

		expect( await uploadArtifacts( files, { client: { send } } ) ).toEqual( [] );
		expect( send ).not.toHaveBeenCalled();
	} );

	it( "reports a rejected put as UploadFailure", async () => {
		const send = vi.fn( async ( _command: PutObjectCommand ): Promise<unknown> => {
			throw new Error( "Access Denied" );
		} );

		await expect( uploadArtifacts( files, { bucket: "test-bucket", client: { send } } ) )
			.rejects.toMatchObject( { errCode: ErrorCode.UploadFailure } );
		expect( send ).toHaveBeenCalledTimes( 1 );
	} );
} );
