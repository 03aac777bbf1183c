import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { MANIFEST_FILE, findArtifact, readManifest, writeManifest } from "./manifest";
import { ArtifactDescriptor } from "../../types";
import { ErrorCode } from "../../errors";

const INTERVAL = { start: "2024-10-01", end: "2024-10-02" };

function descriptor( name: string, format: ArtifactDescriptor["format"], producedAt: string ): ArtifactDescriptor {
	return {
		name,
		path: `/out/${ name }.${ format }`,
		format,
		rowCount: 1,
		schema: [ { name: "location_id", type: "string", optional: false } ],
		producedAt,
		interval: INTERVAL,
		locations: [ "alpha" ]
	};
}

describe( "manifest", () => {
	let directory: string;

	beforeEach( async () => {
		directory = await mkdtemp( path.join( tmpdir(), "manifest-" ) );
	} );

	afterEach( async () => {
		await rm( directory, { recursive: true, force: true } );
	} );

	it( "reads back what was written", async () => {
		const artifacts = [ descriptor( "hourly", "parquet", "2024-10-03T00:00:00.000Z" ) ];
		const target = await writeManifest( directory, INTERVAL, artifacts );

		expect( target ).toBe( path.join( directory, MANIFEST_FILE ) );
		const manifest = await readManifest( directory );
		expect( manifest.interval ).toEqual( INTERVAL );
		expect( manifest.artifacts ).toEqual( artifacts );
	} );

	it( "reports missing and malformed manifests as ReadFailure", async () => {
		await expect( readManifest( directory ) ).rejects.toMatchObject( { errCode: ErrorCode.ReadFailure } );

		await writeFile( path.join( directory, MANIFEST_FILE ), "{\"artifacts\": 3}", "utf8" );
		await expect( readManifest( directory ) ).rejects.toMatchObject( { errCode: ErrorCode.ReadFailure } );
	} );

	it( "finds the newest artifact of a name and format", () => {
		const older = descriptor( "daily", "parquet", "2024-10-03T00:00:00.000Z" );
		const newer = descriptor( "daily", "parquet", "2024-10-04T00:00:00.000Z" );
		const csv = descriptor( "daily", "csv", "2024-10-05T00:00:00.000Z" );
		const manifest = { generatedAt: "2024-10-05T00:00:00.000Z", interval: INTERVAL, artifacts: [ older, csv, newer ] };

		expect( findArtifact( manifest, "daily" ) ).toBe( newer );
		expect( findArtifact( manifest, "daily", "csv" ) ).toBe( csv );
		expect( findArtifact( manifest, "hourly" ) ).toBeUndefined();
	} );
} );
