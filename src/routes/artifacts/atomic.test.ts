import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { writeAtomically, writeTextAtomically } from "./atomic";
import { CodedError, ErrorCode } from "../../errors";

describe( "writeAtomically", () => {
	let directory: string;

	beforeEach( async () => {
		directory = await mkdtemp( path.join( tmpdir(), "atomic-" ) );
	} );

	afterEach( async () => {
		await rm( directory, { recursive: true, force: true } );
	} );

	it( "creates missing directories and replaces the target", async () => {
		const target = path.join( directory, "nested", "out.txt" );
		await writeTextAtomically( target, "first" );
		await writeTextAtomically( target, "second" );

		expect( await readFile( target, "utf8" ) ).toBe( "second" );
		expect( await readdir( path.dirname( target ) ) ).toEqual( [ "out.txt" ] );
	} );

	it( "leaves the previous file and no temporary file behind on failure", async () => {
		const target = path.join( directory, "out.txt" );
		await writeFile( target, "previous", "utf8" );

		const failure = writeAtomically( target, async ( tempPath ) => {
			await writeFile( tempPath, "partial", "utf8" );
			throw new Error( "encoder exploded" );
		} );

		await expect( failure ).rejects.toBeInstanceOf( CodedError );
		await expect( failure ).rejects.toMatchObject( { errCode: ErrorCode.WriteFailure } );
		expect( await readFile( target, "utf8" ) ).toBe( "previous" );
		expect( await readdir( directory ) ).toEqual( [ "out.txt" ] );
	} );

	it( "reports an unusable directory as WriteFailure", async () => {
		const blocker = path.join( directory, "blocker" );
		await writeFile( blocker, "", "utf8" );

		await expect( writeTextAtomically( path.join( blocker, "out.txt" ), "x" ) )
			.rejects.toMatchObject( { errCode: ErrorCode.WriteFailure } );
	} );
} );
