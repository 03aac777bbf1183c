import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { ArtifactDescriptor, DateInterval } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { writeTextAtomically } from "./atomic";

export const MANIFEST_FILE = "manifest.json";

/** The artifacts of the latest run, stored beside them. */
export interface Manifest {
	generatedAt: string;
	interval: DateInterval;
	artifacts: ArtifactDescriptor[];
}

const intervalSchema = z.object( { start: z.string(), end: z.string() } );

const descriptorSchema = z.object( {
	name: z.string(),
	path: z.string(),
	format: z.enum( [ "parquet", "csv" ] ),
	rowCount: z.number().int().nonnegative(),
	schema: z.array( z.object( {
		name: z.string(),
		type: z.enum( [ "string", "timestamp", "date", "double", "int32" ] ),
		optional: z.boolean()
	} ) ),
	producedAt: z.string(),
	interval: intervalSchema,
	locations: z.array( z.string() )
} );

const manifestSchema = z.object( {
	generatedAt: z.string(),
	interval: intervalSchema,
	artifacts: z.array( descriptorSchema )
} );

export function manifestPath( outputDir: string ): string {
	return path.join( outputDir, MANIFEST_FILE );
}

export async function writeManifest(
	outputDir: string,
	interval: DateInterval,
	artifacts: readonly ArtifactDescriptor[]
): Promise<string> {
	const target = manifestPath( outputDir );
	const manifest: Manifest = {
		generatedAt: new Date().toISOString(),
		interval,
		artifacts: [ ...artifacts ]
	};
	await writeTextAtomically( target, JSON.stringify( manifest, null, 2 ) + "\n" );
	console.log( `[Manifest] ${ artifacts.length } artifacts -> ${ target }` );
	return target;
}

export async function readManifest( outputDir: string ): Promise<Manifest> {
	const target = manifestPath( outputDir );
	let raw: unknown;
	try {
		raw = JSON.parse( await readFile( target, "utf8" ) );
	} catch ( err ) {
		throw new CodedError(
			ErrorCode.ReadFailure,
			`Could not read ${ target }: ${ err instanceof Error ? err.message : String( err ) }`,
			{ cause: err }
		);
	}

	const parsed = manifestSchema.safeParse( raw );
	if ( !parsed.success ) {
		throw new CodedError( ErrorCode.ReadFailure, `${ target } is not a valid manifest` );
	}
	return parsed.data;
}

/** The most recently produced artifact of a name and format, if any. */
export function findArtifact(
	manifest: Manifest,
	name: string,
	format: ArtifactDescriptor["format"] = "parquet"
): ArtifactDescriptor | undefined {
	return manifest.artifacts
		.filter( ( artifact ) => artifact.name === name && artifact.format === format )
		.sort( ( a, b ) => ( a.producedAt < b.producedAt ? 1 : a.producedAt > b.producedAt ? -1 : 0 ) )[ 0 ];
}
