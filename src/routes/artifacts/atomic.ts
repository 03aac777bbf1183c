import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { CodedError, ErrorCode } from "../../errors";

/**
 * Runs `write` against a temporary file beside `target` and renames it onto `target` once `write`
 * resolves. On failure the temporary file is removed and a WriteFailure is thrown; a file already at
 * `target` is left untouched.
 */
export async function writeAtomically( target: string, write: ( tempPath: string ) => Promise<void> ): Promise<void> {
	const directory = path.dirname( target );
	const tempPath = path.join(
		directory,
		`.${ path.basename( target ) }.${ process.pid }.${ randomBytes( 4 ).toString( "hex" ) }.tmp`
	);

	let directoryReady = false;
	try {
		await mkdir( directory, { recursive: true } );
		directoryReady = true;
		await write( tempPath );
		await rename( tempPath, target );
	} catch ( err ) {
		if ( directoryReady ) {
			await rm( tempPath, { force: true } );
		}
		if ( err instanceof CodedError && err.errCode === ErrorCode.WriteFailure ) {
			throw err;
		}
		throw new CodedError(
			ErrorCode.WriteFailure,
			`Could not write ${ target }: ${ err instanceof Error ? err.message : String( err ) }`,
			{ cause: err }
		);
	}
}

export async function writeTextAtomically( target: string, contents: string ): Promise<void> {
	await writeAtomically( target, ( tempPath ) => writeFile( tempPath, contents, "utf8" ) );
}
