import { readFile } from "node:fs/promises";
import path from "node:path";
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";

import { CodedError, ErrorCode } from "../../errors";

/** The part of S3Client the archiver needs. */
export interface ObjectUploader {
	send( command: PutObjectCommand ): Promise<unknown>;
}

export interface UploadOptions {
	bucket?: string;
	/** Key prefix, e.g. "cloud-weather-data/". */
	prefix?: string;
	region?: string;
	/** Created from `region` when not given. */
	client?: ObjectUploader;
}

const CONTENT_TYPES: Readonly<Record<string, string>> = {
	".parquet": "application/vnd.apache.parquet",
	".csv": "text/csv",
	".json": "application/json"
};

export function objectKey( prefix: string, file: string ): string {
	const base = prefix.replace( /\/+$/, "" );
	return `${ base }/${ path.basename( file ) }`.replace( /^\/+/, "" );
}

/**
 * Uploads files to S3 under `<prefix>/<file name>`.
 * @return The `s3://bucket/key` URI of every uploaded file. Empty when no bucket is configured.
 * @throws CodedError with UploadFailure if a file cannot be read or stored.
 */
export async function uploadArtifacts( files: readonly string[], options: UploadOptions ): Promise<string[]> {
	const bucket = options.bucket;
	if ( !bucket ) {
		console.warn( "[S3Archiver] S3 upload requested but no bucket is configured, skipping upload" );
		return [];
	}

	const client: ObjectUploader = options.client ?? new S3Client( options.region ? { region: options.region } : {} );
	const uploaded: string[] = [];

	for ( const file of files ) {
		const key = objectKey( options.prefix ?? "", file );
		try {
			const body = await readFile( file );
			await client.send( new PutObjectCommand( {
				Bucket: bucket,
				Key: key,
				Body: body,
				ContentType: CONTENT_TYPES[ path.extname( file ) ] ?? "application/octet-stream"
			} ) );
		} catch ( err ) {
			throw new CodedError(
				ErrorCode.UploadFailure,
				`Could not upload ${ file } to s3://${ bucket }/${ key }: ${ err instanceof Error ? err.message : String( err ) }`,
				{ cause: err }
			);
		}
		uploaded.push( `s3://${ bucket }/${ key }` );
	}

	console.log( `[S3Archiver] Uploaded ${ uploaded.length } files to s3://${ bucket }` );
	return uploaded;
}
