import { readFile } from "node:fs/promises";
import dotenv from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { AggregationPolicy, DateInterval, Location } from "./types";
import { CodedError, ErrorCode } from "./errors";
import { intervalBounds, isValidTimeZone } from "./routes/time";
import { DEFAULT_AGGREGATION_POLICY, parsePolicy } from "./routes/aggregation/policy";
import { DEFAULT_METRICS } from "./routes/weatherProviders/OpenMeteo";

export interface AwsSettings {
	region?: string;
	bucket?: string;
	prefix: string;
}

export interface Settings {
	dataDir: string;
	/** Location registry (YAML). */
	configFile: string;
	defaultStartDate: string;
	defaultEndDate: string;
	/** Locations fetched and normalized at the same time. */
	concurrency: number;
	port: number;
	metrics: readonly string[];
	/** Provider values that mean "no data". */
	sentinels: readonly number[];
	aggregationPolicy: AggregationPolicy;
	writeCsv: boolean;
	aws: AwsSettings;
}

const optionalString = z
	.string()
	.optional()
	.transform( ( value ) => ( value && value.trim() !== "" ? value.trim() : undefined ) );

const listOf = <T extends z.ZodTypeAny>( item: T ) => z
	.string()
	.transform( ( value ) => value.split( "," ).map( ( part ) => part.trim() ).filter( Boolean ) )
	.pipe( z.array( item ) );

const environmentSchema = z.object( {
	DATA_DIR: z.string().default( "./data" ),
	CONFIG_FILE: z.string().default( "./config/locations.yaml" ),
	DEFAULT_START_DATE: z.string().default( "2024-10-01" ),
	DEFAULT_END_DATE: z.string().default( "2024-10-07" ),
	CONCURRENCY: z.coerce.number().int().min( 1 ).max( 32 ).default( 4 ),
	PORT: z.coerce.number().int().min( 0 ).max( 65535 ).default( 3000 ),
	METRICS: listOf( z.string() ).optional(),
	SENTINELS: listOf( z.coerce.number().finite() ).default( "-9999" ),
	AGGREGATION_POLICY: optionalString,
	WRITE_CSV: z.enum( [ "true", "false", "1", "0" ] ).default( "false" ),
	AWS_DEFAULT_REGION: optionalString,
	S3_BUCKET_NAME: optionalString,
	S3_PREFIX: z.string().default( "cloud-weather-data/" )
} );

function describeIssues( error: z.ZodError ): string {
	return error.issues.map( ( issue ) => `${ issue.path.join( "." ) || "(root)" }: ${ issue.message }` ).join( "; " );
}

/** Loads `.env` into `process.env`. Values in `.env` win over the inherited environment. */
export function loadEnvironment( path?: string ): void {
	dotenv.config( { path, override: true } );
}

/**
 * Reads the settings from environment variables.
 * @throws CodedError with InvalidConfiguration if a variable holds an unusable value.
 */
export function loadSettings( env: NodeJS.ProcessEnv = process.env ): Settings {
	const parsed = environmentSchema.safeParse( env );
	if ( !parsed.success ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `Invalid settings: ${ describeIssues( parsed.error ) }` );
	}
	const vars = parsed.data;

	parseInterval( vars.DEFAULT_START_DATE, vars.DEFAULT_END_DATE );

	return {
		dataDir: vars.DATA_DIR,
		configFile: vars.CONFIG_FILE,
		defaultStartDate: vars.DEFAULT_START_DATE,
		defaultEndDate: vars.DEFAULT_END_DATE,
		concurrency: vars.CONCURRENCY,
		port: vars.PORT,
		metrics: vars.METRICS && vars.METRICS.length > 0 ? vars.METRICS : DEFAULT_METRICS,
		sentinels: vars.SENTINELS,
		aggregationPolicy: vars.AGGREGATION_POLICY ? parsePolicy( vars.AGGREGATION_POLICY ) : DEFAULT_AGGREGATION_POLICY,
		writeCsv: vars.WRITE_CSV === "true" || vars.WRITE_CSV === "1",
		aws: {
			region: vars.AWS_DEFAULT_REGION,
			bucket: vars.S3_BUCKET_NAME,
			prefix: vars.S3_PREFIX
		}
	};
}

/** "New York" -> "new_york" */
export function slugify( name: string ): string {
	return name
		.trim()
		.toLowerCase()
		.replace( /[^a-z0-9]+/g, "_" )
		.replace( /^_+|_+$/g, "" );
}

const locationSchema = z.object( {
	name: z.string().min( 1 ),
	id: z.string().min( 1 ).optional(),
	latitude: z.coerce.number().min( -90 ).max( 90 ),
	longitude: z.coerce.number().min( -180 ).max( 180 ),
	timezone: z.string().min( 1 ).default( "UTC" )
} );

const registrySchema = z.object( {
	locations: z.array( locationSchema ).default( [] )
} );

/**
 * Parses the YAML location registry. Ids default to a slug of the name, timezones to UTC.
 * @throws CodedError with InvalidConfiguration on malformed entries, unknown timezones and duplicate ids.
 */
export function parseLocations( text: string, source = "location registry" ): Location[] {
	let raw: unknown;
	try {
		raw = parseYaml( text );
	} catch ( err ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `${ source } is not valid YAML`, { cause: err } );
	}

	const parsed = registrySchema.safeParse( raw ?? {} );
	if ( !parsed.success ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `${ source }: ${ describeIssues( parsed.error ) }` );
	}

	const seen = new Set<string>();
	return parsed.data.locations.map( ( entry ) => {
		const id = entry.id ?? slugify( entry.name );
		if ( !id ) {
			throw new CodedError( ErrorCode.InvalidConfiguration, `${ source }: '${ entry.name }' yields an empty id` );
		}
		if ( seen.has( id ) ) {
			throw new CodedError( ErrorCode.InvalidConfiguration, `${ source }: duplicate location id '${ id }'` );
		}
		if ( !isValidTimeZone( entry.timezone ) ) {
			throw new CodedError( ErrorCode.InvalidConfiguration, `${ source }: unknown timezone '${ entry.timezone }' for ${ id }` );
		}
		seen.add( id );
		return {
			id,
			name: entry.name,
			latitude: entry.latitude,
			longitude: entry.longitude,
			timezone: entry.timezone
		};
	} );
}

export async function loadLocations( file: string ): Promise<Location[]> {
	let text: string;
	try {
		text = await readFile( file, "utf8" );
	} catch ( err ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `Cannot read location registry ${ file }`, { cause: err } );
	}
	return parseLocations( text, file );
}

/**
 * Validates a closed UTC date interval.
 * @throws CodedError with InvalidInterval on malformed or reversed dates.
 */
export function parseInterval( start: string, end: string ): DateInterval {
	const interval = { start: start.trim(), end: end.trim() };
	intervalBounds( interval );
	return interval;
}
