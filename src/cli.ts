#!/usr/bin/env node

import path from "node:path";
import { Command, InvalidArgumentError } from "commander";

import { loadEnvironment, loadLocations, loadSettings, parseInterval } from "./config";
import { CodedError, ErrorCode, makeCodedError } from "./errors";
import { runPipeline } from "./pipeline";
import { startServer } from "./server";
import OpenMeteoWeatherProvider from "./routes/weatherProviders/OpenMeteo";

interface RunOptions {
	start?: string;
	end?: string;
	location?: string[];
	csv?: boolean;
	uploadS3?: boolean;
}

interface ServeOptions {
	port?: number;
}

function parsePort( value: string ): number {
	const port = Number.parseInt( value, 10 );
	if ( !Number.isInteger( port ) || port < 0 || port > 65535 ) {
		throw new InvalidArgumentError( "Not a port number." );
	}
	return port;
}

async function handleRun( options: RunOptions ): Promise<void> {
	const settings = loadSettings();
	const registry = await loadLocations( settings.configFile );
	const interval = parseInterval( options.start ?? settings.defaultStartDate, options.end ?? settings.defaultEndDate );

	const wanted = options.location;
	const locations = wanted ? registry.filter( ( location ) => wanted.includes( location.id ) ) : registry;
	const unknown = ( wanted ?? [] ).filter( ( id ) => !registry.some( ( location ) => location.id === id ) );
	if ( unknown.length > 0 ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `Unknown location ids: ${ unknown.join( ", " ) }` );
	}
	if ( locations.length === 0 ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `No locations configured in ${ settings.configFile }` );
	}

	const result = await runPipeline( {
		locations,
		interval,
		provider: new OpenMeteoWeatherProvider(),
		dataDir: settings.dataDir,
		metrics: settings.metrics,
		sentinels: settings.sentinels,
		policy: settings.aggregationPolicy,
		concurrency: settings.concurrency,
		restricted: locations.length < registry.length,
		writeCsv: options.csv ?? settings.writeCsv,
		upload: options.uploadS3 ? settings.aws : undefined
	} );

	for ( const artifact of result.artifacts ) {
		console.log( `${ artifact.name } (${ artifact.format }): ${ artifact.rowCount } rows -> ${ artifact.path }` );
	}
	for ( const uri of result.uploaded ) {
		console.log( `uploaded ${ uri }` );
	}
}

async function handleServe( options: ServeOptions ): Promise<void> {
	const settings = loadSettings();
	await startServer( options.port ?? settings.port, { outputDir: path.join( settings.dataDir, "processed" ) } );
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name( "weather-pipeline" )
		.description( "Normalizes, merges and aggregates hourly weather data into Parquet artifacts" )
		.version( "1.0.0" );

	program
		.command( "run" )
		.description( "Fetch, normalize, merge and aggregate the configured locations" )
		.option( "--start <date>", "first UTC date (YYYY-MM-DD)" )
		.option( "--end <date>", "last UTC date (YYYY-MM-DD)" )
		.option( "--location <ids...>", "restrict the run to these location ids" )
		.option( "--csv", "also write CSV mirrors of the tables" )
		.option( "--upload-s3", "upload the artifacts to S3 after the run" )
		.action( ( options: RunOptions ) => handleRun( options ) );

	program
		.command( "serve" )
		.description( "Serve the latest artifacts as JSON" )
		.option( "-p, --port <port>", "port to listen on", parsePort )
		.action( ( options: ServeOptions ) => handleServe( options ) );

	return program;
}

async function main(): Promise<void> {
	loadEnvironment();
	const program = createProgram();

	try {
		await program.parseAsync( process.argv );
	} catch ( err ) {
		const error = makeCodedError( err );
		console.error( `[CLI] ${ ErrorCode[ error.errCode ] }: ${ error.message }` );
		process.exitCode = 1;
	}
}

if ( require.main === module ) {
	void main();
}
