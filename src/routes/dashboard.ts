import express from "express";
import { z } from "zod";

import { DailySummaryRecord, MetricValue, ObservationRecord, isPresent } from "../types";
import { CodedError, ErrorCode, makeCodedError } from "../errors";
import { findArtifact, readManifest } from "./artifacts/manifest";
import { readDailyArtifact, readHourlyArtifact } from "./artifacts/ArtifactReader";
import { computeTrends } from "./aggregation/trends";
import { parseDay, DAY_MS } from "./time";

const dayParam = z.string().regex( /^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD" );
const hourParam = z.coerce.number().int().min( 0 ).max( 23 );

const hourlyQuerySchema = z.object( {
	location: z.string().optional(),
	from: dayParam.optional(),
	to: dayParam.optional(),
	hourFrom: hourParam.default( 0 ),
	hourTo: hourParam.default( 23 )
} );

const dailyQuerySchema = z.object( {
	location: z.string().optional(),
	from: dayParam.optional(),
	to: dayParam.optional()
} );

const trendsQuerySchema = z.object( {
	location: z.string().optional(),
	column: z.string().min( 1 ),
	window: z.coerce.number().int().min( 1 ).max( 366 ).default( 7 )
} );

function parseQuery<S extends z.ZodTypeAny>( schema: S, query: unknown ): z.infer<S> {
	const parsed = schema.safeParse( query );
	if ( !parsed.success ) {
		const detail = parsed.error.issues.map( ( issue ) => `${ issue.path.join( "." ) }: ${ issue.message }` ).join( "; " );
		throw new CodedError( ErrorCode.InvalidConfiguration, `Invalid query (${ detail })` );
	}
	return parsed.data;
}

/** MISSING becomes null in JSON. */
function toJson( value: MetricValue | undefined ): number | null {
	return isPresent( value ) ? value.value : null;
}

function dayStart( day: string ): number {
	const parsed = parseDay( day );
	if ( parsed === undefined ) {
		throw new CodedError( ErrorCode.InvalidInterval, `Invalid date '${ day }'` );
	}
	return parsed;
}

function hourlyRow( record: ObservationRecord, metrics: readonly string[] ): Record<string, string | number | null> {
	const row: Record<string, string | number | null> = {
		location_id: record.locationId,
		timestamp: new Date( record.timestamp ).toISOString()
	};
	for ( const metric of metrics ) {
		row[ metric ] = toJson( record.metrics[ metric ] );
	}
	return row;
}

function dailyRow( record: DailySummaryRecord, columns: readonly string[], metrics: readonly string[] ): Record<string, string | number | null> {
	const row: Record<string, string | number | null> = {
		location_id: record.locationId,
		date: record.date,
		sample_count: record.sampleCount
	};
	for ( const column of columns ) {
		row[ column ] = toJson( record.values[ column ] );
	}
	for ( const metric of metrics ) {
		row[ `${ metric }_count` ] = record.counts[ metric ] ?? 0;
	}
	return row;
}

function statusFor( error: CodedError ): number {
	switch ( error.errCode ) {
		case ErrorCode.InvalidConfiguration:
		case ErrorCode.InvalidInterval:
			return 400;
		case ErrorCode.ReadFailure:
			return 404;
		default:
			return 500;
	}
}

type Handler = ( req: express.Request ) => Promise<unknown>;

/** Wraps an async handler so that its errors become JSON error responses. */
function route( handler: Handler ): express.RequestHandler {
	return ( req, res ) => {
		handler( req ).then(
			( body ) => {
				res.json( body );
			},
			( err: unknown ) => {
				const error = makeCodedError( err );
				const status = statusFor( error );
				if ( status === 500 ) {
					console.error( `[Dashboard] ${ req.method } ${ req.originalUrl } failed:`, error );
				}
				res.status( status ).json( { error: ErrorCode[ error.errCode ], message: error.message } );
			}
		);
	};
}

/**
 * Read-only JSON views of the latest artifacts listed in `<outputDir>/manifest.json`.
 */
export function createDashboardRouter( outputDir: string ): express.Router {
	const router = express.Router();

	async function artifactFile( name: string ): Promise<string> {
		const manifest = await readManifest( outputDir );
		const artifact = findArtifact( manifest, name );
		if ( !artifact ) {
			throw new CodedError( ErrorCode.ReadFailure, `No ${ name } artifact in the manifest` );
		}
		return artifact.path;
	}

	router.get( "/artifacts", route( async () => {
		const manifest = await readManifest( outputDir );
		return manifest;
	} ) );

	router.get( "/hourly", route( async ( req ) => {
		const query = parseQuery( hourlyQuerySchema, req.query );
		const from = query.from === undefined ? -Infinity : dayStart( query.from );
		const to = query.to === undefined ? Infinity : dayStart( query.to ) + DAY_MS;
		const table = await readHourlyArtifact( await artifactFile( "hourly" ) );

		const rows = table.records
			.filter( ( record ) => query.location === undefined || record.locationId === query.location )
			.filter( ( record ) => record.timestamp >= from && record.timestamp < to )
			.filter( ( record ) => {
				const hour = new Date( record.timestamp ).getUTCHours();
				return hour >= query.hourFrom && hour <= query.hourTo;
			} )
			.map( ( record ) => hourlyRow( record, table.metrics ) );

		return { metrics: table.metrics, rows };
	} ) );

	router.get( "/daily", route( async ( req ) => {
		const query = parseQuery( dailyQuerySchema, req.query );
		const daily = await readDailyArtifact( await artifactFile( "daily" ) );
		const columns = daily.columns.map( ( column ) => column.name );

		const rows = daily.records
			.filter( ( record ) => query.location === undefined || record.locationId === query.location )
			.filter( ( record ) => ( query.from === undefined || record.date >= query.from ) && ( query.to === undefined || record.date <= query.to ) )
			.map( ( record ) => dailyRow( record, columns, daily.metrics ) );

		return { columns, rows };
	} ) );

	router.get( "/trends", route( async ( req ) => {
		const query = parseQuery( trendsQuerySchema, req.query );
		const daily = await readDailyArtifact( await artifactFile( "daily" ) );

		const points = computeTrends( daily, query.column, query.window )
			.filter( ( point ) => query.location === undefined || point.locationId === query.location )
			.map( ( point ) => ( {
				location_id: point.locationId,
				date: point.date,
				value: toJson( point.value ),
				delta: toJson( point.delta ),
				rolling_mean: toJson( point.rollingMean )
			} ) );

		return { column: query.column, window: query.window, points };
	} ) );

	return router;
}
