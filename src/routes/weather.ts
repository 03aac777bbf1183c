import { CodedError, ErrorCode } from "../errors";

const RETRY_STATUS_CODES: ReadonlySet<number> = new Set( [ 429, 500, 502, 503, 504 ] );

export interface HttpRequestOptions {
	/** Query string parameters. */
	params?: Record<string, string | number>;
	/** Total attempts including the first one. */
	maxAttempts?: number;
	timeoutMs?: number;
	/** Waits between attempts. Replaced in tests. */
	sleep?: ( ms: number ) => Promise<void>;
}

function defaultSleep( ms: number ): Promise<void> {
	return new Promise( ( resolve ) => setTimeout( resolve, ms ) );
}

/**
 * Delay before the next attempt. Rate limiting (429) backs off longer than server errors. Both are
 * capped and jittered so that concurrent location workers do not retry in lockstep.
 */
export function retryDelay( attempt: number, status: number | undefined ): number {
	if ( status === 429 ) {
		return Math.min( 8000, 800 * attempt ) + Math.random() * 600;
	}
	return Math.min( 6000, 600 * attempt ) + Math.random() * 400;
}

export function buildUrl( url: string, params: Record<string, string | number> = {} ): string {
	const target = new URL( url );
	for ( const [ key, value ] of Object.entries( params ) ) {
		target.searchParams.set( key, String( value ) );
	}
	return target.toString();
}

/**
 * Sends a GET request and parses the response body as JSON. Retries on 429, 5xx and network errors.
 * @throws CodedError with UpstreamFailure once the attempts are used up, on any other error status,
 * and on a body that is not JSON.
 */
export async function httpJSONRequest( url: string, options: HttpRequestOptions = {} ): Promise<unknown> {
	const target = buildUrl( url, options.params );
	const maxAttempts = options.maxAttempts ?? 7;
	const sleep = options.sleep ?? defaultSleep;
	let lastError = "no attempt made";

	for ( let attempt = 1; attempt <= maxAttempts; attempt++ ) {
		let response: Response;
		try {
			response = await fetch( target, {
				headers: { Accept: "application/json" },
				signal: AbortSignal.timeout( options.timeoutMs ?? 30000 )
			} );
		} catch ( err ) {
			lastError = err instanceof Error ? err.message : String( err );
			if ( attempt < maxAttempts ) {
				console.warn( `[HTTP] ${ target } failed (${ lastError }), attempt ${ attempt } of ${ maxAttempts }` );
				await sleep( retryDelay( attempt, undefined ) );
			}
			continue;
		}

		if ( response.ok ) {
			const body = await response.text();
			try {
				return JSON.parse( body );
			} catch ( err ) {
				throw new CodedError( ErrorCode.UpstreamFailure, `${ target } did not answer with JSON`, { cause: err } );
			}
		}

		lastError = `HTTP ${ response.status }`;
		if ( !RETRY_STATUS_CODES.has( response.status ) ) {
			throw new CodedError( ErrorCode.UpstreamFailure, `${ target } answered with ${ lastError }` );
		}
		if ( attempt < maxAttempts ) {
			console.warn( `[HTTP] ${ target } answered with ${ lastError }, attempt ${ attempt } of ${ maxAttempts }` );
			await sleep( retryDelay( attempt, response.status ) );
		}
	}

	throw new CodedError( ErrorCode.UpstreamFailure, `${ target } failed after ${ maxAttempts } attempts (${ lastError })` );
}
