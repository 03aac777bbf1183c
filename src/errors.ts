export enum ErrorCode {
	/** The metric set of a raw payload does not match the configured metric set, or its arrays are misaligned. */
	SchemaMismatch = 10,
	/** Two normalized sequences disagree on the metric set. */
	SchemaConflict = 11,
	/** A payload covered fewer hours than the requested interval implies. Recoverable. */
	IncompleteRange = 12,

	/** An artifact could not be written to its canonical path. */
	WriteFailure = 20,
	/** An artifact or manifest could not be read back. */
	ReadFailure = 21,
	/** An artifact could not be pushed to the object store. */
	UploadFailure = 22,

	/** Settings or the location registry are invalid. */
	InvalidConfiguration = 30,
	/** The requested date interval is malformed or reversed. */
	InvalidInterval = 31,

	/** The weather provider answered with an error or an unreadable body. */
	UpstreamFailure = 40,
	/** No location produced any data. */
	InsufficientWeatherData = 41,

	/** An error that was not one of the above. */
	UnexpectedError = 99
}

const RECOVERABLE_CODES: ReadonlySet<ErrorCode> = new Set( [ ErrorCode.IncompleteRange ] );

/** An error with an ErrorCode that callers can branch on. */
export class CodedError extends Error {
	public readonly errCode: ErrorCode;

	public constructor( errCode: ErrorCode, message?: string, options?: { cause?: unknown } ) {
		super( message ?? ErrorCode[ errCode ], options );
		this.name = "CodedError";
		this.errCode = errCode;
	}

	/** Fatal errors abort the pipeline run. */
	public get fatal(): boolean {
		return !RECOVERABLE_CODES.has( this.errCode );
	}
}

/**
 * Returns a CodedError representing the specified error. This function can be used to ensure that errors caught in try-catch
 * statements have an error code and do not contain any sensitive information in the error message.
 */
export function makeCodedError( err: unknown ): CodedError {
	if ( err instanceof CodedError ) {
		return err;
	}
	return new CodedError( ErrorCode.UnexpectedError, err instanceof Error ? err.message : String( err ), { cause: err } );
}
