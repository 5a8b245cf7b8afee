export enum ErrorCode {
	/** None of the observations survived the freshness and completeness checks. */
	InsufficientWeatherData = 10,
	/** The primary weather provider could not resolve the requested city. */
	NoLocationFound = 20,
	/** A weather provider could not be reached, answered with an error status, or sent an unexpected body. */
	ProviderRequestFailed = 30,
	/** The normalizer was handed an observation it has no mapping for. */
	UnsupportedObservationKind = 40,
	/** The client access log could not be read or written. */
	AccessLogUnavailable = 50,
	/** An error was not properly handled and assigned a more specific error code. */
	UnexpectedError = 99
}

/** An error with a numeric code that can be used to identify the type of error. */
export class CodedError extends Error {
	public readonly errCode: ErrorCode;

	public constructor( errCode: ErrorCode, message?: string, options?: ErrorOptions ) {
		super( message ?? ErrorCode[ errCode ], options );
		this.name = "CodedError";
		this.errCode = errCode;
		Object.setPrototypeOf( this, new.target.prototype );
	}
}

export function isCodedError( err: unknown, ...codes: ErrorCode[] ): err is CodedError {
	return err instanceof CodedError && ( codes.length === 0 || codes.includes( err.errCode ) );
}

/**
 * Returns a CodedError representing the specified error. This function can be used to ensure that errors caught in try-catch
 * statements have an error code and do not contain any sensitive information in the error message. If `err` is a
 * CodedError, the same object will be returned. If `err` is not a CodedError, it is assumed that the error wasn't
 * properly handled, so a CodedError with a generic message and an "UnexpectedError" code will be returned.
 */
export function makeCodedError( err: unknown ): CodedError {
	if ( err instanceof CodedError ) {
		return err;
	}
	return new CodedError( ErrorCode.UnexpectedError, undefined, { cause: err } );
}
