/** Raised when an HTTP request fails, either before a response arrives or with a non-2xx status. */
export class HttpRequestError extends Error {
	public constructor(
		message: string,
		/** The HTTP status, undefined if no response was received. */
		public readonly status?: number,
		/** The parsed JSON body of an error response, if it had one. */
		public readonly body?: unknown,
		options?: ErrorOptions
	) {
		super( message, options );
		this.name = "HttpRequestError";
		Object.setPrototypeOf( this, new.target.prototype );
	}
}

export interface HttpRequestOptions {
	/** Abort the request after this many milliseconds. */
	timeoutMs?: number;
}

function parseJSON( text: string ): unknown {
	try {
		return JSON.parse( text );
	} catch ( err ) {
		return undefined;
	}
}

/**
 * Sends a GET request and parses the response body as JSON.
 * @return A Promise resolved with the parsed body, or rejected with an HttpRequestError.
 */
export async function httpJSONRequest( url: URL, options: HttpRequestOptions = {} ): Promise< unknown > {
	let response: Response;
	try {
		response = await fetch( url, {
			headers: { Accept: "application/json" },
			signal: options.timeoutMs ? AbortSignal.timeout( options.timeoutMs ) : undefined
		} );
	} catch ( err ) {
		throw new HttpRequestError( `Failed to reach ${ url.host }`, undefined, undefined, { cause: err } );
	}

	const text = await response.text();
	const body = parseJSON( text );

	if ( !response.ok ) {
		throw new HttpRequestError( `${ url.host } returned HTTP ${ response.status }`, response.status, body );
	}
	if ( body === undefined ) {
		throw new HttpRequestError( `${ url.host } returned an invalid JSON body`, response.status );
	}

	return body;
}
