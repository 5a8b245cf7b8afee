import express from "express";
import crypto from "crypto";
import { makeCodedError } from "../errors";

export function getRequestId( res: express.Response ): string {
	const requestId: unknown = res.locals.requestId;
	return typeof requestId === "string" ? requestId : "unknown";
}

/** Sends a JSON body that always carries the request ID, which is also set as the X-Request-ID header. */
export function sendResponse( res: express.Response, statusCode: number, body: Record< string, unknown > ): void {
	const requestId = getRequestId( res );
	res.status( statusCode )
		.set( "X-Request-ID", requestId )
		.json( { requestId, ...body } );
}

export function sendInternalServerError( res: express.Response ): void {
	sendResponse( res, 500, {
		error: "Internal Server Error",
		message: "An unexpected error occurred.",
		details: "Please try again later."
	} );
}

/** Assigns a request ID and logs every request once it has completed. */
export function requestLogger( req: express.Request, res: express.Response, next: express.NextFunction ): void {
	const start = Date.now();
	res.locals.requestId = crypto.randomUUID();

	res.on( "finish", () => {
		console.log( `[Request ${ getRequestId( res ) }] ${ req.method } ${ req.originalUrl } ${ res.statusCode } ${ Date.now() - start }ms` );
	} );
	next();
}

export function errorHandler( err: unknown, req: express.Request, res: express.Response, next: express.NextFunction ): void {
	const codedError = makeCodedError( err );
	console.error( `[Request ${ getRequestId( res ) }] ${ req.method } ${ req.originalUrl } failed with error code ${ codedError.errCode }:`, err );

	if ( res.headersSent ) {
		next( err );
		return;
	}
	sendInternalServerError( res );
}
