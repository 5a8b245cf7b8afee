import express from "express";
import { z } from "zod";
import { getUnixTime } from "date-fns";
import { ErrorCode, isCodedError } from "../errors";
import { AccessLogStore, AccessRecord } from "./accessLog/AccessLogStore";
import { NOT_AVAILABLE, epochToIsoString, toWeatherResponse } from "./aggregation/serialize";
import { CityWeatherSource } from "./weatherProviders/AggregatedWeatherProvider";
import { sendInternalServerError, sendResponse } from "./middleware";

const CityQuerySchema = z.object( {
	city: z.string().trim().min( 1 )
} );

export interface WeatherRouteDependencies {
	weatherSource: CityWeatherSource;
	accessLog: AccessLogStore;
	/** Current time in Unix epoch seconds. */
	now?: () => number;
}

function sendMissingCity( res: express.Response ): void {
	sendResponse( res, 400, {
		error: "Bad Request",
		message: "The required query parameter 'city' is missing.",
		details: "Please include ?city=CityName in the request URL."
	} );
}

function sendCityNotFound( res: express.Response, city: string, lastAccess: string, recentCities: string[] ): void {
	sendResponse( res, 404, {
		error: "Not found",
		message: "No data available for the specified city.",
		details: `No matching city was found with the name '${ city }'.`,
		last_access: lastAccess,
		recent_cities: recentCities
	} );
}

function sendServiceUnavailable( res: express.Response, lastAccess: string ): void {
	sendResponse( res, 503, {
		error: "Service Unavailable",
		message: "Service is currently unavailable.",
		details: "Please try again later.",
		last_access: lastAccess
	} );
}

/**
 * Handler for `GET /weather?city=<name>`. Records the request in the access log, then responds with the aggregated
 * weather for the city together with the client's previous access time and previously requested cities.
 */
export function getCityWeather( deps: WeatherRouteDependencies ): express.RequestHandler {
	const now = deps.now ?? ( () => getUnixTime( new Date() ) );

	return async function( req: express.Request, res: express.Response, next: express.NextFunction ) {
		const query = CityQuerySchema.safeParse( req.query );
		if ( !query.success ) {
			console.warn( "[Weather] Request missing 'city' parameter" );
			sendMissingCity( res );
			return;
		}
		const city = query.data.city;

		const ip = req.ip;
		if ( !ip ) {
			console.error( "[Weather] Could not determine the client address" );
			sendInternalServerError( res );
			return;
		}

		let lastAccess: string;
		let accessRecord: AccessRecord;
		try {
			const previousAccess = await deps.accessLog.getLastAccessTimestamp( ip );
			lastAccess = previousAccess !== undefined ? epochToIsoString( previousAccess ) : NOT_AVAILABLE;
			accessRecord = await deps.accessLog.recordAccess( ip, now(), city );
		} catch ( err ) {
			console.error( `[Weather] Access log unavailable for ${ ip }:`, err );
			sendInternalServerError( res );
			return;
		}

		const recentCities = accessRecord.recentCities.slice( 1 );

		try {
			const weatherData = await deps.weatherSource.getCityWeatherData( city );
			sendResponse( res, 200, {
				city,
				weather: toWeatherResponse( weatherData ),
				last_access: lastAccess,
				recent_cities: recentCities
			} );
		} catch ( err ) {
			if ( isCodedError( err, ErrorCode.NoLocationFound ) ) {
				console.warn( `[Weather] City weather data fetching failed as city was not found: ${ city }` );
				sendCityNotFound( res, city, lastAccess, recentCities );
			} else if ( isCodedError( err, ErrorCode.ProviderRequestFailed, ErrorCode.InsufficientWeatherData ) ) {
				console.warn( `[Weather] City weather data fetching failed for ${ city }:`, err );
				sendServiceUnavailable( res, lastAccess );
			} else {
				next( err );
			}
		}
	};
}
