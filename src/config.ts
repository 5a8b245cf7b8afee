import path from "path";
import { WEATHER_API_ENDPOINT } from "./routes/weatherProviders/WeatherApiProvider";
import { OPEN_METEO_ENDPOINT } from "./routes/weatherProviders/OpenMeteoProvider";

export interface AppConfig {
	port: number;
	weatherApiKey: string;
	weatherApiEndpoint: string;
	openMeteoEndpoint: string;
	/** Timeout of every provider request (in milliseconds). */
	providerTimeoutMs: number;
	/** CSV file mapping Open-Meteo weather codes to descriptions. */
	weatherCodesLocation: string;
	/** File the access log is persisted to, undefined if it is kept in memory only. */
	accessLogLocation: string | undefined;
}

type Environment = Record< string, string | undefined >;

function requireEnv( env: Environment, key: string ): string {
	const value = env[ key ];
	if ( !value ) {
		throw new Error( `Missing required environment variable: ${ key }` );
	}
	return value;
}

function positiveInteger( env: Environment, key: string, fallback: number ): number {
	const raw = env[ key ];
	if ( raw === undefined || raw === "" ) {
		return fallback;
	}
	const value = Number( raw );
	if ( !Number.isInteger( value ) || value <= 0 ) {
		throw new Error( `Environment variable ${ key } must be a positive integer, got "${ raw }"` );
	}
	return value;
}

export function loadConfig( env: Environment = process.env ): AppConfig {
	const dataDir = env.PERSISTENCE_LOCATION || path.join( process.cwd(), "data" );

	return {
		port: positiveInteger( env, "PORT", 3000 ),
		weatherApiKey: requireEnv( env, "WEATHER_API_KEY" ),
		weatherApiEndpoint: env.WEATHER_API_ENDPOINT || WEATHER_API_ENDPOINT,
		openMeteoEndpoint: env.OPEN_METEO_ENDPOINT || OPEN_METEO_ENDPOINT,
		providerTimeoutMs: positiveInteger( env, "PROVIDER_TIMEOUT_MS", 10000 ),
		weatherCodesLocation: env.WEATHER_CODES_LOCATION || path.join( process.cwd(), "data", "open_meteo_weather_codes.csv" ),
		accessLogLocation: env.LOCAL_PERSISTENCE ? path.join( dataDir, "accessLog.json" ) : undefined
	};
}
