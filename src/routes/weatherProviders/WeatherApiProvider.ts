import { z } from "zod";
import { WeatherApiObservation } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { HttpRequestError, httpJSONRequest } from "../http";
import { CityWeatherProvider } from "./WeatherProvider";

export const WEATHER_API_ENDPOINT = "https://api.weatherapi.com/v1/current.json";

/** Error code WeatherAPI uses for "No matching location found". */
export const WEATHER_API_LOCATION_NOT_FOUND = 1006;

const WeatherApiResponseSchema = z.object( {
	location: z.object( {
		name: z.string().nullish(),
		country: z.string().nullish(),
		lat: z.number().nullish(),
		lon: z.number().nullish()
	} ).nullish(),
	current: z.object( {
		last_updated_epoch: z.number().nullish(),
		temp_c: z.number().nullish(),
		condition: z.object( {
			text: z.string().nullish(),
			code: z.number().nullish()
		} ).nullish()
	} ).nullish()
} );

const WeatherApiErrorSchema = z.object( {
	error: z.object( { code: z.number() } )
} );

function isLocationNotFound( err: unknown ): boolean {
	if ( !( err instanceof HttpRequestError ) ) {
		return false;
	}
	const parsed = WeatherApiErrorSchema.safeParse( err.body );
	return parsed.success && parsed.data.error.code === WEATHER_API_LOCATION_NOT_FOUND;
}

export interface WeatherApiProviderOptions {
	apiKey: string;
	endpoint?: string;
	timeoutMs?: number;
}

/** Primary provider: resolves a city by name and reports its current conditions. */
export default class WeatherApiProvider implements CityWeatherProvider {
	private readonly apiKey: string;
	private readonly endpoint: string;
	private readonly timeoutMs: number | undefined;

	public constructor( options: WeatherApiProviderOptions ) {
		this.apiKey = options.apiKey;
		this.endpoint = options.endpoint ?? WEATHER_API_ENDPOINT;
		this.timeoutMs = options.timeoutMs;
	}

	public async getObservation( city: string ): Promise< WeatherApiObservation > {
		const url = new URL( this.endpoint );
		url.searchParams.set( "key", this.apiKey );
		url.searchParams.set( "q", city );

		let data: unknown;
		try {
			data = await httpJSONRequest( url, { timeoutMs: this.timeoutMs } );
		} catch ( err ) {
			if ( isLocationNotFound( err ) ) {
				throw new CodedError( ErrorCode.NoLocationFound, `WeatherAPI has no location named "${ city }"` );
			}
			throw new CodedError( ErrorCode.ProviderRequestFailed, "WeatherAPI request failed", { cause: err } );
		}

		const parsed = WeatherApiResponseSchema.safeParse( data );
		if ( !parsed.success ) {
			throw new CodedError( ErrorCode.ProviderRequestFailed, "WeatherAPI returned an unexpected response", { cause: parsed.error } );
		}

		const { location, current } = parsed.data;
		return {
			kind: "WeatherAPI",
			cityName: location?.name ?? null,
			countryName: location?.country ?? null,
			latitude: location?.lat ?? null,
			longitude: location?.lon ?? null,
			lastUpdateEpoch: current?.last_updated_epoch ?? null,
			tempC: current?.temp_c ?? null,
			conditionText: current?.condition?.text ?? null,
			conditionCode: current?.condition?.code ?? null
		};
	}
}
