import { z } from "zod";
import { GeoCoordinates, OpenMeteoObservation } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { httpJSONRequest } from "../http";
import { LocationWeatherProvider } from "./WeatherProvider";

export const OPEN_METEO_ENDPOINT = "https://api.open-meteo.com/v1/forecast";

const OpenMeteoResponseSchema = z.object( {
	latitude: z.number().nullish(),
	longitude: z.number().nullish(),
	current_weather: z.object( {
		time: z.string().nullish(),
		temperature: z.number().nullish(),
		weathercode: z.number().nullish()
	} ).nullish()
} );

export interface OpenMeteoProviderOptions {
	endpoint?: string;
	timeoutMs?: number;
}

/** Secondary provider: reports the current weather at the coordinates resolved by the primary provider. */
export default class OpenMeteoProvider implements LocationWeatherProvider {
	private readonly endpoint: string;
	private readonly timeoutMs: number | undefined;

	public constructor( options: OpenMeteoProviderOptions = {} ) {
		this.endpoint = options.endpoint ?? OPEN_METEO_ENDPOINT;
		this.timeoutMs = options.timeoutMs;
	}

	public async getObservation( coordinates: GeoCoordinates ): Promise< OpenMeteoObservation > {
		const url = new URL( this.endpoint );
		url.searchParams.set( "latitude", String( coordinates[ 0 ] ) );
		url.searchParams.set( "longitude", String( coordinates[ 1 ] ) );
		url.searchParams.set( "current_weather", "true" );

		let data: unknown;
		try {
			data = await httpJSONRequest( url, { timeoutMs: this.timeoutMs } );
		} catch ( err ) {
			throw new CodedError( ErrorCode.ProviderRequestFailed, "OpenMeteo request failed", { cause: err } );
		}

		const parsed = OpenMeteoResponseSchema.safeParse( data );
		if ( !parsed.success ) {
			throw new CodedError( ErrorCode.ProviderRequestFailed, "OpenMeteo returned an unexpected response", { cause: parsed.error } );
		}

		const { latitude, longitude, current_weather: current } = parsed.data;
		return {
			kind: "OpenMeteo",
			latitude: latitude ?? null,
			longitude: longitude ?? null,
			time: current?.time ?? null,
			tempC: current?.temperature ?? null,
			weatherCode: current?.weathercode ?? null
		};
	}
}
