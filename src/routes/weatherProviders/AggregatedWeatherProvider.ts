import { ProviderObservation } from "../../types";
import { CodedError, ErrorCode, isCodedError } from "../../errors";
import { aggregateCityWeatherData, currentEpoch } from "../aggregation/aggregate";
import { CityWeatherData, ObservationNormalizing } from "../normalization";
import { CityWeatherProvider, LocationWeatherProvider } from "./WeatherProvider";

/** Anything that can produce aggregated weather for a city name. */
export interface CityWeatherSource {
	getCityWeatherData( city: string ): Promise< CityWeatherData >;
}

export interface AggregatedWeatherProviderOptions {
	/** Resolves the city by name. Required: its failure fails the request. */
	primary: CityWeatherProvider;
	/** Queried at the primary's coordinates. Best-effort: a failed request is logged and skipped. */
	secondary: LocationWeatherProvider;
	normalizer: ObservationNormalizing;
	/** Current time in Unix epoch seconds. */
	now?: () => number;
}

/**
 * AggregatedWeatherProvider combines the primary and secondary providers into one record per city.
 *
 * Flow:
 * 1. Query the primary provider by city name (e.g. WeatherAPI)
 * 2. Use the coordinates from the primary result to query the secondary provider (e.g. OpenMeteo)
 * 3. Normalize both observations into CityWeatherData
 * 4. Merge them, dropping stale or incomplete observations
 */
export default class AggregatedWeatherProvider implements CityWeatherSource {
	private readonly primary: CityWeatherProvider;
	private readonly secondary: LocationWeatherProvider;
	private readonly normalizer: ObservationNormalizing;
	private readonly now: () => number;

	public constructor( options: AggregatedWeatherProviderOptions ) {
		this.primary = options.primary;
		this.secondary = options.secondary;
		this.normalizer = options.normalizer;
		this.now = options.now ?? currentEpoch;
	}

	/**
	 * @throws CodedError `NoLocationFound` if the primary provider does not know the city, `ProviderRequestFailed` if
	 * the primary request failed, `InsufficientWeatherData` if every observation was filtered out.
	 */
	public async getCityWeatherData( city: string ): Promise< CityWeatherData > {
		const primary = await this.primary.getObservation( city );
		const observations: ProviderObservation[] = [ primary ];

		if ( primary.latitude !== null && primary.longitude !== null ) {
			try {
				observations.push( await this.secondary.getObservation( [ primary.latitude, primary.longitude ] ) );
			} catch ( err ) {
				if ( !isCodedError( err, ErrorCode.ProviderRequestFailed ) ) {
					throw err;
				}
				console.warn( `[AggregatedWeather] Secondary provider unavailable for "${ city }", continuing with primary only:`, err );
			}
		} else {
			console.warn( `[AggregatedWeather] Primary provider returned no coordinates for "${ city }", skipping secondary provider` );
		}

		const normalized = observations.map( ( observation ) => this.normalizer.normalize( observation ) );
		const aggregated = aggregateCityWeatherData( normalized, this.now() );

		if ( !aggregated ) {
			console.warn( `[AggregatedWeather] All ${ normalized.length } observations for "${ city }" were stale or incomplete` );
			throw new CodedError( ErrorCode.InsufficientWeatherData, "All city weather data were filtered out" );
		}

		console.log( `[AggregatedWeather] Aggregated ${ normalized.length } observations for "${ city }"` );
		return aggregated;
	}
}
