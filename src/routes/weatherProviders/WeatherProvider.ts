import { GeoCoordinates, OpenMeteoObservation, WeatherApiObservation } from "../../types";

/**
 * A provider that resolves a city by name. Implementations reject with a CodedError: `NoLocationFound` if the city is
 * unknown to the provider, `ProviderRequestFailed` for any other failure.
 */
export interface CityWeatherProvider {
	getObservation( city: string ): Promise< WeatherApiObservation >;
}

/**
 * A provider that reports the current weather for a location. Implementations reject with a CodedError with the
 * `ProviderRequestFailed` code.
 */
export interface LocationWeatherProvider {
	getObservation( coordinates: GeoCoordinates ): Promise< OpenMeteoObservation >;
}
