import { WeatherCondition } from '../conditions/WeatherCondition';

/**
 * Provider-independent weather data for a city.
 *
 * The same shape is used for a single normalized provider observation and for the
 * record produced by averaging several of them.
 */
export class CityWeatherData {
    readonly weatherConditions: readonly WeatherCondition[];

    /**
     * @param latitude - null if the provider did not report a location
     * @param longitude - null if the provider did not report a location
     * @param lastUpdateEpoch - Unix epoch seconds of the observation, null if unknown
     * @param tempC - temperature in Celsius, null if unknown
     * @param weatherCondition - a single condition is wrapped into a one-element list
     */
    constructor(
        readonly latitude: number | null,
        readonly longitude: number | null,
        readonly lastUpdateEpoch: number | null,
        readonly tempC: number | null,
        weatherCondition: WeatherCondition | readonly WeatherCondition[]
    ) {
        this.weatherConditions = typeof weatherCondition === 'number'
            ? [weatherCondition]
            : [...weatherCondition];
    }

    /**
     * True if the only reported condition is Unrecognized.
     */
    hasOnlyUnrecognizedCondition(): boolean {
        return this.weatherConditions.length === 1
            && this.weatherConditions[0] === WeatherCondition.Unrecognized;
    }
}
