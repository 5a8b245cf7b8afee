import { BaseNormalizer } from '../BaseNormalizer';
import { CityWeatherData } from '../CityWeatherData';
import { WeatherApiObservation } from '../../../types';

/**
 * Normalizer for WeatherAPI.com.
 *
 * WeatherAPI properties:
 * - Condition is delivered as free text (e.g. "Patchy rain possible")
 * - Timestamp is already Unix epoch seconds
 * - Temperature is requested in Celsius
 */
export class WeatherApiNormalizer extends BaseNormalizer<WeatherApiObservation> {
    readonly providerName = 'WeatherAPI';

    normalize(raw: WeatherApiObservation): CityWeatherData {
        return new CityWeatherData(
            raw.latitude,
            raw.longitude,
            raw.lastUpdateEpoch,
            raw.tempC,
            this.resolveCondition(raw.conditionText)
        );
    }
}
