import { BaseNormalizer } from '../BaseNormalizer';
import { CityWeatherData } from '../CityWeatherData';
import { WeatherCodebook } from '../codebook';
import { OpenMeteoObservation } from '../../../types';

/**
 * Normalizer for the Open-Meteo weather service.
 *
 * OpenMeteo properties:
 * - Condition is a numeric WMO code, translated to text through the codebook
 * - Timestamp is a local "YYYY-MM-DDTHH:mm" string without timezone, reported in UTC
 * - Temperature is Celsius by default
 */
export class OpenMeteoNormalizer extends BaseNormalizer<OpenMeteoObservation> {
    readonly providerName = 'OpenMeteo';

    constructor(private readonly codebook: WeatherCodebook) {
        super();
    }

    normalize(raw: OpenMeteoObservation): CityWeatherData {
        return new CityWeatherData(
            raw.latitude,
            raw.longitude,
            this.normalizeTimestamp(raw.time),
            raw.tempC,
            this.resolveCondition(this.lookupConditionText(raw.weatherCode))
        );
    }

    private lookupConditionText(weatherCode: number | null): string | null {
        if (weatherCode === null) {
            this.warn('Observation without weather code');
            return null;
        }

        const text = this.codebook.get(weatherCode);
        if (text === undefined) {
            this.warn(`Weather code ${weatherCode} not in codebook`);
            return null;
        }

        return text;
    }
}
