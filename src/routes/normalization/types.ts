import { ProviderObservation } from '../../types';
import { CityWeatherData } from './CityWeatherData';

/**
 * Anything that turns raw provider observations into CityWeatherData.
 */
export interface ObservationNormalizing {
    normalize(raw: ProviderObservation): CityWeatherData;
}
