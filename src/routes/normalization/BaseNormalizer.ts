import { tz } from '@date-fns/tz';
import { getUnixTime, isValid, parseISO } from 'date-fns';
import { ProviderObservation } from '../../types';
import { classifyCondition } from '../conditions/classifyCondition';
import { WeatherCondition } from '../conditions/WeatherCondition';
import { CityWeatherData } from './CityWeatherData';

/**
 * Abstract base class for observation normalizers.
 * Every provider has a concrete normalizer extending this class.
 */
export abstract class BaseNormalizer<T extends ProviderObservation> {
    /**
     * Provider name (e.g. "WeatherAPI", "OpenMeteo")
     */
    abstract readonly providerName: string;

    /**
     * Convert a raw provider observation into provider-independent CityWeatherData.
     */
    abstract normalize(raw: T): CityWeatherData;

    /**
     * Interpret a provider-local timestamp without timezone as UTC.
     *
     * @param localTime - e.g. "2024-05-01T12:00"
     * @returns Unix epoch seconds, or null if the timestamp is missing or cannot be parsed
     */
    protected normalizeTimestamp(localTime: string | null): number | null {
        if (!localTime) {
            return null;
        }

        const date = parseISO(localTime, { in: tz('UTC') });
        if (!isValid(date)) {
            this.warn(`Unparsable timestamp "${localTime}"`);
            return null;
        }

        return getUnixTime(date);
    }

    /**
     * Classify the condition text; observations without text are Unrecognized.
     */
    protected resolveCondition(conditionText: string | null): WeatherCondition {
        return conditionText
            ? classifyCondition(conditionText)
            : WeatherCondition.Unrecognized;
    }

    /**
     * Log normalization info.
     */
    protected log(message: string): void {
        console.log(`[${this.providerName} Normalizer] ${message}`);
    }

    /**
     * Log a warning.
     */
    protected warn(message: string): void {
        console.warn(`[${this.providerName} Normalizer] ${message}`);
    }
}
