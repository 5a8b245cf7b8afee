import { TZDate } from "@date-fns/tz";
import { format } from "date-fns";
import { weatherConditionLabel } from "../conditions/WeatherCondition";
import { CityWeatherData } from "../normalization/CityWeatherData";

/** Placeholder for values that are not available. */
export const NOT_AVAILABLE = "N / A";

export const CONDITION_SEPARATOR = " or ";

/** Consumer-facing representation of CityWeatherData. */
export interface WeatherResponse {
    latitude: number | null;
    longitude: number | null;
    /** ISO 8601 in UTC with explicit offset, e.g. "2023-11-14T22:13:20+00:00". */
    last_update: string;
    /** Temperature in Celsius with two decimals. */
    temp_c: string;
    weather_condition: string;
}

/**
 * Formats Unix epoch seconds as ISO 8601 in UTC, using "+00:00" instead of "Z".
 */
export function epochToIsoString(epoch: number): string {
    return format(new TZDate(epoch * 1000, "UTC"), "yyyy-MM-dd'T'HH:mm:ssxxx");
}

/**
 * Formats a temperature with two decimals. Values exactly halfway between two hundredths
 * are rounded to the even neighbour, e.g. 1.125 becomes "1.12".
 */
export function formatTemperature(tempC: number): string {
    const isTie = Number.isInteger(tempC * 8) && !Number.isInteger(tempC * 4);
    if (!isTie) {
        return tempC.toFixed(2);
    }
    const lower = Math.floor(tempC * 100);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return (even / 100).toFixed(2);
}

export function toWeatherResponse(data: CityWeatherData): WeatherResponse {
    return {
        latitude: data.latitude,
        longitude: data.longitude,
        last_update: data.lastUpdateEpoch !== null ? epochToIsoString(data.lastUpdateEpoch) : NOT_AVAILABLE,
        temp_c: data.tempC !== null ? formatTemperature(data.tempC) : NOT_AVAILABLE,
        weather_condition: data.weatherConditions.length > 0
            ? data.weatherConditions.map(weatherConditionLabel).join(CONDITION_SEPARATOR)
            : NOT_AVAILABLE
    };
}
