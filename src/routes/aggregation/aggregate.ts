import { getUnixTime } from "date-fns";
import { WeatherCondition } from "../conditions/WeatherCondition";
import { CityWeatherData } from "../normalization/CityWeatherData";

/** Observations older than this (in seconds, relative to now) are discarded. */
export const STALE_CUTOFF_SECONDS = 6 * 60 * 60;

export function currentEpoch(): number {
    return getUnixTime(new Date());
}

/**
 * An observation is usable if it has a location and a timestamp that is at most
 * STALE_CUTOFF_SECONDS old.
 */
export function isUsableObservation(data: CityWeatherData, now: number): boolean {
    return data.latitude !== null
        && data.longitude !== null
        && data.lastUpdateEpoch !== null
        && now - data.lastUpdateEpoch <= STALE_CUTOFF_SECONDS;
}

function average(values: readonly number[]): number | null {
    if (values.length === 0) {
        return null;
    }
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Merges normalized observations of one city into a single record.
 *
 * - Location is taken from the first usable observation
 * - Timestamp is the OLDEST timestamp among usable observations
 * - Temperature is the mean over usable observations that report one
 * - Conditions are the distinct first conditions of usable observations; observations
 *   that only report Unrecognized still count for location and temperature
 *
 * @returns the merged record, or undefined if no observation is usable
 */
export function aggregateCityWeatherData(
    observations: readonly CityWeatherData[],
    now: number = currentEpoch()
): CityWeatherData | undefined {
    const usable = observations.filter(data => isUsableObservation(data, now));

    if (usable.length === 0) {
        return undefined;
    }

    const timestamps: number[] = [];
    const temperatures: number[] = [];
    const conditions = new Set<WeatherCondition>();

    for (const data of usable) {
        if (data.lastUpdateEpoch !== null) {
            timestamps.push(data.lastUpdateEpoch);
        }
        if (data.tempC !== null) {
            temperatures.push(data.tempC);
        }
        if (data.weatherConditions.length > 0 && !data.hasOnlyUnrecognizedCondition()) {
            conditions.add(data.weatherConditions[0]);
        }
    }

    const [first] = usable;

    return new CityWeatherData(
        first.latitude,
        first.longitude,
        Math.min(...timestamps),
        average(temperatures),
        Array.from(conditions)
    );
}
