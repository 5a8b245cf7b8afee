/** Geographic coordinates. The 1st element is the latitude, and the 2nd element is the longitude. */
export type GeoCoordinates = [number, number];

/** Current conditions for a city as reported by WeatherAPI.com. Every field may be missing from the response. */
export interface WeatherApiObservation {
	kind: "WeatherAPI";
	cityName: string | null;
	countryName: string | null;
	latitude: number | null;
	longitude: number | null;
	/** The time of the last update on WeatherAPI's end (in Unix epoch seconds). */
	lastUpdateEpoch: number | null;
	/** The current temperature (in Celsius). */
	tempC: number | null;
	/** A human-readable description of the weather (e.g. "Partly cloudy"). */
	conditionText: string | null;
	conditionCode: number | null;
}

/** Current conditions for a location as reported by Open-Meteo. */
export interface OpenMeteoObservation {
	kind: "OpenMeteo";
	latitude: number | null;
	longitude: number | null;
	/** Time of the observation as "YYYY-MM-DDTHH:mm" without a timezone; Open-Meteo reports it in UTC. */
	time: string | null;
	/** The current temperature (in Celsius). */
	tempC: number | null;
	/** WMO weather interpretation code. */
	weatherCode: number | null;
}

/** Raw observation from any supported provider, tagged by the provider that produced it. */
export type ProviderObservation = WeatherApiObservation | OpenMeteoObservation;
