/**
 * Normalized weather conditions used across all providers. The numeric value of each member is a stable identifier;
 * the display label lives in `WEATHER_CONDITION_LABELS`.
 */
export enum WeatherCondition {
	Clear = 0,
	PartiallyCloudy = 1,
	Cloudy = 2,
	Drizzle = 3,
	LightRain = 4,
	ModerateRain = 5,
	HeavyRain = 6,
	LightSnow = 7,
	ModerateSnow = 8,
	HeavySnow = 9,
	Overcast = 10,
	Mist = 11,
	Fog = 12,
	Unrecognized = 13
}

export const WEATHER_CONDITION_LABELS: Readonly<Record<WeatherCondition, string>> = {
	[ WeatherCondition.Clear ]: "Clear",
	[ WeatherCondition.PartiallyCloudy ]: "Partially Cloudy",
	[ WeatherCondition.Cloudy ]: "Cloudy",
	[ WeatherCondition.Drizzle ]: "Drizzle",
	[ WeatherCondition.LightRain ]: "Light Rain",
	[ WeatherCondition.ModerateRain ]: "Moderate Rain",
	[ WeatherCondition.HeavyRain ]: "Heavy Rain",
	[ WeatherCondition.LightSnow ]: "Light Snow",
	[ WeatherCondition.ModerateSnow ]: "Moderate Snow",
	[ WeatherCondition.HeavySnow ]: "Heavy Snow",
	[ WeatherCondition.Overcast ]: "Overcast",
	[ WeatherCondition.Mist ]: "Mist",
	[ WeatherCondition.Fog ]: "Fog",
	[ WeatherCondition.Unrecognized ]: "Unrecognized"
};

export function weatherConditionLabel( condition: WeatherCondition ): string {
	return WEATHER_CONDITION_LABELS[ condition ];
}
