import { WeatherCondition } from "./WeatherCondition";

/**
 * Substring rewrites applied to the lower-cased condition text before classification. Order matters: each rewrite
 * sees the output of the previous one.
 */
export const CONDITION_TEXT_REWRITES: ReadonlyArray<readonly [ string, string ]> = [
	[ "shower", "" ],
	[ "at times", "" ],
	[ "slight", "light" ],
	[ "fall", "" ],
	[ "partly", "partially" ],
	[ "patchy", "light" ],
	[ "violent", "heavy" ]
];

interface ConditionRule {
	matches: ( text: string ) => boolean;
	resolve: ( text: string ) => WeatherCondition;
}

function byIntensity( text: string, light: WeatherCondition, moderate: WeatherCondition, heavy: WeatherCondition ): WeatherCondition {
	if ( text.includes( "light" ) ) {
		return light;
	}
	if ( text.includes( "moderate" ) ) {
		return moderate;
	}
	if ( text.includes( "heavy" ) ) {
		return heavy;
	}
	return moderate;
}

/** Evaluated top to bottom; the first rule that matches decides the condition. */
export const CONDITION_RULES: readonly ConditionRule[] = [
	{
		matches: ( text ) => text.includes( "clear" ) || text.includes( "sunny" ),
		resolve: () => WeatherCondition.Clear
	},
	{
		matches: ( text ) => text.includes( "cloudy" ),
		resolve: ( text ) => text.includes( "partially" ) ? WeatherCondition.PartiallyCloudy : WeatherCondition.Cloudy
	},
	{
		matches: ( text ) => text.includes( "drizzle" ),
		resolve: () => WeatherCondition.Drizzle
	},
	{
		matches: ( text ) => text.includes( "rain" ),
		resolve: ( text ) => byIntensity( text, WeatherCondition.LightRain, WeatherCondition.ModerateRain, WeatherCondition.HeavyRain )
	},
	{
		matches: ( text ) => text.includes( "snow" ),
		resolve: ( text ) => byIntensity( text, WeatherCondition.LightSnow, WeatherCondition.ModerateSnow, WeatherCondition.HeavySnow )
	},
	{
		matches: ( text ) => text.includes( "mist" ),
		resolve: () => WeatherCondition.Mist
	},
	{
		matches: ( text ) => text.includes( "fog" ),
		resolve: () => WeatherCondition.Fog
	},
	{
		matches: ( text ) => text.includes( "overcast" ),
		resolve: () => WeatherCondition.Overcast
	}
];

export function normalizeConditionText( text: string ): string {
	return CONDITION_TEXT_REWRITES
		.reduce( ( result, [ search, replacement ] ) => result.replaceAll( search, replacement ), text.toLowerCase() )
		.trim();
}

/**
 * Maps a free-form provider description (e.g. "Patchy rain possible") onto a WeatherCondition. Modifiers such as
 * "at times" or "patchy" are stripped or rewritten first, then the core keywords are matched. Text that matches no
 * rule is classified as Unrecognized.
 */
export function classifyCondition( text: string ): WeatherCondition {
	const normalized = normalizeConditionText( text );
	const rule = CONDITION_RULES.find( ( candidate ) => candidate.matches( normalized ) );
	return rule ? rule.resolve( normalized ) : WeatherCondition.Unrecognized;
}
