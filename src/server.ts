import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import LocalAccessLogStore from "./routes/accessLog/LocalAccessLogStore";
import { loadWeatherCodebook, ObservationNormalizer } from "./routes/normalization";
import AggregatedWeatherProvider from "./routes/weatherProviders/AggregatedWeatherProvider";
import OpenMeteoProvider from "./routes/weatherProviders/OpenMeteoProvider";
import WeatherApiProvider from "./routes/weatherProviders/WeatherApiProvider";

function main(): void {
	dotenv.config();
	const config = loadConfig();

	const weatherSource = new AggregatedWeatherProvider( {
		primary: new WeatherApiProvider( {
			apiKey: config.weatherApiKey,
			endpoint: config.weatherApiEndpoint,
			timeoutMs: config.providerTimeoutMs
		} ),
		secondary: new OpenMeteoProvider( {
			endpoint: config.openMeteoEndpoint,
			timeoutMs: config.providerTimeoutMs
		} ),
		normalizer: new ObservationNormalizer( loadWeatherCodebook( config.weatherCodesLocation ) )
	} );

	const accessLog = new LocalAccessLogStore( config.accessLogLocation );
	if ( config.accessLogLocation ) {
		console.log( `[Server] Access log persistence enabled, saving to ${ config.accessLogLocation }` );
	}

	const app = createApp( { weatherSource, accessLog } );
	app.listen( config.port, () => {
		console.log( `City weather aggregator listening on port ${ config.port }` );
	} );
}

try {
	main();
} catch ( err ) {
	console.error( "Failed to start city weather aggregator:", err );
	process.exit( 1 );
}
