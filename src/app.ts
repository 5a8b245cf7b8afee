import express from "express";
import { errorHandler, requestLogger } from "./routes/middleware";
import { getCityWeather, WeatherRouteDependencies } from "./routes/weather";

export function createApp( deps: WeatherRouteDependencies ): express.Application {
	const app = express();

	app.use( requestLogger );

	app.get( "/weather", getCityWeather( deps ) );

	app.get( "/healthz", ( _req, res ) => {
		res.status( 200 ).json( { ok: true } );
	} );

	app.use( errorHandler );

	return app;
}
