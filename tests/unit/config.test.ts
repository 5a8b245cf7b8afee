import path from 'path';
import { loadConfig } from '../../src/config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({ WEATHER_API_KEY: 'test-key' })).toEqual({
      port: 3000,
      weatherApiKey: 'test-key',
      weatherApiEndpoint: 'https://api.weatherapi.com/v1/current.json',
      openMeteoEndpoint: 'https://api.open-meteo.com/v1/forecast',
      providerTimeoutMs: 10000,
      weatherCodesLocation: path.join(process.cwd(), 'data', 'open_meteo_weather_codes.csv'),
      accessLogLocation: undefined
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      WEATHER_API_KEY: 'test-key',
      PORT: '8080',
      PROVIDER_TIMEOUT_MS: '2500',
      WEATHER_API_ENDPOINT: 'http://localhost:9000/current.json',
      OPEN_METEO_ENDPOINT: 'http://localhost:9001/forecast',
      WEATHER_CODES_LOCATION: '/etc/weather/codes.csv'
    });

    expect(config.port).toBe(8080);
    expect(config.providerTimeoutMs).toBe(2500);
    expect(config.weatherApiEndpoint).toBe('http://localhost:9000/current.json');
    expect(config.openMeteoEndpoint).toBe('http://localhost:9001/forecast');
    expect(config.weatherCodesLocation).toBe('/etc/weather/codes.csv');
  });

  it('should persist the access log if local persistence is enabled', () => {
    expect(loadConfig({ WEATHER_API_KEY: 'test-key', LOCAL_PERSISTENCE: 'true' }).accessLogLocation)
      .toBe(path.join(process.cwd(), 'data', 'accessLog.json'));
    expect(loadConfig({ WEATHER_API_KEY: 'test-key', LOCAL_PERSISTENCE: 'true', PERSISTENCE_LOCATION: '/var/lib/weather' }).accessLogLocation)
      .toBe('/var/lib/weather/accessLog.json');
  });

  it('should require the WeatherAPI key', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variable: WEATHER_API_KEY');
  });

  it('should reject an invalid port', () => {
    expect(() => loadConfig({ WEATHER_API_KEY: 'test-key', PORT: 'abc' }))
      .toThrow('Environment variable PORT must be a positive integer, got "abc"');
    expect(() => loadConfig({ WEATHER_API_KEY: 'test-key', PORT: '-1' }))
      .toThrow('Environment variable PORT must be a positive integer, got "-1"');
  });
});
