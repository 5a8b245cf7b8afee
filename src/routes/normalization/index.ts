import { ProviderObservation } from '../../types';
import { CodedError, ErrorCode } from '../../errors';
import { CityWeatherData } from './CityWeatherData';
import { WeatherCodebook } from './codebook';
import { ObservationNormalizing } from './types';
import { OpenMeteoNormalizer } from './normalizers/OpenMeteoNormalizer';
import { WeatherApiNormalizer } from './normalizers/WeatherApiNormalizer';

function describeKind(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'kind' in raw) {
        return String(raw.kind);
    }
    return typeof raw;
}

function unsupportedObservation(raw: never): never {
    throw new CodedError(
        ErrorCode.UnsupportedObservationKind,
        `Unsupported observation kind: ${describeKind(raw)}`
    );
}

/**
 * Dispatches every provider observation to the normalizer of its provider.
 */
export class ObservationNormalizer implements ObservationNormalizing {
    private readonly weatherApi = new WeatherApiNormalizer();
    private readonly openMeteo: OpenMeteoNormalizer;

    constructor(codebook: WeatherCodebook) {
        this.openMeteo = new OpenMeteoNormalizer(codebook);
    }

    normalize(raw: ProviderObservation): CityWeatherData {
        switch (raw.kind) {
            case 'WeatherAPI':
                return this.weatherApi.normalize(raw);
            case 'OpenMeteo':
                return this.openMeteo.normalize(raw);
            default:
                return unsupportedObservation(raw);
        }
    }
}

export { CityWeatherData } from './CityWeatherData';
export { loadWeatherCodebook } from './codebook';
export type { WeatherCodebook } from './codebook';
export type { ObservationNormalizing } from './types';
