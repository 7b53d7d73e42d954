import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../config.js';
import { FakeGateway } from '../test/fakes.js';
import {
    AllLocationsFailedError,
    InvalidInputError,
    NoValidLocationError,
    UnknownMetricError,
} from '../utils/errors.js';
import { MetricQueryService, locationCandidates } from './query.js';
import { OpenWeatherGateway } from './weather.js';

const PAYLOADS = {
    Paris: { main: { temp: 18.5, humidity: 71 }, rain: { '3h': 1.0 } },
    Tokyo: { main: { temp: 22, humidity: 60 } },
};

describe('locationCandidates', () => {
    it('divides a second "in" clause off the first', () => {
        expect(locationCandidates('Paris and snow in London')).toEqual(['Paris', 'snow in London']);
    });

    it('splits, then sanitizes each piece', () => {
        expect(locationCandidates('Paris (today) and Tokyo.')).toEqual(['Paris', 'Tokyo']);
    });

    it('drops pieces that sanitize to nothing', () => {
        expect(locationCandidates('now, Lima, next week')).toEqual(['Lima']);
    });
});

describe('MetricQueryService', () => {
    it('returns results and errors side by side on partial failure', async () => {
        const service = new MetricQueryService(new FakeGateway(PAYLOADS));

        const response = await service.query('temperature', 'Paris and Nowhereville123');

        expect(response).toEqual({
            results: [{ metric: 'temperature', location: 'Paris', value: 18.5, units: '°C', provider: 'fake' }],
            errors: [{ location: 'Nowhereville123', error: '404 Not Found: city not found' }],
        });
    });

    it('raises an aggregate failure with one entry per failed location', async () => {
        const service = new MetricQueryService(new FakeGateway(PAYLOADS));

        const err = await service.query('temperature', 'Atlantis, Nowhereville123').catch((e: unknown) => e);

        expect(err).toBeInstanceOf(AllLocationsFailedError);
        if (err instanceof AllLocationsFailedError) {
            expect(err.errors).toEqual([
                { location: 'Atlantis', error: '404 Not Found: city not found' },
                { location: 'Nowhereville123', error: '404 Not Found: city not found' },
            ]);
        }
    });

    it('rejects an unknown metric before any lookup', async () => {
        const gateway = new FakeGateway(PAYLOADS);
        const service = new MetricQueryService(gateway);

        await expect(service.query('moisture', 'Paris')).rejects.toBeInstanceOf(UnknownMetricError);
        expect(gateway.calls).toEqual([]);
    });

    it('normalizes the metric name', async () => {
        const service = new MetricQueryService(new FakeGateway(PAYLOADS));

        const response = await service.query(' Humidity ', 'Tokyo');

        expect(response.results).toEqual([
            { metric: 'humidity', location: 'Tokyo', value: 60, units: '%', provider: 'fake' },
        ]);
    });

    it('requires a location', async () => {
        const gateway = new FakeGateway(PAYLOADS);
        const service = new MetricQueryService(gateway);

        await expect(service.query('temperature', undefined)).rejects.toBeInstanceOf(InvalidInputError);
        await expect(service.query('temperature', '   ')).rejects.toBeInstanceOf(InvalidInputError);
        expect(gateway.calls).toEqual([]);
    });

    it('fails when nothing survives sanitization', async () => {
        const gateway = new FakeGateway(PAYLOADS);
        const service = new MetricQueryService(gateway);

        await expect(service.query('temperature', 'today, next week')).rejects.toBeInstanceOf(NoValidLocationError);
        expect(gateway.calls).toEqual([]);
    });

    it('keeps input order when lookups finish out of order', async () => {
        const service = new MetricQueryService(new FakeGateway(PAYLOADS, { Tokyo: 20 }));

        const response = await service.query('rainfall', 'Tokyo and Paris');

        expect(response.results.map(r => [r.location, r.value])).toEqual([
            ['Tokyo', 0],
            ['Paris', 1.0],
        ]);
        expect(response.errors).toEqual([]);
    });

    it('reports a missing API key per location', async () => {
        const service = new MetricQueryService(new OpenWeatherGateway(loadConfig({})));

        const err = await service.query('humidity', 'Paris').catch((e: unknown) => e);

        expect(err).toBeInstanceOf(AllLocationsFailedError);
        if (err instanceof AllLocationsFailedError) {
            expect(err.errors).toEqual([
                { location: 'Paris', error: 'OpenWeather API key is missing. Set OWM_API_KEY (or OWA) in environment.' },
            ]);
        }
    });

    it('turns a stalled provider body into a per-location error', async () => {
        const fetchMock = vi.fn().mockResolvedValue({
            ok: true,
            status: 200,
            statusText: 'OK',
            json: () => new Promise(() => {}),
        });
        vi.stubGlobal('fetch', fetchMock);
        try {
            const gateway = new OpenWeatherGateway(loadConfig({ OWM_API_KEY: 'test-key', WEATHER_TIMEOUT: '20' }));
            const service = new MetricQueryService(gateway);

            const err = await service.query('temperature', 'Paris').catch((e: unknown) => e);

            expect(err).toBeInstanceOf(AllLocationsFailedError);
            if (err instanceof AllLocationsFailedError) {
                expect(err.errors).toEqual([
                    { location: 'Paris', error: 'Request to OpenWeather failed: timed out after 20ms' },
                ]);
            }
        } finally {
            vi.unstubAllGlobals();
        }
    });
});
