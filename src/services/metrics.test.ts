import { describe, it, expect } from 'vitest';
import { resolveMetric } from './metrics.js';

const PARIS = {
    name: 'Paris',
    main: { temp: 18.5, humidity: 71, pressure: 1014 },
    wind: { speed: 4.1, deg: 250 },
    rain: { '1h': 2.5 },
};

describe('resolveMetric', () => {
    it('reads main and wind fields', () => {
        expect(resolveMetric('temperature', PARIS)).toBe(18.5);
        expect(resolveMetric('humidity', PARIS)).toBe(71);
        expect(resolveMetric('pressure', PARIS)).toBe(1014);
        expect(resolveMetric('wind_speed', PARIS)).toBe(4.1);
    });

    it('returns null when a field is missing', () => {
        expect(resolveMetric('temperature', { wind: { speed: 2 } })).toBeNull();
        expect(resolveMetric('wind_speed', { main: { temp: 3 } })).toBeNull();
        expect(resolveMetric('pressure', { main: {} })).toBeNull();
    });

    it('returns null for non-numeric fields', () => {
        expect(resolveMetric('temperature', { main: { temp: '12' } })).toBeNull();
        expect(resolveMetric('humidity', { main: null })).toBeNull();
    });

    describe('rainfall', () => {
        it('prefers the 1h amount', () => {
            expect(resolveMetric('rainfall', { rain: { '1h': 2.5, '3h': 6 } })).toBe(2.5);
        });

        it('falls back to the 3h amount', () => {
            expect(resolveMetric('rainfall', { rain: { '3h': 1.0 } })).toBe(1.0);
        });

        it('treats a zero 1h amount as missing', () => {
            expect(resolveMetric('rainfall', { rain: { '1h': 0, '3h': 0.4 } })).toBe(0.4);
        });

        it('is 0 without a rain object', () => {
            expect(resolveMetric('rainfall', { main: { temp: 10 } })).toBe(0);
            expect(resolveMetric('rainfall', { rain: 'heavy' })).toBe(0);
            expect(resolveMetric('rainfall', { rain: {} })).toBe(0);
        });
    });

    it('copes with payloads that are not objects', () => {
        expect(resolveMetric('temperature', null)).toBeNull();
        expect(resolveMetric('rainfall', [1, 2])).toBe(0);
    });
});
