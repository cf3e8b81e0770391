import { assertValidThresholds, DEFAULT_ENGINE_CONFIG, loadConfig, resolveEngineConfig, resolveScoringConfig } from '../src/config';

describe('Configuration', () => {
    it('should fall back to defaults', () => {
        const { env, engine } = loadConfig({});

        expect(env.NODE_ENV).toBe('development');
        expect(env.PORT).toBe(3001);
        expect(env.DATABASE_URL).toBeUndefined();
        expect(env.INGEST_QUEUE_MAX_DEPTH).toBe(1000);
        expect(engine.scoring.thresholds).toEqual({ lukewarm: 15, warm: 40, hot: 70 });
        expect(engine.routing.highWaterMark).toBe(70);
    });

    it('should read thresholds and the high-water mark from the environment', () => {
        const { engine } = loadConfig({
            SCORE_THRESHOLD_LUKEWARM: '10',
            SCORE_THRESHOLD_WARM: '50',
            SCORE_THRESHOLD_HOT: '80',
            ROUTING_HIGH_WATER_MARK: '85'
        });

        expect(engine.scoring.thresholds).toEqual({ lukewarm: 10, warm: 50, hot: 80 });
        expect(engine.routing.highWaterMark).toBe(85);
    });

    it('should stretch the last recency band to the decay window', () => {
        const { engine } = loadConfig({ SCORE_DECAY_WINDOW_DAYS: '45' });

        expect(engine.scoring.decayWindowDays).toBe(45);
        expect(engine.scoring.recencyBands).toEqual([
            { maxDays: 7, factor: 1 },
            { maxDays: 14, factor: 0.8 },
            { maxDays: 45, factor: 0.6 }
        ]);
    });

    it('should treat blank keys as unset', () => {
        expect(loadConfig({ API_KEY: '   ' }).env.API_KEY).toBeUndefined();
    });

    it('should refuse thresholds that do not ascend', () => {
        expect(() => loadConfig({ SCORE_THRESHOLD_WARM: '10' })).toThrow(
            'FATAL: Invalid environment configuration. SCORE_THRESHOLD_LUKEWARM: Level thresholds must satisfy 0 < lukewarm < warm < hot <= 100 (got 15, 10, 70)'
        );
    });

    it('should require a database in production', () => {
        expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('DATABASE_URL: DATABASE_URL is required in production');
        expect(loadConfig({ NODE_ENV: 'production', DATABASE_URL: 'postgres://localhost/routing' }).env.NODE_ENV).toBe('production');
    });

    it('should check thresholds passed in code', () => {
        expect(() => assertValidThresholds({ lukewarm: 15, warm: 40, hot: 70 })).not.toThrow();
        expect(() => assertValidThresholds({ lukewarm: 40, warm: 40, hot: 70 })).toThrow(
            'Invalid level thresholds: 0 < 40 < 40 < 70 <= 100 does not hold'
        );
    });

    describe('resolveEngineConfig', () => {
        it('should pass a valid override through untouched', () => {
            const override = { ...DEFAULT_ENGINE_CONFIG, routing: { highWaterMark: 50 } };
            expect(resolveEngineConfig(override)).toBe(override);
        });

        it('should refuse overlapping thresholds in an override', () => {
            const scoring = { ...DEFAULT_ENGINE_CONFIG.scoring, thresholds: { lukewarm: 15, warm: 80, hot: 70 } };

            expect(() => resolveEngineConfig({ ...DEFAULT_ENGINE_CONFIG, scoring })).toThrow(
                'Invalid level thresholds: 0 < 15 < 80 < 70 <= 100 does not hold'
            );
            expect(() => resolveScoringConfig(scoring)).toThrow('Invalid level thresholds');
        });

        it('should refuse a high-water mark outside the score range', () => {
            expect(() => resolveEngineConfig({ ...DEFAULT_ENGINE_CONFIG, routing: { highWaterMark: 120 } })).toThrow(
                'Invalid high-water mark: 120 is outside [0, 100]'
            );
        });
    });
});
