/**
 * Environment configuration
 *
 * Parsed once from process.env with zod. Invalid values fail startup with the
 * offending keys listed.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
        PORT: z.coerce.number().int().positive().default(3001),
        LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        APP_VERSION: z.string().default('1.0.0'),

        DATABASE_URL: optionalString,
        DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
        REDIS_URL: optionalString,

        API_KEY: optionalString,
        ADMIN_API_KEY: optionalString,
        ALARM_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
        FRONTEND_URL: optionalString,

        CLOCK_SKEW_TOLERANCE_MS: z.coerce.number().int().min(0).default(5 * 60 * 1000),

        SCORE_THRESHOLD_LUKEWARM: z.coerce.number().default(15),
        SCORE_THRESHOLD_WARM: z.coerce.number().default(40),
        SCORE_THRESHOLD_HOT: z.coerce.number().default(70),
        ROUTING_HIGH_WATER_MARK: z.coerce.number().min(0).max(100).default(70),
        SCORE_DECAY_WINDOW_DAYS: z.coerce.number().int().positive().default(30),
        OPEN_WINDOW_DAYS: z.coerce.number().int().positive().default(7),
        OPEN_WINDOW_MIN_OPENS: z.coerce.number().int().positive().default(3),

        INGEST_MAX_IN_FLIGHT: z.coerce.number().int().positive().default(25),
        INGEST_QUEUE_MAX_DEPTH: z.coerce.number().int().positive().default(1000),
        STORE_MAX_RETRIES: z.coerce.number().int().min(1).default(5),

        RECONCILE_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
        RECONCILE_BATCH_SIZE: z.coerce.number().int().positive().default(100)
    })
    .superRefine((env, ctx) => {
        const { SCORE_THRESHOLD_LUKEWARM: lukewarm, SCORE_THRESHOLD_WARM: warm, SCORE_THRESHOLD_HOT: hot } = env;
        if (!(lukewarm > 0 && lukewarm < warm && warm < hot && hot <= 100)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SCORE_THRESHOLD_LUKEWARM'],
                message: `Level thresholds must satisfy 0 < lukewarm < warm < hot <= 100 (got ${lukewarm}, ${warm}, ${hot})`
            });
        }
        if (env.NODE_ENV === 'production' && !env.DATABASE_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['DATABASE_URL'],
                message: 'DATABASE_URL is required in production'
            });
        }
    });

export type EnvConfig = z.infer<typeof envSchema>;

// ============================================================================
// ENGINE CONFIGURATION
// ============================================================================

/**
 * Lower bound of each level above cold. Validated ascending, so every score
 * in [0, 100] maps to exactly one level.
 */
export interface LevelThresholds {
    lukewarm: number;
    warm: number;
    hot: number;
}

export interface RecencyBand {
    maxDays: number;
    factor: number;
}

export interface ScoringConfig {
    thresholds: LevelThresholds;
    intentWeights: {
        emailReply: number;
        meetingBooked: number;
        meetingCompleted: number;
        formSubmitted: number;
        requestedContact: number;
    };
    intentAdditionalBonus: number;
    repeatedEngagementWeight: number;
    lightFirstWeight: number;
    lightAdditionalWeight: number;
    lightCap: number;
    // Bands up to the decay window; anything older gets staleFactor.
    recencyBands: RecencyBand[];
    decayWindowDays: number;
    staleFactor: number;
    openWindowDays: number;
    openWindowMinOpens: number;
    repeatedVisitsMin: number;
    repeatedMessagesMin: number;
}

export interface RoutingConfig {
    highWaterMark: number;
}

export interface EngineConfig {
    scoring: ScoringConfig;
    routing: RoutingConfig;
}

export function buildScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
    const decayWindowDays = overrides.decayWindowDays ?? 30;
    return {
        thresholds: { lukewarm: 15, warm: 40, hot: 70 },
        intentWeights: {
            emailReply: 75,
            meetingBooked: 75,
            meetingCompleted: 85,
            formSubmitted: 75,
            requestedContact: 80
        },
        intentAdditionalBonus: 10,
        repeatedEngagementWeight: 40,
        lightFirstWeight: 15,
        lightAdditionalWeight: 3,
        lightCap: 24,
        recencyBands: [
            { maxDays: 7, factor: 1.0 },
            { maxDays: 14, factor: 0.8 },
            { maxDays: decayWindowDays, factor: 0.6 }
        ],
        decayWindowDays,
        staleFactor: 0,
        openWindowDays: 7,
        openWindowMinOpens: 3,
        repeatedVisitsMin: 2,
        repeatedMessagesMin: 2,
        ...overrides
    };
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    scoring: buildScoringConfig(),
    routing: { highWaterMark: 70 }
};

/**
 * Throws when thresholds do not partition [0, 100].
 */
export function assertValidThresholds(thresholds: LevelThresholds): void {
    const { lukewarm, warm, hot } = thresholds;
    if (!(lukewarm > 0 && lukewarm < warm && warm < hot && hot <= 100)) {
        throw new Error(`Invalid level thresholds: 0 < ${lukewarm} < ${warm} < ${hot} <= 100 does not hold`);
    }
}

// ============================================================================
// LOADING
// ============================================================================

export interface AppConfig {
    env: EnvConfig;
    engine: EngineConfig;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(source);
    if (!result.success) {
        const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`FATAL: Invalid environment configuration. ${problems.join('; ')}`);
    }

    const env = result.data;
    const scoring = buildScoringConfig({
        decayWindowDays: env.SCORE_DECAY_WINDOW_DAYS,
        openWindowDays: env.OPEN_WINDOW_DAYS,
        openWindowMinOpens: env.OPEN_WINDOW_MIN_OPENS
    });
    scoring.thresholds = {
        lukewarm: env.SCORE_THRESHOLD_LUKEWARM,
        warm: env.SCORE_THRESHOLD_WARM,
        hot: env.SCORE_THRESHOLD_HOT
    };

    return {
        env,
        engine: {
            scoring,
            routing: { highWaterMark: env.ROUTING_HIGH_WATER_MARK }
        }
    };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

/**
 * The engine configuration a service call runs with: the caller's override,
 * checked the way the environment is, or the loaded one.
 */
export function resolveEngineConfig(override?: EngineConfig): EngineConfig {
    if (!override) {
        return getConfig().engine;
    }
    assertValidThresholds(override.scoring.thresholds);
    const { highWaterMark } = override.routing;
    if (!(highWaterMark >= 0 && highWaterMark <= 100)) {
        throw new Error(`Invalid high-water mark: ${highWaterMark} is outside [0, 100]`);
    }
    return override;
}

export function resolveScoringConfig(override?: ScoringConfig): ScoringConfig {
    if (!override) {
        return getConfig().engine.scoring;
    }
    assertValidThresholds(override.thresholds);
    return override;
}
