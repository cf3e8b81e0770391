/**
 * Security Middleware
 *
 * Implements:
 * - Redis-backed rate limiting with per-route tiers
 * - Bearer API key checks (ingest/read key and operator admin key)
 * - Security headers
 */

import { createHash, timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { RateLimiterRedis, RateLimiterMemory, RateLimiterAbstract, RateLimiterRes } from 'rate-limiter-flexible';
import { getConfig } from '../config';
import { getRedisClient } from '../utils/redis';
import { logger } from '../services/observabilityService';
import { errorResponse } from '../utils/response';

// ============================================================================
// RATE LIMITING (Redis-backed with in-memory fallback)
// ============================================================================

interface RateLimitTier {
    points: number;    // Max requests
    duration: number;  // Window in seconds
}

type TierName = 'ingest' | 'admin' | 'general';

const RATE_LIMIT_TIERS: Record<TierName, RateLimitTier> = {
    ingest: { points: 600, duration: 60 },
    admin: { points: 30, duration: 60 },
    general: { points: 120, duration: 60 }
};

const TIER_NAMES: readonly TierName[] = ['ingest', 'admin', 'general'];

const rateLimiters = new Map<TierName, RateLimiterAbstract>();

/**
 * Initialize rate limiters.
 * Uses Redis when available, falls back to in-memory.
 */
export function initRateLimiters(): void {
    const redis = getRedisClient();

    for (const tier of TIER_NAMES) {
        const config = RATE_LIMIT_TIERS[tier];
        rateLimiters.set(
            tier,
            redis
                ? new RateLimiterRedis({
                      storeClient: redis,
                      keyPrefix: `rl:${tier}`,
                      points: config.points,
                      duration: config.duration
                  })
                : new RateLimiterMemory({
                      keyPrefix: `rl:${tier}`,
                      points: config.points,
                      duration: config.duration
                  })
        );
    }

    logger.info('[SECURITY] Rate limiters initialized', {
        backend: redis ? 'redis' : 'memory',
        tiers: TIER_NAMES
    });
}

/**
 * Determine which rate limit tier applies to a request.
 */
export function getTier(req: Request): TierName {
    const path = req.originalUrl.toLowerCase();
    if (path.startsWith('/api/events')) return 'ingest';
    if (path.startsWith('/api/admin')) return 'admin';
    return 'general';
}

function getClientIdentifier(req: Request): string {
    const token = bearerToken(req);
    if (token) {
        return `key:${createHash('sha256').update(token).digest('hex').substring(0, 16)}`;
    }
    return `ip:${req.ip || req.socket.remoteAddress || 'unknown'}`;
}

/**
 * Rate limiting middleware.
 */
export async function rateLimit(req: Request, res: Response, next: NextFunction): Promise<void> {
    const tier = getTier(req);
    const limiter = rateLimiters.get(tier);

    if (!limiter) {
        // Limiters not initialized yet; allow request
        next();
        return;
    }

    const { points } = RATE_LIMIT_TIERS[tier];

    try {
        const result = await limiter.consume(getClientIdentifier(req));

        res.setHeader('X-RateLimit-Limit', points);
        res.setHeader('X-RateLimit-Remaining', result.remainingPoints);
        res.setHeader('X-RateLimit-Reset', new Date(Date.now() + result.msBeforeNext).toISOString());

        next();
    } catch (rejection) {
        if (!(rejection instanceof RateLimiterRes)) {
            // Limiter backend unreachable: do not block ingestion on it.
            logger.warn('[SECURITY] Rate limiter unavailable, allowing request', {
                tier,
                error: rejection instanceof Error ? rejection.message : String(rejection)
            });
            next();
            return;
        }

        const retryAfter = Math.ceil(rejection.msBeforeNext / 1000) || 60;

        res.setHeader('Retry-After', retryAfter);
        res.setHeader('X-RateLimit-Limit', points);
        res.setHeader('X-RateLimit-Remaining', 0);

        errorResponse(res, 429, {
            error: 'Too Many Requests',
            code: 'RATE_LIMITED',
            retryable: true,
            retryAfter
        });
    }
}

// ============================================================================
// API KEYS
// ============================================================================

function bearerToken(req: Request): string | null {
    const header = req.headers.authorization;
    if (!header?.startsWith('Bearer ')) return null;
    const token = header.substring(7).trim();
    return token.length > 0 ? token : null;
}

function keysMatch(provided: string, expected: string): boolean {
    const a = createHash('sha256').update(provided).digest();
    const b = createHash('sha256').update(expected).digest();
    return timingSafeEqual(a, b);
}

function unauthorized(res: Response, message: string): void {
    errorResponse(res, 401, { error: message, code: 'UNAUTHORIZED', retryable: false });
}

/**
 * Require API_KEY (or the admin key) on /api when API_KEY is configured.
 */
export function requireApiKey(req: Request, res: Response, next: NextFunction): void {
    const { API_KEY, ADMIN_API_KEY } = getConfig().env;
    if (!API_KEY) {
        next();
        return;
    }

    const token = bearerToken(req);
    if (!token) {
        unauthorized(res, 'API key required');
        return;
    }
    if (keysMatch(token, API_KEY) || (ADMIN_API_KEY !== undefined && keysMatch(token, ADMIN_API_KEY))) {
        next();
        return;
    }

    logger.warn('[SECURITY] Rejected API key', { path: req.path, correlationId: req.correlationId });
    unauthorized(res, 'Invalid API key');
}

/**
 * Require ADMIN_API_KEY on operator write routes when it is configured.
 */
export function requireAdminKey(req: Request, res: Response, next: NextFunction): void {
    const { ADMIN_API_KEY } = getConfig().env;
    if (!ADMIN_API_KEY) {
        next();
        return;
    }

    const token = bearerToken(req);
    if (!token || !keysMatch(token, ADMIN_API_KEY)) {
        logger.warn('[SECURITY] Admin key required', { path: req.path, correlationId: req.correlationId });
        errorResponse(res, 403, { error: 'Admin API key required', code: 'FORBIDDEN', retryable: false });
        return;
    }

    next();
}

// ============================================================================
// SECURITY HEADERS
// ============================================================================

/**
 * Apply security headers middleware.
 */
export function securityHeaders(req: Request, res: Response, next: NextFunction): void {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('X-XSS-Protection', '1; mode=block');
    res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    res.setHeader('Content-Security-Policy', "default-src 'self'");
    next();
}
