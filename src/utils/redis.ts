/**
 * Redis Client
 *
 * Shared Redis connection for rate limiting, plus connection options for the
 * BullMQ queues. Everything degrades to in-process fallbacks when REDIS_URL
 * is not set.
 */

import Redis, { RedisOptions } from 'ioredis';
import { getConfig } from '../config';
import { logger } from '../services/observabilityService';

let redisClient: Redis | null = null;
let isConnected = false;

/**
 * Initialize Redis connection.
 * Returns null if REDIS_URL is not configured (in-memory fallback).
 */
export function initRedis(): Redis | null {
    const redisUrl = getConfig().env.REDIS_URL;

    if (!redisUrl) {
        logger.warn('[REDIS] REDIS_URL not set, using in-memory fallbacks for rate limiting and queues');
        return null;
    }

    try {
        redisClient = new Redis(redisUrl, {
            maxRetriesPerRequest: 3,
            retryStrategy(times: number) {
                if (times > 10) return null; // Stop retrying after 10 attempts
                return Math.min(times * 200, 5000);
            },
            lazyConnect: false
        });

        redisClient.on('connect', () => {
            isConnected = true;
            logger.info('[REDIS] Connected');
        });

        redisClient.on('error', (err: Error) => {
            isConnected = false;
            logger.error('[REDIS] Connection error', err);
        });

        redisClient.on('close', () => {
            isConnected = false;
            logger.warn('[REDIS] Connection closed');
        });

        return redisClient;
    } catch (err) {
        logger.error('[REDIS] Failed to initialize', err);
        return null;
    }
}

/**
 * Get the active Redis client (or null if unavailable).
 */
export function getRedisClient(): Redis | null {
    return redisClient;
}

/**
 * Parse a Redis URL into BullMQ connection options.
 */
export function parseRedisUrl(url: string): RedisOptions {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch (err) {
        logger.error('[REDIS] Failed to parse REDIS_URL', err);
        throw new Error('Invalid REDIS_URL format, cannot connect to Redis');
    }

    const options: RedisOptions = {
        host: parsed.hostname,
        port: parseInt(parsed.port || '6379', 10),
        maxRetriesPerRequest: null
    };

    if (parsed.username) {
        options.username = decodeURIComponent(parsed.username);
    }
    if (parsed.password) {
        options.password = decodeURIComponent(parsed.password);
    }

    // Managed providers use rediss:// for TLS
    if (parsed.protocol === 'rediss:') {
        options.tls = { rejectUnauthorized: false };
    }

    return options;
}

/**
 * Check if Redis is connected and healthy.
 */
export async function checkRedisHealth(): Promise<{ status: string; latencyMs?: number }> {
    if (!redisClient || !isConnected) {
        return { status: redisClient ? 'disconnected' : 'not_configured' };
    }

    try {
        const start = Date.now();
        await redisClient.ping();
        return { status: 'healthy', latencyMs: Date.now() - start };
    } catch (err) {
        logger.warn('[REDIS] Health ping failed', { error: err instanceof Error ? err.message : String(err) });
        return { status: 'unhealthy' };
    }
}

/**
 * Gracefully disconnect Redis.
 */
export async function disconnectRedis(): Promise<void> {
    if (redisClient) {
        await redisClient.quit();
        redisClient = null;
        isConnected = false;
        logger.info('[REDIS] Disconnected');
    }
}
