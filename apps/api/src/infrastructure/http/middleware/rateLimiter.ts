import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for endpoints that call the embedding provider.
 * Limits to 60 requests per minute per IP address
 */
export const embeddingRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 60,
    message: { status: 'error', code: 'rate_limited', message: 'Too many requests, try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});
