import type { RequestHandler } from "express";
import type { RateLimiter } from "../rateLimiter/rateLimiter.js";
import { clientIdOf } from "./publicErrorHandler.js";

/**
 * Charges one token per request against the (client address, endpoint)
 * bucket. Rejections go to the error handler, which audits them and sets
 * Retry-After.
 */
export function createRateLimit(limiter: RateLimiter, endpoint: string): RequestHandler {
  return (req, _res, next) => {
    try {
      limiter.checkLimit(clientIdOf(req), endpoint);
    } catch (err) {
      next(err);
      return;
    }
    next();
  };
}
