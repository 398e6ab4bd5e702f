import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import config from '../utils/config.js';
import logger from '../utils/logger.js';
import { NominatimRateLimiter } from '../utils/nominatimRateLimiter.js';
import { withRetry, type RetryConfig } from '../utils/retry.js';
import type { Coordinate } from './types.js';

/**
 * Address components returned by a reverse lookup. Only string-valued
 * fields are kept; Nominatim omits fields it has no data for.
 */
export type NominatimAddress = Partial<Record<string, string>>;

/**
 * Anything that can turn a coordinate into a structured address.
 * Implementations throw on failure; the resolver decides what to do.
 */
export interface ReverseGeocoder {
  reverse(coordinate: Coordinate): Promise<NominatimAddress>;
}

const reverseResponseSchema = z.object({
  address: z.record(z.unknown()).optional(),
  error: z.string().optional(),
});

export interface NominatimClientOptions {
  baseUrl?: string;
  /** Descriptive client identity with contact info, sent as User-Agent */
  userAgent?: string;
  timeoutMs?: number;
  /** Fixed pause after every call */
  delayMs?: number;
  retry?: RetryConfig;
  /** Pre-built limiter, e.g. shared between clients */
  rateLimiter?: NominatimRateLimiter;
  /** Pre-built axios instance; tests pass one with a stub adapter */
  http?: AxiosInstance;
}

/**
 * Reverse geocoding client for the Nominatim `/reverse` endpoint.
 */
export class NominatimClient implements ReverseGeocoder {
  private readonly http: AxiosInstance;
  private readonly rateLimiter: NominatimRateLimiter;
  private readonly retry: RetryConfig;

  constructor(options: NominatimClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? config.geocoder.baseUrl,
        timeout: options.timeoutMs ?? config.geocoder.timeoutMs,
        headers: {
          'User-Agent': options.userAgent ?? config.geocoder.userAgent,
        },
      });
    this.rateLimiter = options.rateLimiter ?? new NominatimRateLimiter(options.delayMs ?? config.geocoder.delayMs);
    this.retry = options.retry ?? { maxRetries: config.geocoder.maxRetries };
  }

  /**
   * Looks up the address at a coordinate.
   *
   * @throws AxiosError on transport failures, ZodError on a malformed body
   */
  async reverse(coordinate: Coordinate): Promise<NominatimAddress> {
    const context = `reverse geocode ${coordinate.latitude},${coordinate.longitude}`;

    const response = await withRetry(
      () =>
        this.rateLimiter.throttle(() =>
          this.http.get<unknown>('/reverse', {
            params: {
              format: 'jsonv2',
              lat: String(coordinate.latitude),
              lon: String(coordinate.longitude),
              zoom: 18,
              addressdetails: 1,
            },
          })
        ),
      this.retry,
      context
    );

    const body = reverseResponseSchema.parse(response.data);
    if (body.error) {
      // e.g. open water: a valid answer with no address
      logger.debug(`${context}: ${body.error}`);
    }

    const address: NominatimAddress = {};
    for (const [key, value] of Object.entries(body.address ?? {})) {
      if (typeof value === 'string' && value.trim() !== '') {
        address[key] = value;
      }
    }
    return address;
  }

  getStats(): ReturnType<NominatimRateLimiter['getStats']> {
    return this.rateLimiter.getStats();
  }
}
