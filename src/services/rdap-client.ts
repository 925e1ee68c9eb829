/**
 * RDAP Registration Client
 * Registration lookups over RDAP (the JSON successor of WHOIS) with retry + circuit breaker
 */

import axios, { AxiosInstance } from 'axios';
import pRetry from 'p-retry';
import CircuitBreaker from 'opossum';
import NodeCache from 'node-cache';
import { engineLogger } from '../lib/logger.js';
import { config } from '../lib/config.js';
import { validate, RdapDomainResponseSchema, RdapEntity } from '../lib/schemas.js';
import { RegistrationInfo } from '../lib/types.js';

/** Circuit breaker configuration */
const CIRCUIT_BREAKER_OPTIONS = {
  errorThresholdPercentage: 50,
  resetTimeout: 60000,
  volumeThreshold: 5,
};

/** Retry backoff; the attempt count comes from configuration */
const RETRY_BACKOFF = { minTimeout: 100, maxTimeout: 1000, factor: 2 };

/** Source of registration data for one fully qualified domain. Rejects when the lookup fails. */
export interface RegistrationLookup {
  lookup(domain: string): Promise<RegistrationInfo>;
  /** True while lookups are being short-circuited */
  isCircuitOpen?(): boolean;
}

export interface RdapClientOptions {
  baseUrl: string;
  /** Budget for one lookup, every retry and backoff included */
  timeoutMs: number;
  retries: number;
  cacheTtlMs: number;
}

/** HTTP GET returning status and parsed body; 200 and 404 resolve, anything else rejects */
export type RdapTransport = (path: string) => Promise<{ status: number; data: unknown }>;

/**
 * Timeout for a single attempt, so that every attempt and the backoff between
 * them fit inside the lookup budget.
 */
export function attemptTimeoutMs(budgetMs: number, retries: number): number {
  let backoffMs = 0;
  for (let i = 0; i < retries; i++) {
    backoffMs += Math.min(RETRY_BACKOFF.maxTimeout, RETRY_BACKOFF.minTimeout * RETRY_BACKOFF.factor ** i);
  }
  return Math.max(1, Math.floor((budgetMs - backoffMs) / (retries + 1)));
}

const NOT_REGISTERED: RegistrationInfo = Object.freeze({ registered: false, creationDate: null, registrar: null });

/** RDAP client with retry, circuit breaker and an in-process cache */
export class RdapClient implements RegistrationLookup {
  private breaker: CircuitBreaker<[string], { status: number; data: unknown }>;
  private cache: NodeCache;
  private retries: number;

  constructor(options: RdapClientOptions = config.rdap, transport?: RdapTransport) {
    this.cache = new NodeCache({ stdTTL: options.cacheTtlMs / 1000, useClones: false });
    this.retries = options.retries;
    const timeoutMs = attemptTimeoutMs(options.timeoutMs, options.retries);
    const send = transport ?? createAxiosTransport(options.baseUrl, timeoutMs);
    this.breaker = new CircuitBreaker(send, { ...CIRCUIT_BREAKER_OPTIONS, timeout: timeoutMs });
    this.setupBreakerEvents();
  }

  private setupBreakerEvents(): void {
    this.breaker.on('open', () => engineLogger.warn('RDAP circuit OPEN'));
    this.breaker.on('halfOpen', () => engineLogger.info('RDAP circuit HALF-OPEN'));
    this.breaker.on('close', () => engineLogger.info('RDAP circuit CLOSED'));
  }

  async lookup(domain: string): Promise<RegistrationInfo> {
    const cacheKey = `rdap-${domain}`;
    const cached = this.cache.get<RegistrationInfo>(cacheKey);
    if (cached) return cached;

    const response = await pRetry(() => this.breaker.fire(`/domain/${encodeURIComponent(domain)}`), {
      ...RETRY_BACKOFF,
      retries: this.retries,
      onFailedAttempt: (e) =>
        engineLogger.warn('RDAP retry', { attempt: e.attemptNumber, retriesLeft: e.retriesLeft, domain }),
    });

    const result = this.parseResponse(domain, response);
    this.cache.set(cacheKey, result);
    return result;
  }

  private parseResponse(domain: string, response: { status: number; data: unknown }): RegistrationInfo {
    if (response.status === 404) return NOT_REGISTERED;

    const validated = validate(RdapDomainResponseSchema, response.data);
    if (!validated.success) {
      throw new Error(`Invalid RDAP response for ${domain}: ${validated.error.message}`);
    }

    const { events = [], entities = [] } = validated.data;
    const registration = events.find((e) => e.eventAction === 'registration');
    return {
      registered: true,
      creationDate: registration?.eventDate ?? null,
      registrar: findRegistrarName(entities),
    };
  }

  isCircuitOpen(): boolean {
    return this.breaker.opened;
  }

  shutdown(): void {
    this.breaker.shutdown();
    this.cache.close();
  }
}

function createAxiosTransport(baseUrl: string, timeoutMs: number): RdapTransport {
  const client: AxiosInstance = axios.create({
    baseURL: baseUrl,
    headers: { Accept: 'application/rdap+json' },
    timeout: timeoutMs,
    validateStatus: (status) => status === 200 || status === 404,
  });
  return async (path) => {
    const { status, data } = await client.get<unknown>(path);
    return { status, data };
  };
}

/** Full name from the vCard of the entity holding the registrar role */
function findRegistrarName(entities: RdapEntity[]): string | null {
  const registrar = entities.find((e) => e.roles?.includes('registrar'));
  const properties = registrar?.vcardArray?.[1];
  if (!Array.isArray(properties)) return null;

  for (const property of properties) {
    if (Array.isArray(property) && property[0] === 'fn' && typeof property[3] === 'string') {
      return property[3];
    }
  }
  return null;
}
