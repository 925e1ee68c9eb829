/**
 * Registration Probe
 * Checks which typo variants of a domain are registered, with DNS for the ones that are
 */

import pLimit from 'p-limit';
import { engineLogger, PerformanceTimer } from '../lib/logger.js';
import { config } from '../lib/config.js';
import { getErrorMessage } from '../lib/errors.js';
import { withTimeout } from '../lib/timeout.js';
import { generateTypoVariants, joinDomain, splitDomain } from '../analysis/typo-variants.js';
import { DnsRecords, RegistrationInfo, RegistrationRecord, TyposquattingResult } from '../lib/types.js';
import { RegistrationLookup } from './rdap-client.js';
import { DnsLookup, resolveDnsRecords } from './dns-lookup.js';

export interface ProbeOptions {
  concurrency: number;
  lookupTimeoutMs: number;
  deadlineMs: number;
}

const EMPTY_DNS: DnsRecords = Object.freeze({ A: [], MX: [], TXT: [] });

function unknownRecord(domain: string): RegistrationRecord {
  return Object.freeze({
    domain,
    registered: false,
    status: 'unknown',
    creationDate: null,
    registrar: null,
    dns: EMPTY_DNS,
  });
}

function unregisteredRecord(domain: string, info: RegistrationInfo): RegistrationRecord {
  return Object.freeze({
    domain,
    registered: false,
    status: 'unregistered',
    creationDate: info.creationDate,
    registrar: info.registrar,
    dns: EMPTY_DNS,
  });
}

export class RegistrationProbe {
  private registration: RegistrationLookup;
  private dns: DnsLookup;
  private options: ProbeOptions;
  private now: () => number;

  constructor(
    registration: RegistrationLookup,
    dns: DnsLookup,
    options: ProbeOptions = config.probe,
    now: () => number = Date.now
  ) {
    this.registration = registration;
    this.dns = dns;
    this.options = options;
    this.now = now;
  }

  /**
   * Probe every deletion/transposition variant of the domain's first label.
   * Individual failures become `unknown` records; the batch always completes.
   */
  async checkTyposquatting(domain: string): Promise<TyposquattingResult> {
    const { label, suffix } = splitDomain(domain);
    const originalDomain = joinDomain(label, suffix);
    const variantsChecked = generateTypoVariants(label).map((variant) => joinDomain(variant, suffix));
    const timer = new PerformanceTimer('typosquatting-probe');

    const deadline = this.now() + this.options.deadlineMs;
    const limit = pLimit(this.options.concurrency);
    engineLogger.debug('Probing variants with parallel limit', {
      originalDomain,
      variantCount: variantsChecked.length,
      parallelLimit: this.options.concurrency,
    });

    const records = await Promise.all(
      variantsChecked.map((candidate) =>
        limit(() => {
          // Queued work that would start after the deadline is skipped
          if (this.now() >= deadline) return Promise.resolve(unknownRecord(candidate));
          return this.probeDomain(candidate);
        })
      )
    );

    const registeredVariants = records.filter((r) => r.status === 'registered');
    const unresolvedVariants = records.filter((r) => r.status === 'unknown').map((r) => r.domain);
    const durationMs = timer.end(true);

    engineLogger.info('Typosquatting probe completed', {
      originalDomain,
      variantsChecked: variantsChecked.length,
      registered: registeredVariants.length,
      unresolved: unresolvedVariants.length,
      durationMs,
    });

    return { originalDomain, variantsChecked, registeredVariants, unresolvedVariants };
  }

  /**
   * Probe a single fully qualified domain
   */
  async probeDomain(domain: string): Promise<RegistrationRecord> {
    const timeoutMs = this.options.lookupTimeoutMs;

    let info: RegistrationInfo;
    try {
      info = await withTimeout(`Registration lookup for ${domain}`, timeoutMs, () => this.registration.lookup(domain));
    } catch (error) {
      engineLogger.warn('Registration lookup failed', { domain, error: getErrorMessage(error) });
      return unknownRecord(domain);
    }

    if (!info.registered) return unregisteredRecord(domain, info);

    const timedDns: DnsLookup = {
      resolve: (name, type) => withTimeout(`${type} lookup for ${name}`, timeoutMs, () => this.dns.resolve(name, type)),
    };
    const dns = await resolveDnsRecords(timedDns, domain);

    return Object.freeze({
      domain,
      registered: true,
      status: 'registered',
      creationDate: info.creationDate,
      registrar: info.registrar,
      dns,
    });
  }
}
