/**
 * DNS Lookup
 * A, MX and TXT resolution for registered variants
 */

import { Resolver } from 'node:dns/promises';
import { engineLogger } from '../lib/logger.js';
import { config } from '../lib/config.js';
import { getErrorMessage } from '../lib/errors.js';
import { DnsRecordType, DnsRecords } from '../lib/types.js';

export const DNS_RECORD_TYPES: readonly DnsRecordType[] = ['A', 'MX', 'TXT'];

/** Resolves one record type for one domain; rejects on resolver failure */
export interface DnsLookup {
  resolve(domain: string, type: DnsRecordType): Promise<string[]>;
}

// Expected for parked or half-configured domains
const EMPTY_ANSWER_CODES = new Set(['ENOTFOUND', 'ENODATA']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

export class NodeDnsLookup implements DnsLookup {
  private resolver: Resolver;

  constructor(options: { timeoutMs: number } = config.dns) {
    this.resolver = new Resolver({ timeout: options.timeoutMs, tries: 2 });
  }

  async resolve(domain: string, type: DnsRecordType): Promise<string[]> {
    switch (type) {
      case 'A':
        return this.resolver.resolve4(domain);
      case 'MX': {
        const records = await this.resolver.resolveMx(domain);
        return records.map((mx) => mx.exchange);
      }
      case 'TXT': {
        // Long TXT records arrive split into 255-byte chunks
        const records = await this.resolver.resolveTxt(domain);
        return records.map((chunks) => chunks.join(''));
      }
    }
  }
}

/**
 * Resolve every record type independently; a failed type yields an empty list
 * and never affects the others.
 */
export async function resolveDnsRecords(lookup: DnsLookup, domain: string): Promise<DnsRecords> {
  const answers = await Promise.all(
    DNS_RECORD_TYPES.map(async (type) => {
      try {
        return await lookup.resolve(domain, type);
      } catch (error) {
        const code = errorCode(error);
        if (!code || !EMPTY_ANSWER_CODES.has(code)) {
          engineLogger.debug('DNS resolution failed', { domain, type, error: getErrorMessage(error) });
        }
        return [];
      }
    })
  );

  return Object.freeze({ A: answers[0], MX: answers[1], TXT: answers[2] });
}
