/**
 * Integration Test Setup
 * Sets env vars before any module that reads config is loaded, and provides
 * in-process stand-ins for the RDAP service and DNS.
 */

// Must set env vars BEFORE any modules that import config are loaded
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
process.env.API_KEY = 'integration-test-secret';

import type { RdapTransport } from '../services/rdap-client.js';
import type { DnsLookup } from '../services/dns-lookup.js';

export const API_KEY = 'integration-test-secret';

/** RDAP body for a registered domain, shaped like a registry response */
export function rdapDomainBody(domain: string, registeredOn: string, registrar: string) {
  return {
    objectClassName: 'domain',
    ldhName: domain,
    events: [{ eventAction: 'registration', eventDate: registeredOn }],
    entities: [{ roles: ['registrar'], vcardArray: ['vcard', [['fn', {}, 'text', registrar]]] }],
  };
}

/** Serve registered domains from a table, 404 for the rest, and fail for the listed ones */
export function createRdapTransport(
  registered: Record<string, { registeredOn: string; registrar: string }>,
  failing: string[] = []
): RdapTransport {
  return async (path) => {
    const domain = decodeURIComponent(path.replace('/domain/', ''));
    if (failing.includes(domain)) throw new Error(`connect ECONNREFUSED for ${domain}`);

    const entry = registered[domain];
    if (!entry) return { status: 404, data: { errorCode: 404, title: 'Not Found' } };
    return { status: 200, data: rdapDomainBody(domain, entry.registeredOn, entry.registrar) };
  };
}

/** DNS answers from a table keyed by domain */
export function createDnsTable(table: Record<string, { A?: string[]; MX?: string[]; TXT?: string[] }>): DnsLookup {
  return {
    resolve: async (domain, type) => table[domain]?.[type] ?? [],
  };
}
