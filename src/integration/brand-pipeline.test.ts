/**
 * Integration Tests: Brand Protection Pipeline
 * Drives the HTTP API through the real probe, RDAP client, scorer and renderers.
 * RDAP and DNS are served in process; nothing leaves the test process.
 */

import { API_KEY, createDnsTable, createRdapTransport } from './setup.js';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { HttpServer } from '../server.js';
import { BrandProtectionAgent } from '../agents/brand-protection-agent.js';
import { RdapClient } from '../services/rdap-client.js';

const NOW = new Date('2026-03-07T09:05:02Z');

describe('Brand Protection Pipeline Integration', () => {
  let rdap: RdapClient;
  let app: Application;

  beforeEach(() => {
    rdap = new RdapClient(
      { baseUrl: 'https://rdap.test', timeoutMs: 1000, retries: 0, cacheTtlMs: 60000 },
      createRdapTransport(
        {
          'acme.test': { registeredOn: '2010-05-01T00:00:00Z', registrar: 'Brand Registrar Inc' },
          'amce.test': { registeredOn: '2026-02-28T12:00:00Z', registrar: 'Budget Names LLC' },
          'acm.test': { registeredOn: '2025-11-11T00:00:00Z', registrar: 'Budget Names LLC' },
        },
        ['ace.test']
      )
    );
    const dns = createDnsTable({
      'amce.test': { A: ['198.51.100.7'], MX: ['mail.amce.test'], TXT: ['v=spf1 a mx -all'] },
      'acme.test': { A: ['203.0.113.1'] },
    });
    const agent = new BrandProtectionAgent({
      registration: rdap,
      dns,
      probeOptions: { concurrency: 3, lookupTimeoutMs: 1000, deadlineMs: 60000 },
      now: () => NOW,
      analyst: 'Integration Analyst',
    });
    app = new HttpServer(agent, { port: 0, environment: 'test', apiKey: API_KEY }).getApp();
  });

  afterEach(() => {
    rdap.shutdown();
  });

  it('should sweep typo variants and isolate the one that fails', async () => {
    const res = await request(app).post('/api/typosquatting').set('x-api-key', API_KEY).send({ domain: 'acme.test' });

    expect(res.status).toBe(200);
    expect(res.body.variantsChecked).toEqual([
      'cme.test',
      'ame.test',
      'ace.test',
      'acm.test',
      'came.test',
      'amce.test',
      'acem.test',
    ]);
    expect(res.body.unresolvedVariants).toEqual(['ace.test']);
    expect(res.body.registeredVariants).toEqual([
      {
        domain: 'acm.test',
        registered: true,
        status: 'registered',
        creationDate: '2025-11-11T00:00:00Z',
        registrar: 'Budget Names LLC',
        dns: { A: [], MX: [], TXT: [] },
      },
      {
        domain: 'amce.test',
        registered: true,
        status: 'registered',
        creationDate: '2026-02-28T12:00:00Z',
        registrar: 'Budget Names LLC',
        dns: { A: ['198.51.100.7'], MX: ['mail.amce.test'], TXT: ['v=spf1 a mx -all'] },
      },
    ]);
  });

  it('should render the domain intelligence report with the sweep', async () => {
    const res = await request(app)
      .post('/api/domains/intel')
      .set('x-api-key', API_KEY)
      .send({ domain: 'https://www.acme.test/', includeTyposquatting: true });

    expect(res.status).toBe(200);
    expect(res.body.report).toBe(
      [
        'Domain Intelligence Report for acme.test:',
        '',
        'Registration Information:',
        '- Status: Registered',
        '- Creation Date: 2010-05-01T00:00:00Z',
        '- Registrar: Brand Registrar Inc',
        '',
        'DNS Records:',
        '- A Records: 203.0.113.1',
        '',
        'Typosquatting Analysis:',
        '- Generated 7 variant domains',
        '- Found 2 registered variant domains',
        '- Could not determine status of 1 variant domains',
        '',
        'Registered typosquatting domains:',
        '- acm.test (Registrar: Budget Names LLC)',
        '- amce.test (Registrar: Budget Names LLC)',
        '',
      ].join('\n')
    );
  });

  it('should score evidence and render the brand report end to end', async () => {
    const res = await request(app)
      .post('/api/reports/brand')
      .set('x-api-key', API_KEY)
      .send({
        originalBrand: 'Acme',
        originalUrl: 'https://acme.test',
        suspectedUrl: 'https://amce.test',
        textAnalysis: { brandMentions: 30 },
        visualAnalysis: { similarityScore: 96, logoPresent: true },
        customFilename: 'amce-case',
      });

    expect(res.status).toBe(201);
    expect(res.body.overallScore).toBe(62);
    expect(res.body.tier).toBe('MODERATE');
    expect(res.body.filename).toBe('amce-case.md');
    expect(res.body.content.split('\n')).toContain('**ANALYST:** Integration Analyst  ');
    expect(res.body.content.split('\n')).toContain(
      '* **Further Investigation:** Gather additional evidence to verify potential brand usage'
    );
  });

  it('should reject unauthenticated API calls', async () => {
    const res = await request(app).post('/api/typosquatting').send({ domain: 'acme.test' });
    expect(res.status).toBe(401);
  });
});
