/**
 * Brand Protection Agent
 * Entry point for typosquatting sweeps, evidence scoring and report generation
 */

import { engineLogger } from '../lib/logger.js';
import { config } from '../lib/config.js';
import { setProcessingStage } from '../lib/correlation.js';
import { ValidationError } from '../lib/errors.js';
import {
  DmcaNoticeRequestSchema,
  parseBrandReportRequest,
  parseSimilaritySignals,
  safeParse,
} from '../lib/schemas.js';
import { BrandReport, DmcaNotice, EvidenceScoreResult, TyposquattingResult } from '../lib/types.js';
import { EvidenceScorer } from '../analysis/evidence-scorer.js';
import { joinDomain, splitDomain } from '../analysis/typo-variants.js';
import { RdapClient, RegistrationLookup } from '../services/rdap-client.js';
import { DnsLookup, NodeDnsLookup } from '../services/dns-lookup.js';
import { ProbeOptions, RegistrationProbe } from '../services/registration-probe.js';
import { synthesizeBrandReport, toSimilaritySignals } from '../services/report-synthesizer.js';
import { buildDmcaNotice } from '../services/dmca-notice-builder.js';
import { renderDomainIntelligence } from '../services/domain-intelligence.js';

export interface BrandProtectionAgentOptions {
  registration?: RegistrationLookup;
  dns?: DnsLookup;
  probeOptions?: ProbeOptions;
  now?: () => Date;
  analyst?: string;
}

export interface DescribeDomainOptions {
  includeTyposquatting?: boolean;
}

export interface AgentHealth {
  registrationLookup: 'available' | 'degraded';
}

/** Lower-case host with scheme, `www.`, path and port stripped */
export function normalizeDomain(input: string): string {
  const { label, suffix } = splitDomain(input);
  if (!label) {
    throw new ValidationError('Domain is required', [{ path: 'domain', message: 'Domain is required' }]);
  }
  return joinDomain(label, suffix);
}

export class BrandProtectionAgent {
  private probe: RegistrationProbe;
  private registration: RegistrationLookup;
  private rdapClient: RdapClient | null = null;
  private now: () => Date;
  private analyst: string;

  constructor(options: BrandProtectionAgentOptions = {}) {
    this.registration = options.registration ?? this.createRdapClient();
    const dns = options.dns ?? new NodeDnsLookup();
    this.probe = new RegistrationProbe(this.registration, dns, options.probeOptions ?? config.probe);
    this.now = options.now ?? (() => new Date());
    this.analyst = options.analyst ?? config.reports.analyst;
  }

  private createRdapClient(): RdapClient {
    this.rdapClient = new RdapClient();
    return this.rdapClient;
  }

  /**
   * Probe every typo variant of a domain
   */
  async checkTyposquatting(domain: string): Promise<TyposquattingResult> {
    const normalized = normalizeDomain(domain);

    setProcessingStage('variant-generation');
    engineLogger.info('Starting typosquatting check', { domain: normalized });

    setProcessingStage('registration-probe');
    const result = await this.probe.checkTyposquatting(normalized);

    engineLogger.audit('Typosquatting check completed', {
      domain: normalized,
      variantsChecked: result.variantsChecked.length,
      registeredVariants: result.registeredVariants.map((r) => r.domain),
      unresolved: result.unresolvedVariants.length,
    });
    setProcessingStage('completed');
    return result;
  }

  /**
   * Plain-text intelligence report for one domain
   */
  async describeDomain(domain: string, options: DescribeDomainOptions = {}): Promise<string> {
    const normalized = normalizeDomain(domain);

    setProcessingStage('registration-probe');
    const record = await this.probe.probeDomain(normalized);
    const typosquatting = options.includeTyposquatting ? await this.probe.checkTyposquatting(normalized) : undefined;

    setProcessingStage('rendering');
    const report = renderDomainIntelligence(record, typosquatting);

    engineLogger.info('Domain intelligence report generated', {
      domain: normalized,
      status: record.status,
      includeTyposquatting: Boolean(options.includeTyposquatting),
    });
    setProcessingStage('completed');
    return report;
  }

  /**
   * Validate then score similarity signals
   */
  scoreEvidence(input: unknown): EvidenceScoreResult {
    setProcessingStage('validation');
    const signals = parseSimilaritySignals(input);

    setProcessingStage('scoring');
    const result = EvidenceScorer.score(signals);

    engineLogger.audit('Evidence scored', { overallScore: result.overallScore, tier: result.tier });
    setProcessingStage('completed');
    return result;
  }

  /**
   * Validate, score and render a brand infringement report
   */
  generateBrandReport(input: unknown): BrandReport {
    setProcessingStage('validation');
    const request = parseBrandReportRequest(input);

    setProcessingStage('scoring');
    const score = EvidenceScorer.score(toSimilaritySignals(request));

    setProcessingStage('rendering');
    const report = synthesizeBrandReport(request, score, this.now(), this.analyst);

    engineLogger.audit('Brand report generated', {
      caseId: report.caseId,
      brand: request.originalBrand,
      suspectedUrl: request.suspectedUrl,
      overallScore: report.overallScore,
      tier: report.tier,
    });
    setProcessingStage('completed');
    return report;
  }

  /**
   * Validate and render a DMCA takedown notice
   */
  generateDmcaNotice(input: unknown): DmcaNotice {
    setProcessingStage('validation');
    const request = safeParse(DmcaNoticeRequestSchema, input, 'DMCA notice request');

    setProcessingStage('rendering');
    const notice = buildDmcaNotice(request, this.now());

    engineLogger.audit('DMCA notice generated', {
      infringingDomain: notice.infringingDomain,
      brand: request.brandName,
    });
    setProcessingStage('completed');
    return notice;
  }

  getHealth(): AgentHealth {
    const degraded = this.registration.isCircuitOpen?.() ?? false;
    return { registrationLookup: degraded ? 'degraded' : 'available' };
  }

  /** Release timers held by the RDAP client, when this agent created it */
  shutdown(): void {
    this.rdapClient?.shutdown();
    engineLogger.info('Brand Protection Agent shut down');
  }
}
