/**
 * Type definitions for the brand evidence engine
 */

// Outcome of a registration lookup; 'unknown' means the lookup failed or never ran
export type RegistrationStatus = 'registered' | 'unregistered' | 'unknown';

// DNS record types resolved for registered domains
export type DnsRecordType = 'A' | 'MX' | 'TXT';

export type DnsRecords = Readonly<Record<DnsRecordType, readonly string[]>>;

// One probed domain
export interface RegistrationRecord {
  readonly domain: string;
  readonly registered: boolean;
  readonly status: RegistrationStatus;
  readonly creationDate: string | null;
  readonly registrar: string | null;
  readonly dns: DnsRecords;
}

// Typosquatting sweep over every variant of one domain
export interface TyposquattingResult {
  originalDomain: string;
  variantsChecked: string[];
  registeredVariants: RegistrationRecord[];
  unresolvedVariants: string[];
}

// Registration data returned by a WHOIS/RDAP collaborator
export interface RegistrationInfo {
  registered: boolean;
  creationDate: string | null;
  registrar: string | null;
}

// Score classification
export type Tier = 'LOW' | 'MODERATE' | 'HIGH';

export type EvidenceLevel = 'INSUFFICIENT' | 'POTENTIAL' | 'STRONG';

// Sub-scores and their weighted contributions
export interface ScoreComponents {
  textScore: number;
  visualScore: number;
  productScore: number;
  confusionScore: number;
  weightedText: number;
  weightedVisual: number;
  weightedProduct: number;
  weightedConfusion: number;
}

// Display copy of the components, each rounded on its own
export type ScoreBreakdown = Readonly<ScoreComponents>;

export interface EvidenceThresholds {
  readonly textThreshold: string;
  readonly visualThreshold: string;
  readonly logoThreshold: string;
  readonly productThreshold: string;
}

export interface EvidenceScoreResult {
  overallScore: number;
  scoreBreakdown: ScoreBreakdown;
  components: Readonly<ScoreComponents>;
  tier: Tier;
  evidenceLevel: EvidenceLevel;
  evidenceThresholds: EvidenceThresholds;
}

// Rendered brand infringement report
export interface BrandReport {
  readonly caseId: string;
  readonly filename: string;
  readonly content: string;
  readonly tier: Tier;
  readonly overallScore: number;
  readonly generatedAt: Date;
}

// Rendered DMCA notice
export interface DmcaNotice {
  readonly filename: string;
  readonly content: string;
  readonly infringingDomain: string;
}

// Performance metrics
export interface PerformanceMetrics {
  timestamp: Date;
  operation: string;
  duration: number;
  success: boolean;
  errorMessage?: string;
}

// Aggregate of recent performance metrics, reported on /health
export interface PerformanceSummary {
  operations: number;
  failures: number;
  averageDurationMs: number;
}
