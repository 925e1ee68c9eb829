/**
 * Zod Runtime Validation Schemas
 * Provides type-safe validation for environment, API requests and RDAP payloads
 */

import { z } from 'zod';
import { InputOutOfRangeError, ValidationError, ValidationIssue } from './errors.js';

// ============================================================================
// Environment Configuration Schemas
// ============================================================================

export const EnvConfigSchema = z.object({
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']))
    .default('info'),

  // Server configuration
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_KEY: z.string().min(1).optional(),

  // Registration probe
  PROBE_CONCURRENCY: z.coerce.number().int().positive().max(64).default(8),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PROBE_DEADLINE_MS: z.coerce.number().int().positive().default(60000),
  LOOKUP_RETRIES: z.coerce.number().int().nonnegative().max(5).default(2),
  RDAP_BASE_URL: z.string().url().default('https://rdap.org'),
  RDAP_CACHE_TTL_MS: z.coerce.number().int().positive().default(3600000),
  DNS_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Reports
  REPORT_ANALYST: z.string().min(1).default('Brand Protection AI System'),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

// ============================================================================
// Evidence Schemas
// ============================================================================

const similarity = z.number().min(0, 'must be between 0 and 100').max(100, 'must be between 0 and 100');
const mentionCount = z.number().int('must be a whole number').nonnegative('must not be negative');

export const SimilaritySignalsSchema = z.object({
  textSimilarity: similarity.default(0),
  visualSimilarity: similarity.default(0),
  brandMentions: mentionCount.default(0),
  logoUsage: z.boolean().default(false),
  productSimilarity: similarity.default(0),
});

export type SimilaritySignals = z.infer<typeof SimilaritySignalsSchema>;

export const TextEvidenceSchema = z.object({
  similarityScore: similarity.default(0),
  brandMentions: mentionCount.default(0),
  context: z.string().default('No context available or insufficient data to determine context'),
  productDescriptions: z.string().default('No exact product description matches identified'),
  metaTags: z.string().default('No relevant meta tags identified'),
  patternAnalysis: z.string().default('Insufficient data to establish conclusive patterns.'),
  intentIndicators: z
    .string()
    .default(
      'No conclusive evidence of intent identified. This analysis does not make assumptions about intent without direct evidence.'
    ),
});

export type TextEvidence = z.infer<typeof TextEvidenceSchema>;

export const VisualEvidenceSchema = z.object({
  similarityScore: similarity.default(0),
  logoPresent: z.boolean().default(false),
  productSimilarity: similarity.default(0),
  colorScheme: z.string().default('Insufficient data to conclusively determine color scheme similarity'),
  layoutSimilarity: z.string().default('Insufficient data to conclusively determine layout similarity'),
  productImageAnalysis: z.string().default('No identical product images confirmed'),
});

export type VisualEvidence = z.infer<typeof VisualEvidenceSchema>;

export const BrandReportRequestSchema = z.object({
  originalBrand: z.string().trim().min(1, 'Brand name is required'),
  originalUrl: z.string().trim().min(1, 'Official URL is required'),
  suspectedUrl: z.string().trim().min(1, 'Suspected URL is required'),
  textAnalysis: TextEvidenceSchema.default({}),
  visualAnalysis: VisualEvidenceSchema.default({}),
  additionalEvidence: z.string().optional(),
  customFilename: z.string().trim().min(1).optional(),
});

export type BrandReportRequest = z.infer<typeof BrandReportRequestSchema>;

// ============================================================================
// Domain & Notice Schemas
// ============================================================================

export const DomainRequestSchema = z.object({
  domain: z.string().trim().min(1, 'Domain is required').max(253),
  includeTyposquatting: z.boolean().default(false),
});

export type DomainRequest = z.infer<typeof DomainRequestSchema>;

export const DmcaNoticeRequestSchema = z.object({
  infringingUrl: z.string().trim().min(1, 'Infringing URL is required'),
  originalUrl: z.string().trim().min(1, 'Original URL is required'),
  brandName: z.string().trim().min(1, 'Brand name is required'),
  copyrightOwner: z.string().trim().min(1),
  contactName: z.string().trim().min(1),
  contactEmail: z.string().email('Invalid contact email'),
  contactPhone: z.string().trim().min(1),
  contactAddress: z.string().trim().min(1),
  infringementDetails: z.string().trim().min(1),
  originalWorkDescription: z.string().trim().min(1).optional(),
});

export type DmcaNoticeRequest = z.infer<typeof DmcaNoticeRequestSchema>;

// ============================================================================
// RDAP Schemas
// ============================================================================

export const RdapEventSchema = z.object({
  eventAction: z.string(),
  eventDate: z.string().optional(),
});

export const RdapEntitySchema = z.object({
  roles: z.array(z.string()).optional(),
  vcardArray: z.array(z.unknown()).optional(),
});

export const RdapDomainResponseSchema = z.object({
  ldhName: z.string().optional(),
  events: z.array(RdapEventSchema).optional(),
  entities: z.array(RdapEntitySchema).optional(),
});

export type RdapEntity = z.infer<typeof RdapEntitySchema>;
export type RdapDomainResponse = z.infer<typeof RdapDomainResponseSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

/** Bound violations, including a fractional mention count */
function isRangeIssue(issue: z.ZodIssue): boolean {
  if (issue.code === z.ZodIssueCode.too_small || issue.code === z.ZodIssueCode.too_big) return true;
  return issue.code === z.ZodIssueCode.invalid_type && issue.expected === 'integer';
}

/** Flatten Zod issues into `path: message` pairs */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Safely parse data with Zod schema
 * Returns parsed data or throws a ValidationError carrying the issues
 */
export function safeParse<T extends z.ZodTypeAny>(schema: T, data: unknown, context?: string): z.output<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ValidationError(`Validation failed${context ? ` for ${context}` : ''}`, issues);
  }

  return result.data;
}

/**
 * Validate data and return result object
 * Non-throwing version for graceful degradation
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): { success: true; data: z.output<T> } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, error: result.error };
}

/**
 * Parse similarity signals at the scoring boundary.
 * Out-of-range numbers raise InputOutOfRangeError; they are never clamped.
 */
export function parseSimilaritySignals(data: unknown): SimilaritySignals {
  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new ValidationError('Similarity signals must be an object');
  }

  const result = SimilaritySignalsSchema.safeParse(data);
  if (result.success) return result.data;

  const issues = toValidationIssues(result.error);
  if (result.error.issues.every(isRangeIssue)) {
    throw new InputOutOfRangeError('Similarity signals out of range', issues);
  }
  throw new ValidationError('Validation failed for similarity signals', issues);
}

/** Parse a brand report request; evidence ranges follow the same rules as the signals */
export function parseBrandReportRequest(data: unknown): BrandReportRequest {
  const result = BrandReportRequestSchema.safeParse(data);
  if (result.success) return result.data;

  const issues = toValidationIssues(result.error);
  const rangeOnly = result.error.issues.every(isRangeIssue);
  const inEvidence = result.error.issues.every(
    (issue) => issue.path[0] === 'textAnalysis' || issue.path[0] === 'visualAnalysis'
  );
  if (rangeOnly && inEvidence) {
    throw new InputOutOfRangeError('Evidence signals out of range', issues);
  }
  throw new ValidationError('Validation failed for brand report request', issues);
}
