/**
 * Fixed text blocks for brand infringement reports
 */

import { Tier } from '../lib/types.js';

export const DEFAULT_ANALYST = 'Brand Protection AI System';

export const REPORT_TITLE = '# BRAND PROTECTION ANALYSIS REPORT (ZERO-TRUST APPROACH)';

export const METHODOLOGY_LINES: readonly string[] = [
  'Brand name usage (25%) - Requires near-exact matches (95%+ similarity)',
  'Visual similarity (35%) - Requires near-identical elements (95%+ similarity)',
  'Product similarity (20%) - Requires near-identical products (95%+ similarity)',
  'Consumer confusion potential (20%) - Based solely on verified evidence',
];

export const CLASSIFICATION_CRITERIA: readonly string[] = [
  'INSUFFICIENT: 0-49 - Minimal or inconclusive evidence found',
  'POTENTIAL: 50-79 - Some concrete evidence identified, requires further verification',
  'STRONG: 80-100 - Multiple verified instances of exact brand elements usage',
];

export const RECOMMENDATIONS: Readonly<Record<Tier, readonly string[]>> = {
  HIGH: [
    '**Evidence Verification:** Conduct human review to confirm the multiple instances of exact brand asset usage',
    '**Legal Assessment:** Consider having legal counsel review the verified evidence',
    '**Evidence Preservation:** Archive all pages and evidence for potential action',
    '**Ongoing Monitoring:** Establish regular monitoring of this domain',
  ],
  MODERATE: [
    '**Further Investigation:** Gather additional evidence to verify potential brand usage',
    '**Human Review:** Have a human brand specialist review the evidence collected',
    '**Regular Monitoring:** Continue monitoring the site for changes',
    '**Documentation:** Maintain detailed records of all findings',
  ],
  LOW: [
    '**Continued Monitoring:** Consider periodic checks for changes to the site',
    '**Documentation:** Maintain records of current findings',
    '**No Immediate Action:** Insufficient evidence to warrant action at this time',
    '**Reassess:** Consider reassessment if new evidence emerges',
  ],
};

export const NO_ADDITIONAL_EVIDENCE = 'No additional conclusive evidence collected.';

export const LOGO_CONFIRMED = 'CONFIRMED: Identical logo detected';
export const LOGO_NOT_CONFIRMED = 'NOT CONFIRMED: No identical logo usage verified';

export const REPORT_FOOTER =
  '*This analysis was generated by an automated brand protection system using a zero-trust methodology. ' +
  'All claims require human verification before any action is taken. ' +
  'This report makes no assumptions and only presents verified evidence.*';
