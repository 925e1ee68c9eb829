/**
 * Domain Intelligence Report
 * Plain-text summary of one domain's registration, DNS and (optionally) typosquatting exposure
 */

import { RegistrationRecord, TyposquattingResult } from '../lib/types.js';

const STATUS_TEXT: Record<RegistrationRecord['status'], string> = {
  registered: 'Registered',
  unregistered: 'Not registered',
  unknown: 'Lookup failed (status unknown)',
};

function buildRegistrationSection(record: RegistrationRecord): string[] {
  const lines = ['Registration Information:', `- Status: ${STATUS_TEXT[record.status]}`];
  if (record.status !== 'registered') return lines;

  lines.push(`- Creation Date: ${record.creationDate ?? 'Unknown'}`);
  lines.push(`- Registrar: ${record.registrar ?? 'Unknown'}`);
  lines.push('', 'DNS Records:');

  const { A, MX, TXT } = record.dns;
  if (A.length > 0) lines.push(`- A Records: ${A.join(', ')}`);
  if (MX.length > 0) lines.push(`- MX Records: ${MX.join(', ')}`);
  if (TXT.length > 0) lines.push(`- TXT Records: ${TXT.join(', ')}`);
  if (A.length + MX.length + TXT.length === 0) lines.push('- None found');
  return lines;
}

function buildTyposquattingSection(result: TyposquattingResult): string[] {
  const lines = [
    'Typosquatting Analysis:',
    `- Generated ${result.variantsChecked.length} variant domains`,
    `- Found ${result.registeredVariants.length} registered variant domains`,
  ];
  if (result.unresolvedVariants.length > 0) {
    lines.push(`- Could not determine status of ${result.unresolvedVariants.length} variant domains`);
  }
  if (result.registeredVariants.length > 0) {
    lines.push('', 'Registered typosquatting domains:');
    for (const variant of result.registeredVariants) {
      lines.push(`- ${variant.domain} (Registrar: ${variant.registrar ?? 'Unknown'})`);
    }
  }
  return lines;
}

export function renderDomainIntelligence(record: RegistrationRecord, typosquatting?: TyposquattingResult): string {
  const lines = [`Domain Intelligence Report for ${record.domain}:`, '', ...buildRegistrationSection(record)];
  if (typosquatting) {
    lines.push('', ...buildTyposquattingSection(typosquatting));
  }
  return `${lines.join('\n')}\n`;
}
