import { DateTime } from 'luxon';
import { REQUIRED_HEADERS, RESPONSE_ENVELOPE_FIELDS } from '@apidocs/shared';

export interface ReportOptions {
  generatedAt: Date;
  /** IANA zone; null or omitted renders in the host zone */
  timeZone?: string | null;
}

const GENERATED_PREFIX = 'Generated: ';

export function formatGeneratedAt(date: Date, timeZone?: string | null): string {
  const value = timeZone ? DateTime.fromJSDate(date, { zone: timeZone }) : DateTime.fromJSDate(date);
  return value.toFormat('yyyy-MM-dd HH:mm:ss');
}

export function renderDocumentHeader(title: string, options: ReportOptions): string[] {
  return [`# ${title}`, `${GENERATED_PREFIX}${formatGeneratedAt(options.generatedAt, options.timeZone)}`, ''];
}

export function renderPreamble(): string[] {
  return [
    '## Required Headers',
    ...REQUIRED_HEADERS.map((header) => `- ${header}`),
    '',
    '## Standard Response Envelope',
    ...RESPONSE_ENVELOPE_FIELDS.map((field) => `- ${field}`),
    ''
  ];
}

function withoutGeneratedLine(content: string): string {
  const lines = content.split('\n');
  if (lines[1]?.startsWith(GENERATED_PREFIX)) {
    lines.splice(1, 1);
  }
  return lines.join('\n');
}

/** Two reports match when they differ at most in their `Generated:` timestamp line. */
export function isSameReport(existing: string, generated: string): boolean {
  return withoutGeneratedLine(existing) === withoutGeneratedLine(generated);
}
