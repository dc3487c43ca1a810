import type { ReportFormat, StructscoreConfig } from './types.js';
import { getSupportedLanguages } from './scanner/tree-sitter.js';

const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'markdown'];

export const DEFAULT_CONFIG: StructscoreConfig = {
  language: 'python',
  report: {
    format: 'json',
    includeTotal: false,
  },
};

/**
 * Partial settings as they arrive from the command line.
 */
export interface ConfigOverrides {
  language?: string;
  report?: Partial<StructscoreConfig['report']>;
}

function isReportFormat(value: unknown): value is ReportFormat {
  return typeof value === 'string' && REPORT_FORMATS.some((f) => f === value);
}

export function validateConfig(
  raw: ConfigOverrides,
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (raw.language !== undefined && !getSupportedLanguages().includes(raw.language)) {
    errors.push(`language: unsupported language '${raw.language}'`);
  }

  const report = raw.report;
  if (report) {
    if (report.format !== undefined && !isReportFormat(report.format)) {
      errors.push(`report.format: must be one of ${REPORT_FORMATS.join(', ')}`);
    }
    if (report.includeTotal !== undefined && typeof report.includeTotal !== 'boolean') {
      errors.push('report.includeTotal: must be a boolean');
    }
  }

  return { valid: errors.length === 0, errors };
}

export function resolveConfig(overrides: ConfigOverrides = {}): StructscoreConfig {
  const validation = validateConfig(overrides);

  if (!validation.valid) {
    throw new Error(
      `Invalid structscore config:\n${validation.errors.join('\n')}`,
    );
  }

  return {
    language: overrides.language ?? DEFAULT_CONFIG.language,
    report: { ...DEFAULT_CONFIG.report, ...overrides.report },
  };
}
