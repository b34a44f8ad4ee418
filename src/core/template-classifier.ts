import type { Config } from '../utils/config.js';
import type { UserRow } from '../types/order-form.js';

type TemplateRules = Config['templates'];

/**
 * Map a raw plan label to the platform template for a region.
 * Unknown labels map to "" and the row keeps blank template-driven fields.
 */
export function classifyTemplate(
  rawLabel: string | undefined,
  region: string,
  labels: TemplateRules['labels']
): string {
  if (rawLabel === undefined) return '';

  const label = rawLabel.trim();
  return Object.hasOwn(labels, label) ? `${region}${labels[label]}` : '';
}

export function isAutoAttendant(
  templateId: string,
  region: string,
  autoAttendantSuffixes: TemplateRules['autoAttendantSuffixes']
): boolean {
  return templateId !== '' && autoAttendantSuffixes.some((suffix) => templateId === `${region}${suffix}`);
}

export function isExcludedTemplate(
  rawLabel: string | undefined,
  excludedLabels: TemplateRules['excludedLabels']
): boolean {
  return rawLabel !== undefined && excludedLabels.includes(rawLabel.trim());
}

/**
 * A row is exported only with a phone number and a non-reserved plan
 */
export function isEligibleUser(row: UserRow, rules: TemplateRules): boolean {
  return row.phone !== undefined && !isExcludedTemplate(row.template, rules.excludedLabels);
}
