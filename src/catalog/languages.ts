/**
 * Registry language codes and the language precedence policy
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createConversionError } from '../domain/error-handler.js';

/**
 * Registry language code → OSM language suffix. Static extracts spell the
 * language out, the WFS uses ISO 639-3 codes.
 */
export const LANGUAGE_CODES: Readonly<Record<string, string>> = {
  norsk: 'no',
  nordsamisk: 'se',
  lulesamisk: 'smj',
  sørsamisk: 'sma',
  skoltesamisk: 'sms',
  kvensk: 'fkv',
  engelsk: 'en',
  svensk: 'sv',
  russisk: 'ru',

  nor: 'no',
  sme: 'se',
  smj: 'smj',
  sma: 'sma',
  sms: 'sms',
  fkv: 'fkv',
  eng: 'en',
  swe: 'sv',
  rus: 'ru',
  fin: 'fi',
  dan: 'da',
  kal: 'kl',
  isl: 'is',
  deu: 'de',
  gle: 'ga',
  fra: 'fr',
  nld: 'nl',
};

export const MAJORITY_LANGUAGE = 'no';

/**
 * Map a registry language code to an OSM language code.
 * Unknown or malformed codes fall back to the majority language.
 */
export function toOsmLanguage(registryCode: string | undefined): string {
  if (!registryCode) {
    return MAJORITY_LANGUAGE;
  }
  return LANGUAGE_CODES[registryCode.trim().toLowerCase()] ?? MAJORITY_LANGUAGE;
}

/**
 * Parse a registry language priority such as "norsk-nordsamisk" or "nor-sme"
 */
export function parseLanguagePriority(priority: string | undefined): string[] {
  if (!priority) {
    return [];
  }
  const codes: string[] = [];
  for (const part of priority.split('-')) {
    if (!part.trim()) {
      continue;
    }
    const code = toOsmLanguage(part);
    if (!codes.includes(code)) {
      codes.push(code);
    }
  }
  return codes;
}

export const LanguagePolicySchema = z.object({
  majority: z
    .array(z.string().min(1))
    .min(1)
    .default([MAJORITY_LANGUAGE])
    .describe('OSM language codes preferred for name=* in every municipality'),
  honourRegistryPriority: z
    .boolean()
    .default(true)
    .describe('Use the language priority carried by each registry record when present'),
  municipalityOverrides: z
    .record(z.string().regex(/^\d{4}$/), z.array(z.string().min(1)).min(1))
    .default({})
    .describe('Language order per municipality code, for mixed-language areas'),
});

export type LanguagePolicy = z.infer<typeof LanguagePolicySchema>;

export const DEFAULT_LANGUAGE_POLICY: LanguagePolicy = LanguagePolicySchema.parse({});

/**
 * Read a policy file, or return the default policy when no path is configured
 */
export function loadLanguagePolicy(path?: string): LanguagePolicy {
  if (!path) {
    return DEFAULT_LANGUAGE_POLICY;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw createConversionError('INVALID_INPUT', `Cannot read language policy ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  const parsed = LanguagePolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw createConversionError('INVALID_INPUT', `Invalid language policy ${path}`, {
      path,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Effective language order for one place. Languages seen on the place but not
 * named by the policy follow in the order they were registered.
 */
export function languageOrder(
  policy: LanguagePolicy,
  municipalityCode: string,
  registryPriority: readonly string[],
  languagesSeen: readonly string[]
): string[] {
  let preferred: readonly string[];
  if (policy.honourRegistryPriority && registryPriority.length > 0) {
    preferred = registryPriority;
  } else {
    preferred = policy.municipalityOverrides[municipalityCode] ?? policy.majority;
  }

  const order = [...preferred];
  for (const language of languagesSeen) {
    if (!order.includes(language)) {
      order.push(language);
    }
  }
  return order;
}
