/**
 * NameTypeCatalog - registry name-type codes mapped to OSM tagging
 *
 * The table lives in data/name-types.json, grouped the way Kartverket groups
 * name types (main group → group → name type). It is loaded once and never
 * mutated afterwards.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';

export const SettlementRankSchema = z.enum([
  'city',
  'town',
  'village',
  'hamlet',
  'suburb',
  'quarter',
  'neighbourhood',
  'isolated_dwelling',
]);

export type SettlementRank = z.infer<typeof SettlementRankSchema>;

const TagsSchema = z.record(z.string().min(1), z.string());

const BaseEntrySchema = z.object({
  code: z.string().min(1),
  description: z.string(),
  priority: z.number().int().min(0).describe('Lower wins when duplicate names compete'),
  tags: TagsSchema,
});

const NameTypeEntrySchema = z.discriminatedUnion('category', [
  BaseEntrySchema.extend({
    category: z.literal('settlement'),
    rankConfidence: z.enum(['high', 'low']).default('high'),
  }),
  BaseEntrySchema.extend({ category: z.literal('waterway') }),
  BaseEntrySchema.extend({ category: z.literal('building') }),
  BaseEntrySchema.extend({ category: z.literal('other') }),
]);

export const NameTypeTableSchema = z.object({
  mainGroups: z.array(
    z.object({
      name: z.string(),
      description: z.string().optional(),
      groups: z.array(
        z.object({
          name: z.string(),
          description: z.string().optional(),
          nameTypes: z.array(NameTypeEntrySchema),
        })
      ),
    })
  ),
});

export type NameTypeTable = z.infer<typeof NameTypeTableSchema>;

interface RuleBase {
  code: string;
  description: string;
  group: string;
  mainGroup: string;
  priority: number;
  tags: Readonly<Record<string, string>>;
}

export interface SettlementRule extends RuleBase {
  category: 'settlement';
  defaultPlace?: SettlementRank;
  rankConfidence: 'high' | 'low';
}

export interface WaterwayRule extends RuleBase {
  category: 'waterway';
}

export interface BuildingRule extends RuleBase {
  category: 'building';
}

export interface OtherRule extends RuleBase {
  category: 'other';
}

export type NameTypeRule = SettlementRule | WaterwayRule | BuildingRule | OtherRule;

export type NameTypeCategory = NameTypeRule['category'];

const DEFAULT_TABLE_URL = new URL('../../data/name-types.json', import.meta.url);

export class NameTypeCatalog {
  private readonly rules: ReadonlyMap<string, NameTypeRule>;

  private constructor(rules: Map<string, NameTypeRule>) {
    this.rules = rules;
  }

  /**
   * Build a catalog from a parsed table. Duplicate codes are rejected so every
   * code resolves to exactly one rule.
   */
  static fromTable(data: unknown): NameTypeCatalog {
    const table = NameTypeTableSchema.parse(data);
    const rules = new Map<string, NameTypeRule>();

    for (const mainGroup of table.mainGroups) {
      for (const group of mainGroup.groups) {
        for (const entry of group.nameTypes) {
          if (rules.has(entry.code)) {
            throw createConversionError(
              'INVALID_INPUT',
              `Name type '${entry.code}' is defined more than once`,
              { code: entry.code }
            );
          }
          const common = {
            code: entry.code,
            description: entry.description,
            group: group.name,
            mainGroup: mainGroup.name,
            priority: entry.priority,
            tags: Object.freeze({ ...entry.tags }),
          };

          let rule: NameTypeRule;
          if (entry.category === 'settlement') {
            const place = SettlementRankSchema.safeParse(entry.tags.place);
            rule = {
              ...common,
              category: 'settlement',
              defaultPlace: place.success ? place.data : undefined,
              rankConfidence: entry.rankConfidence,
            };
          } else {
            rule = { ...common, category: entry.category };
          }
          rules.set(entry.code, Object.freeze(rule));
        }
      }
    }

    return new NameTypeCatalog(rules);
  }

  static load(path: string | URL = DEFAULT_TABLE_URL): NameTypeCatalog {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    const catalog = NameTypeCatalog.fromTable(raw);
    logger.info('Name-type catalog loaded', { path: String(path), nameTypes: catalog.size });
    return catalog;
  }

  get size(): number {
    return this.rules.size;
  }

  get(code: string): NameTypeRule | undefined {
    return this.rules.get(code);
  }

  has(code: string): boolean {
    return this.rules.has(code);
  }

  /**
   * Resolve a code or fail with a lookup error (used for the name-type filter)
   */
  require(code: string): NameTypeRule {
    const rule = this.rules.get(code);
    if (!rule) {
      throw createConversionError('LOOKUP_FAILED', `Name type '${code}' not found`, { nameType: code });
    }
    return rule;
  }

  list(): NameTypeRule[] {
    return [...this.rules.values()];
  }
}
