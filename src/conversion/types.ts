/**
 * Data model for one conversion run
 */

import type { LanguagePolicy } from '../catalog/languages.js';
import type { NameTypeRule, SettlementRank } from '../catalog/name-types.js';
import type { LonLat, Ring } from '../geo/types.js';

export type RawGeometry =
  | { type: 'Point'; coordinates: LonLat }
  | { type: 'MultiPoint'; coordinates: LonLat[] }
  | { type: 'LineString'; coordinates: LonLat[] }
  | { type: 'Polygon'; coordinates: Ring[] };

/**
 * One spelling as delivered by a registry source. `priority` and `historic`
 * are already derived from the registry's status fields by the source.
 */
export interface RawNameEntry {
  readonly text: string;
  /** Registry language code, e.g. "norsk" or "sme" */
  readonly language?: string;
  readonly nameTypeCode: string;
  readonly priority: boolean;
  readonly historic: boolean;
  readonly status?: string;
}

export interface RawRegistryRecord {
  /** stedsnummer */
  readonly placeId: string;
  readonly nameTypeCode: string;
  readonly group?: string;
  readonly mainGroup?: string;
  readonly municipalityCode: string;
  /** e.g. "norsk-nordsamisk" */
  readonly languagePriority?: string;
  /** ISO date of registration or last update */
  readonly registeredAt?: string;
  readonly rank?: SettlementRank;
  readonly geometry?: RawGeometry;
  readonly names: readonly RawNameEntry[];
}

export interface NameEntry {
  text: string;
  /** OSM language code */
  language: string;
  priority: boolean;
  historic: boolean;
  status?: string;
  /** Registration order within the place */
  order: number;
}

export type RankSource = 'none' | 'N50' | 'N100' | 'registry';

export interface Relocation {
  footprintId: string;
  original: LonLat;
}

export interface PlaceCandidate {
  readonly placeId: string;
  readonly rule: NameTypeRule;
  readonly municipalityCode: string;
  readonly registeredAt?: string;
  /** Position in the batch, last tie-breaker for duplicates */
  readonly sequence: number;
  readonly registryRank?: SettlementRank;
  /** OSM language codes from the registry's language priority */
  readonly languagePriority: readonly string[];

  position: LonLat;
  /** Remaining points of a waterway in all-points mode */
  extraPositions: LonLat[];
  /** Priority entries first, then registration order */
  names: NameEntry[];
  /** Name tags set by the resolver */
  nameTags: Record<string, string>;
  place?: string;
  notes: string[];
  rankSource: RankSource;
  duplicate: boolean;
  duplicateOf?: string;
  relocation?: Relocation;
  excluded: boolean;
}

/**
 * Ranks an auxiliary dataset may hand to a settlement
 */
export const AUXILIARY_RANKS = ['village', 'hamlet', 'quarter'] as const satisfies readonly SettlementRank[];

export type AuxiliaryRank = (typeof AUXILIARY_RANKS)[number];

export interface AuxiliaryNamePoint {
  readonly position: LonLat;
  readonly name: string;
  readonly rank: AuxiliaryRank;
}

export interface BuildingFootprint {
  readonly id: string;
  /** Exterior ring first, then holes */
  readonly rings: readonly Ring[];
}

export type AuxiliaryDataset = 'N50' | 'N100';

export interface ConversionOptions {
  includeUntagged: boolean;
  skipBuildingRelocation: boolean;
  includeAllWaterwayPoints: boolean;
  rankMatchRadiusMeters: number;
  buildingOffsetMeters: number;
  languagePolicy: LanguagePolicy;
  /** Adds KOMMUNE=* review tags when a unit spans several municipalities */
  multiMunicipality: boolean;
}
