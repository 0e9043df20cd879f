/**
 * Converts one batch of registry records (one output unit) into features
 */

import type { NameTypeCatalog } from '../catalog/name-types.js';
import { IssueLog } from '../domain/issues.js';
import { logger } from '../domain/logger.js';
import { FootprintIndex, relocateCandidate } from './building-relocator.js';
import { separateCoincident } from './coincident.js';
import { markDuplicates } from './duplicates.js';
import { resolveNames } from './name-resolver.js';
import { normalizeRecords } from './normalizer.js';
import { AuxiliaryPointIndex, adjustRank } from './rank-adjuster.js';
import { emitFeature, type PlaceFeature } from './tag-emitter.js';
import type {
  AuxiliaryNamePoint,
  BuildingFootprint,
  ConversionOptions,
  PlaceCandidate,
  RawRegistryRecord,
} from './types.js';

export interface AuxiliaryData {
  n50: readonly AuxiliaryNamePoint[];
  n100: readonly AuxiliaryNamePoint[];
  footprints: readonly BuildingFootprint[];
}

export const EMPTY_AUXILIARY_DATA: AuxiliaryData = { n50: [], n100: [], footprints: [] };

export interface BatchStats {
  records: number;
  skipped: number;
  converted: number;
  excluded: number;
  duplicates: number;
  ambiguous: number;
  rankAdjusted: number;
  relocated: number;
  nudged: number;
  nonMajorityNames: number;
}

export interface BatchResult {
  features: PlaceFeature[];
  candidates: PlaceCandidate[];
  stats: BatchStats;
  issues: IssueLog;
}

function hasNonMajorityName(candidate: PlaceCandidate, majority: readonly string[]): boolean {
  return candidate.names.some(entry => !majority.includes(entry.language));
}

/**
 * Run the full chain on one batch. Duplicate detection sees the whole batch,
 * so the batch must hold every record of the unit.
 */
export function convertBatch(
  records: readonly RawRegistryRecord[],
  catalog: NameTypeCatalog,
  auxiliary: AuxiliaryData,
  options: ConversionOptions
): BatchResult {
  const issues = new IssueLog();
  const candidates = normalizeRecords(records, catalog, options.includeAllWaterwayPoints, issues);

  for (const candidate of candidates) {
    resolveNames(candidate, options.languagePolicy, options.includeUntagged, issues);
  }
  const included = candidates.filter(candidate => !candidate.excluded);

  const duplicates = markDuplicates(included, issues);

  const rankIndexes = [
    new AuxiliaryPointIndex('N50', auxiliary.n50),
    new AuxiliaryPointIndex('N100', auxiliary.n100),
  ];
  let rankAdjusted = 0;
  for (const candidate of included) {
    if (adjustRank(candidate, rankIndexes, options.rankMatchRadiusMeters)) {
      rankAdjusted++;
    }
  }

  let relocated = 0;
  const footprints =
    !options.skipBuildingRelocation && auxiliary.footprints.length > 0
      ? new FootprintIndex(auxiliary.footprints)
      : undefined;
  if (footprints) {
    for (const candidate of included) {
      if (relocateCandidate(candidate, footprints, options.buildingOffsetMeters, issues)) {
        relocated++;
      }
    }
  }

  const nudged = separateCoincident(included, footprints);

  const emitOptions = { multiMunicipality: options.multiMunicipality };
  const features = included.map(candidate => emitFeature(candidate, emitOptions));

  const stats: BatchStats = {
    records: records.length,
    skipped: issues.count('MALFORMED_RECORD') + issues.count('UNKNOWN_NAME_TYPE'),
    converted: features.length,
    excluded: candidates.length - included.length,
    duplicates,
    ambiguous: issues.count('AMBIGUOUS_NAME'),
    rankAdjusted,
    relocated,
    nudged,
    nonMajorityNames: included.filter(candidate =>
      hasNonMajorityName(candidate, options.languagePolicy.majority)
    ).length,
  };

  logger.debug('Batch converted', { ...stats });

  return { features, candidates, stats, issues };
}
