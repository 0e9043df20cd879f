/**
 * Scope runner: resolves a scope to output units, converts and writes each one
 *
 * A failing unit is recorded in the summary and the run continues with the
 * next one.
 */

import type { LanguagePolicy } from '../catalog/languages.js';
import type { NameTypeCatalog } from '../catalog/name-types.js';
import { toConversionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import { runWithUnit } from '../domain/request-context.js';
import type { ConversionError, ConversionIssue, IssueKind } from '../domain/types.js';
import { outputFileName, type OutputWriter } from '../output/geojson-writer.js';
import type { AdminUnit, MunicipalityRegistry } from '../sources/municipalities.js';
import type { RegistrySource } from '../sources/registry-source.js';
import { convertBatch, type AuxiliaryData, type BatchStats } from './pipeline.js';
import type { RawRegistryRecord } from './types.js';

export interface ConvertRequest {
  scope: string;
  nameType?: string;
  includeUntagged: boolean;
  skipBuildingRelocation: boolean;
  includeAllWaterwayPoints: boolean;
}

export interface AuxiliaryLoader {
  loadUnit(municipalityCodes: readonly string[]): Promise<AuxiliaryData>;
}

export interface ConverterDependencies {
  catalog: NameTypeCatalog;
  registry: MunicipalityRegistry;
  source: RegistrySource;
  auxiliary: AuxiliaryLoader;
  writer: OutputWriter;
  languagePolicy: LanguagePolicy;
  rankMatchRadiusMeters: number;
  buildingOffsetMeters: number;
}

export interface UnitResult {
  unit: AdminUnit;
  /** Absent when the unit had no places to write */
  path?: string;
  stats: BatchStats;
  issues: Partial<Record<IssueKind, number>>;
}

export interface UnitFailure {
  unit: AdminUnit;
  error: ConversionError;
}

export interface ConversionSummary {
  scope: AdminUnit;
  nameType?: string;
  sourceMode: RegistrySource['mode'];
  units: UnitResult[];
  failures: UnitFailure[];
  totals: BatchStats;
  /** First issues of the run, for review */
  issues: ConversionIssue[];
  issueCount: number;
}

const MAX_REPORTED_ISSUES = 50;

function emptyStats(): BatchStats {
  return {
    records: 0,
    skipped: 0,
    converted: 0,
    excluded: 0,
    duplicates: 0,
    ambiguous: 0,
    rankAdjusted: 0,
    relocated: 0,
    nudged: 0,
    nonMajorityNames: 0,
  };
}

const STAT_KEYS = [
  'records',
  'skipped',
  'converted',
  'excluded',
  'duplicates',
  'ambiguous',
  'rankAdjusted',
  'relocated',
  'nudged',
  'nonMajorityNames',
] as const satisfies readonly (keyof BatchStats)[];

function addStats(total: BatchStats, stats: BatchStats): void {
  for (const key of STAT_KEYS) {
    total[key] += stats[key];
  }
}

export class Converter {
  constructor(private readonly deps: ConverterDependencies) {}

  /**
   * Units of a run: Norway without a type filter is split per municipality
   */
  planUnits(scope: AdminUnit, nameType: string | undefined): AdminUnit[] {
    if (scope.kind === 'country' && nameType === undefined) {
      return this.deps.registry.list('municipality');
    }
    return [scope];
  }

  /**
   * @throws ConversionError when the scope or name type cannot be resolved
   */
  async run(request: ConvertRequest): Promise<ConversionSummary> {
    const { catalog, registry, source } = this.deps;

    const scope = registry.resolve(request.scope);
    if (request.nameType !== undefined) {
      catalog.require(request.nameType);
    }

    const units = this.planUnits(scope, request.nameType);
    logger.info('Conversion started', {
      scope: scope.code,
      name: scope.name,
      nameType: request.nameType,
      sourceMode: source.mode,
      units: units.length,
    });

    const summary: ConversionSummary = {
      scope,
      nameType: request.nameType,
      sourceMode: source.mode,
      units: [],
      failures: [],
      totals: emptyStats(),
      issues: [],
      issueCount: 0,
    };

    for (const unit of units) {
      try {
        const result = await runWithUnit(unit.code, () => this.convertUnit(unit, request, summary));
        summary.units.push(result);
        addStats(summary.totals, result.stats);
      } catch (error) {
        const conversionError = toConversionError(error, `Conversion of ${unit.code} ${unit.name} failed`);
        logger.warn('Unit failed', { unit: unit.code, code: conversionError.code, message: conversionError.message });
        metrics.recordUnit('failed');
        summary.failures.push({ unit, error: conversionError });
      }
    }

    logger.info('Conversion finished', {
      scope: scope.code,
      units: summary.units.length,
      failures: summary.failures.length,
      converted: summary.totals.converted,
      issues: summary.issueCount,
    });

    return summary;
  }

  private async fetchRecords(unit: AdminUnit, nameType: string | undefined): Promise<RawRegistryRecord[]> {
    const { source, registry } = this.deps;

    // Static extracts exist per county only, so a national type query reads them all
    if (unit.kind === 'country' && source.mode === 'static') {
      let records: RawRegistryRecord[] = [];
      for (const county of registry.list('county')) {
        records = records.concat(
          await source.fetchRecords({ unitCode: county.code, unitName: county.name, nameType })
        );
      }
      return records;
    }

    return source.fetchRecords({ unitCode: unit.code, unitName: unit.name, nameType });
  }

  private async convertUnit(
    unit: AdminUnit,
    request: ConvertRequest,
    summary: ConversionSummary
  ): Promise<UnitResult> {
    const records = await this.fetchRecords(unit, request.nameType);

    const municipalityCodes = [...new Set(records.map(record => record.municipalityCode))].sort();
    const auxiliary = await this.deps.auxiliary.loadUnit(municipalityCodes);

    const batch = convertBatch(records, this.deps.catalog, auxiliary, {
      includeUntagged: request.includeUntagged,
      skipBuildingRelocation: request.skipBuildingRelocation,
      includeAllWaterwayPoints: request.includeAllWaterwayPoints,
      rankMatchRadiusMeters: this.deps.rankMatchRadiusMeters,
      buildingOffsetMeters: this.deps.buildingOffsetMeters,
      languagePolicy: this.deps.languagePolicy,
      multiMunicipality: unit.kind !== 'municipality',
    });

    for (const issue of batch.issues.list()) {
      if (summary.issues.length < MAX_REPORTED_ISSUES) {
        summary.issues.push(issue);
      }
    }
    summary.issueCount += batch.issues.count();

    let path: string | undefined;
    if (batch.features.length > 0) {
      const fileName = outputFileName(unit.code, unit.name, {
        nameType: request.nameType,
        sourceMode: this.deps.source.mode,
        includeUntagged: request.includeUntagged,
      });
      path = await this.deps.writer.write(fileName, { type: 'FeatureCollection', features: batch.features });
      metrics.recordUnit('written', batch.features.length, batch.stats.skipped);
    } else {
      logger.info('No place names found, no file written', { unit: unit.code });
      metrics.recordUnit('empty', 0, batch.stats.skipped);
    }

    logger.info('Unit converted', { unit: unit.code, name: unit.name, ...batch.stats });

    return { unit, path, stats: batch.stats, issues: batch.issues.countsByKind() };
  }
}
