/**
 * Collects non-fatal issues during a conversion run
 */

import type { ConversionIssue, IssueKind } from './types.js';

export class IssueLog {
  private readonly issues: ConversionIssue[] = [];

  add(issue: ConversionIssue): void {
    this.issues.push(issue);
  }

  report(kind: IssueKind, message: string, placeId?: string, municipalityCode?: string): void {
    this.add({ kind, message, placeId, municipalityCode });
  }

  list(): readonly ConversionIssue[] {
    return this.issues;
  }

  count(kind?: IssueKind): number {
    if (!kind) {
      return this.issues.length;
    }
    return this.issues.filter(issue => issue.kind === kind).length;
  }

  /**
   * Counts per kind, only kinds that occurred
   */
  countsByKind(): Partial<Record<IssueKind, number>> {
    const counts: Partial<Record<IssueKind, number>> = {};
    for (const issue of this.issues) {
      counts[issue.kind] = (counts[issue.kind] ?? 0) + 1;
    }
    return counts;
  }
}
