/**
 * Duplicate name detection, run once the whole batch is resolved
 */

import type { IssueLog } from '../domain/issues.js';
import { collapseWhitespace } from './normalizer.js';
import type { PlaceCandidate } from './types.js';

export function duplicateNote(keeperId: string): string {
  return `Duplikat av ssr:stedsnr=${keeperId}`;
}

/**
 * Keeper order: lower name-type priority, earlier registration, earlier in batch.
 * Undated records sort after dated ones.
 */
export function compareForKeeper(a: PlaceCandidate, b: PlaceCandidate): number {
  if (a.rule.priority !== b.rule.priority) {
    return a.rule.priority - b.rule.priority;
  }
  if (a.registeredAt !== b.registeredAt) {
    if (a.registeredAt === undefined) {
      return 1;
    }
    if (b.registeredAt === undefined) {
      return -1;
    }
    return a.registeredAt < b.registeredAt ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

/**
 * Flag every candidate that shares its name=* with a better candidate of the
 * same municipality. Flags are only ever set. Returns the number newly flagged.
 */
export function markDuplicates(candidates: readonly PlaceCandidate[], issues: IssueLog): number {
  const groups = new Map<string, PlaceCandidate[]>();

  for (const candidate of candidates) {
    const name = candidate.nameTags.name;
    if (candidate.excluded || name === undefined) {
      continue;
    }
    const key = `${candidate.municipalityCode}\u0000${collapseWhitespace(name)}`;
    const group = groups.get(key);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(key, [candidate]);
    }
  }

  let flagged = 0;
  for (const group of groups.values()) {
    if (group.length < 2) {
      continue;
    }
    const [keeper, ...others] = [...group].sort(compareForKeeper);
    for (const candidate of others) {
      if (candidate.duplicate) {
        continue;
      }
      candidate.duplicate = true;
      candidate.duplicateOf = keeper.placeId;
      candidate.notes.push(duplicateNote(keeper.placeId));
      issues.report(
        'DUPLICATE_NAME',
        `'${candidate.nameTags.name}' duplicates place ${keeper.placeId}`,
        candidate.placeId,
        candidate.municipalityCode
      );
      flagged++;
    }
  }
  return flagged;
}
