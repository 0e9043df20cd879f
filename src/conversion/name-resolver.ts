/**
 * NameResolver - picks the tagging-visible names of a place
 *
 * Current priority spellings compete for name=*; the language is chosen by
 * the language policy. Remaining priority spellings of that language become
 * alt_name=*, other current spellings loc_name=*, historic ones old_name=*.
 */

import { languageOrder, type LanguagePolicy } from '../catalog/languages.js';
import type { IssueLog } from '../domain/issues.js';
import type { NameEntry, PlaceCandidate } from './types.js';

export const AMBIGUOUS_NAME_NOTE = 'Velg én skrivemåte i name=* og legg resten i alt_name=*';

function uniqueTexts(entries: readonly NameEntry[], exclude: ReadonlySet<string> = new Set()): string[] {
  const texts: string[] = [];
  for (const entry of entries) {
    if (!exclude.has(entry.text) && !texts.includes(entry.text)) {
      texts.push(entry.text);
    }
  }
  return texts;
}

/**
 * Languages in the order they were registered on the place
 */
function languagesSeen(names: readonly NameEntry[]): string[] {
  const seen: string[] = [];
  for (const entry of [...names].sort((a, b) => a.order - b.order)) {
    if (!seen.includes(entry.language)) {
      seen.push(entry.language);
    }
  }
  return seen;
}

/**
 * Resolve name tags in place. A candidate without a primary name, or whose
 * name type carries no OSM feature tags, is marked excluded unless untagged
 * places are included.
 *
 * @param candidate - Candidate whose `nameTags` and `excluded` are set
 * @param policy - Language precedence used to pick the main name
 * @param includeUntagged - Keep candidates that would otherwise be excluded
 * @param issues - Receives AMBIGUOUS_NAME entries
 */
export function resolveNames(
  candidate: PlaceCandidate,
  policy: LanguagePolicy,
  includeUntagged: boolean,
  issues: IssueLog
): void {
  const current = candidate.names.filter(entry => !entry.historic);
  const historic = candidate.names.filter(entry => entry.historic);

  const primaryByLanguage = new Map<string, NameEntry[]>();
  for (const entry of current) {
    if (!entry.priority) {
      continue;
    }
    const list = primaryByLanguage.get(entry.language);
    if (list) {
      list.push(entry);
    } else {
      primaryByLanguage.set(entry.language, [entry]);
    }
  }

  const order = languageOrder(
    policy,
    candidate.municipalityCode,
    candidate.languagePriority,
    languagesSeen(candidate.names)
  );

  const tags: Record<string, string> = {};
  const used = new Set<string>();

  const chosen = order.find(language => primaryByLanguage.has(language));
  const chosenEntries = chosen === undefined ? undefined : primaryByLanguage.get(chosen);
  if (chosen !== undefined && chosenEntries && chosenEntries.length > 0) {
    const [first, ...rest] = chosenEntries;
    tags.name = first.text;
    used.add(first.text);

    const alternatives = uniqueTexts(rest, used);
    if (alternatives.length > 0) {
      tags.alt_name = alternatives.join(';');
      alternatives.forEach(text => used.add(text));
      candidate.notes.push(AMBIGUOUS_NAME_NOTE);
      issues.report(
        'AMBIGUOUS_NAME',
        `${alternatives.length + 1} priority spellings for '${first.text}'`,
        candidate.placeId,
        candidate.municipalityCode
      );
    }

    // A sole minority-language name is still labelled with its language
    if (primaryByLanguage.size > 1 || !policy.majority.includes(chosen)) {
      for (const language of order) {
        const entries = primaryByLanguage.get(language);
        if (entries && entries.length > 0) {
          tags[`name:${language}`] = entries[0].text;
          used.add(entries[0].text);
        }
      }
    }
  }

  const local = uniqueTexts(
    current.filter(entry => !entry.priority),
    used
  );
  if (local.length > 0) {
    tags.loc_name = local.join(';');
  }

  const old = uniqueTexts(historic);
  if (old.length > 0) {
    tags.old_name = old.join(';');
  }

  candidate.nameTags = tags;
  const untagged = tags.name === undefined || Object.keys(candidate.rule.tags).length === 0;
  candidate.excluded = untagged && !includeUntagged;
}
