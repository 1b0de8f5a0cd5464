import type {
  MatchExplanation,
  SelectOptions,
  SituationContext,
  SuggestionItem,
  SuggestionResult
} from '../types';
import { contextFrom } from '../situation/tags';

/**
 * Ranking order within a polarity: priority ascending, then id ascending.
 * Ids compare by code unit so the order never depends on locale.
 */
export function compareSuggestions(a: SuggestionItem, b: SuggestionItem): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Why an item is or is not part of the result for `context`.
 * Items without tags are universal; tagged items need one shared tag.
 */
export function explainMatch(item: SuggestionItem, context: SituationContext): MatchExplanation {
  const selected = contextFrom(context);
  const universal = item.tags.length === 0;
  const matchedTags = item.tags.filter(tag => selected.has(tag));
  return {
    included: universal || matchedTags.length > 0,
    universal,
    matchedTags
  };
}

function matches(item: SuggestionItem, context: SituationContext): boolean {
  return item.tags.length === 0 || item.tags.some(tag => context.has(tag));
}

function checkLimit(limit: number | undefined): number {
  if (limit === undefined || limit === 0) return Infinity;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
  }
  return limit;
}

/**
 * Selects the suggestions that apply to `context`, split by polarity and ranked.
 *
 * Context tags are compared after the same trim/lower-case normalisation
 * the catalog applies to item tags.
 *
 * Pure: the same items and context always give the same result, and neither
 * argument is modified.
 */
export function select(
  items: readonly SuggestionItem[],
  context: SituationContext,
  options: SelectOptions = {}
): SuggestionResult {
  const limit = checkLimit(options.limit);
  const selected = contextFrom(context);
  const seen = new Set<string>();
  const result: SuggestionResult = { do: [], dont: [] };

  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    if (!matches(item, selected)) continue;
    result[item.polarity].push(item);
  }

  result.do.sort(compareSuggestions);
  result.dont.sort(compareSuggestions);

  if (limit !== Infinity) {
    result.do = result.do.slice(0, limit);
    result.dont = result.dont.slice(0, limit);
  }
  return result;
}
