export type Polarity = 'do' | 'dont';

export interface SuggestionItem {
  readonly id: string;
  readonly text: string; // short action, e.g. "Stay away"
  readonly detail?: string; // rationale; paragraphs split by a blank line
  readonly polarity: Polarity;
  readonly tags: readonly string[]; // empty = applies to every situation
  readonly priority: number; // lower shows first
}

export interface Catalog {
  readonly version: number;
  readonly items: readonly SuggestionItem[];
}

export type SituationContext = ReadonlySet<string>;

export interface SuggestionResult {
  do: SuggestionItem[];
  dont: SuggestionItem[];
}

export interface MatchExplanation {
  included: boolean;
  universal: boolean;
  matchedTags: string[];
}

export interface SelectOptions {
  limit?: number; // per polarity; 0 or absent = no cap
}
