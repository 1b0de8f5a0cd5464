import type { SituationContext } from '../types';
import type { Mood } from './mood';
import type { Trust } from './trust';

export interface Situation {
  trust?: Trust;
  mood?: Mood;
}

export const TRUST_TAG_PREFIX = 'trust:';
export const MOOD_TAG_PREFIX = 'mood:';

export const trustTag = (trust: Trust) => `${TRUST_TAG_PREFIX}${trust}`;
export const moodTag = (mood: Mood) => `${MOOD_TAG_PREFIX}${mood}`;
export const pairTag = (trust: Trust, mood: Mood) => `${trustTag(trust)}+${moodTag(mood)}`;

export function situationTags({ trust, mood }: Situation): string[] {
  const tags: string[] = [];
  if (trust) tags.push(trustTag(trust));
  if (mood) tags.push(moodTag(mood));
  if (trust && mood) tags.push(pairTag(trust, mood));
  return tags;
}

/** True for tags owned by the trust/mood inputs, pair tags included. */
export function isSituationTag(tag: string): boolean {
  return tag.startsWith(TRUST_TAG_PREFIX) || tag.startsWith(MOOD_TAG_PREFIX);
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

export function contextFrom(tags: Iterable<string>): SituationContext {
  const context = new Set<string>();
  for (const tag of tags) {
    const t = normalizeTag(tag);
    if (t) context.add(t);
  }
  return context;
}
