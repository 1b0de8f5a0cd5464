import type { SituationContext } from '../types';
import type { Mood } from '../situation/mood';
import type { Trust } from '../situation/trust';
import { isSituationTag, normalizeTag, situationTags } from '../situation/tags';

export type ContextEvent =
  | { type: 'toggle'; tag: string }
  | { type: 'set'; tag: string; selected: boolean }
  | { type: 'clear' }
  | { type: 'situation'; trust?: Trust; mood?: Mood };

/**
 * Applies one user event to a context and returns the next context.
 * The input set is never modified.
 */
export function reduceContext(context: SituationContext, event: ContextEvent): SituationContext {
  switch (event.type) {
    case 'toggle': {
      const tag = normalizeTag(event.tag);
      if (!tag) return context;
      const next = new Set(context);
      if (next.has(tag)) next.delete(tag);
      else next.add(tag);
      return next;
    }
    case 'set': {
      const tag = normalizeTag(event.tag);
      if (!tag || context.has(tag) === event.selected) return context;
      const next = new Set(context);
      if (event.selected) next.add(tag);
      else next.delete(tag);
      return next;
    }
    case 'clear':
      return context.size === 0 ? context : new Set<string>();
    case 'situation': {
      const next = new Set([...context].filter(tag => !isSituationTag(tag)));
      for (const tag of situationTags(event)) next.add(tag);
      return next;
    }
  }
}
