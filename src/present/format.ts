import { MOOD_PROFILES, type Mood } from '../situation/mood';
import type { SuggestionItem, SuggestionResult } from '../types';

export function paragraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map(p => p.replace(/\s*\n\s*/g, ' ').trim())
    .filter(Boolean);
}

function formatSection(title: string, items: SuggestionItem[]): string[] {
  const lines = [`${title}:`];
  if (items.length === 0) {
    lines.push('  (none)');
    return lines;
  }
  for (const item of items) {
    lines.push(`  - ${item.text}`);
    for (const p of paragraphs(item.detail ?? '')) {
      lines.push(`    ${p}`);
    }
  }
  return lines;
}

export function formatResult(result: SuggestionResult): string {
  return [...formatSection('Do', result.do), ...formatSection("Don't", result.dont)].join('\n');
}

export function formatMoodProfile(mood: Mood): string {
  const p = MOOD_PROFILES[mood];
  return [`${p.rank}. ${p.label}`, `  Symptoms: ${p.symptoms}`, `  ${p.summary}`, `  ${p.description}`].join('\n');
}
