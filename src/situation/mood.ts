export const MOODS = ['anguished', 'closed', 'cautious', 'unsettled', 'calm', 'hopeful'] as const;
export type Mood = (typeof MOODS)[number];

export interface MoodProfile {
  mood: Mood;
  label: string;
  /**
   * Position on a 1–10 scale. The scale stops at 6: the moods describe
   * coming out of sadness, not joy.
   */
  rank: number;
  symptoms: string;
  summary: string;
  description: string;
}

export const MOOD_PROFILES: Record<Mood, MoodProfile> = {
  anguished: {
    mood: 'anguished',
    label: 'Anguished',
    rank: 1,
    symptoms: 'Unresponsiveness to any interaction. Outbursts, self-harm.',
    summary: 'The person believes that to live is to suffer.',
    description: 'Being awake is already experienced as emotional pain, so every stimulus is overwhelming.'
  },
  closed: {
    mood: 'closed',
    label: 'Closed',
    rank: 2,
    symptoms: 'Silence, eyes stare blankly. Little movement.',
    summary: 'The person believes that trust no longer exists.',
    description:
      'No promise of "better" gets through, usually because past attempts at improvement have ended in negative experiences. i.e. Don\'t make things worse'
  },
  cautious: {
    mood: 'cautious',
    label: 'Cautious',
    rank: 3,
    symptoms: 'One word answers, eyes assessing every detail.',
    summary: 'The person only trusts people who know how to empathize.',
    description: 'The emotions are in a state that the person will hate doing anything an untrusted person says.'
  },
  unsettled: {
    mood: 'unsettled',
    label: 'Unsettled',
    rank: 4,
    symptoms: 'Asks for justification / to see evidence.',
    summary: 'The person is suspicious of people.',
    description: 'Trust has been broken, but the person is willing to try and see if it can be mended.'
  },
  calm: {
    mood: 'calm',
    label: 'Calm',
    rank: 5,
    symptoms: 'No sad symptoms, smile takes conscious effort.',
    summary: 'The person believes life is okay.',
    description: 'There is little / no bias towards things being positive or negative.'
  },
  hopeful: {
    mood: 'hopeful',
    label: 'Hopeful',
    rank: 6,
    symptoms: 'Smiles subconsciously.',
    summary: 'The person believes there is good in life.',
    description: 'The person believes goodness will happen when one works towards it.'
  }
};

export function isMood(value: string): value is Mood {
  return (MOODS as readonly string[]).includes(value);
}

/** Accepts a mood key or label (any case) or its rank, 1 to 6. */
export function parseMood(input: string | number): Mood | null {
  if (typeof input === 'number') {
    return MOODS.find(m => MOOD_PROFILES[m].rank === input) ?? null;
  }
  const s = input.trim().toLowerCase();
  if (/^\d+$/.test(s)) return parseMood(Number(s));
  return isMood(s) ? s : null;
}
