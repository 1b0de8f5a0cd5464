export const TRUST_LEVELS = ['absent', 'present'] as const;
export type Trust = (typeof TRUST_LEVELS)[number];

// Whether the person starts conversations with you is a good indicator of trust.
export const TRUST_PROFILES: Record<Trust, { label: string; description: string }> = {
  absent: {
    label: 'Absent',
    description: 'The person has not initiated a conversation with me recently.'
  },
  present: {
    label: 'Present',
    description: 'The person has initiated a conversation with me recently, with no obligation.'
  }
};

export function isTrust(value: string): value is Trust {
  return (TRUST_LEVELS as readonly string[]).includes(value);
}

export function parseTrust(input: string): Trust | null {
  const s = input.trim().toLowerCase();
  return isTrust(s) ? s : null;
}
