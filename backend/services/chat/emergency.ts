export const EMERGENCY_KEYWORDS = [
  'emergency',
  'urgent',
  'chest pain',
  'severe pain',
  'trouble breathing',
  'heart attack',
  'suicide',
  'bleeding',
  'hemorrhage',
  'unconscious',
  '911',
  'help me',
  'need help now',
  'stroke',
  'seizure',
  'dying',
  "can't breathe",
  'passing out',
  'severe headache',
  'overdose'
] as const

/** Case-insensitive substring match against the emergency keyword list. */
export function isEmergencyMessage(text: string) {
  const lower = text.toLowerCase()
  return EMERGENCY_KEYWORDS.some((keyword) => lower.includes(keyword))
}
