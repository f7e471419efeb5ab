/**
 * Borne une valeur numérique dans [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Arrondi à l'entier le plus proche, égalités éloignées de zéro (2.5 → 3, -2.5 → -3).
 * `Math.round` arrondit les égalités vers +∞, d'où ce helper.
 */
export function roundHalfAwayFromZero(value: number): number {
  const r = value < 0 ? -Math.round(-value) : Math.round(value);
  return r === 0 ? 0 : r; // pas de -0
}

/** Masque 7 bits (octet de données MIDI). */
export function to7bit(value: number): number {
  return (value | 0) & 0x7f;
}

/** Masque 4 bits (nibble de canal MIDI). */
export function to4bit(value: number): number {
  return (value | 0) & 0x0f;
}
