import { roundHalfAwayFromZero } from "../shared/num";

/**
 * Transformation affine bornée d'une plage continue vers une plage entière.
 *
 * `inputLow < inputHigh` par convention (non vérifié). Les bornes de sortie peuvent être
 * inversées (`outputLow > outputHigh`) pour obtenir une course inversée.
 */
export interface RangeMapping {
  inputLow: number;
  inputHigh: number;
  outputLow: number;
  outputHigh: number;
}

export const DEFAULT_RANGE_MAPPING: Readonly<RangeMapping> = Object.freeze({
  inputLow: 0,
  inputHigh: 1,
  outputLow: 0,
  outputHigh: 127,
});

export function createRangeMapping(partial: Partial<RangeMapping> = {}): RangeMapping {
  return { ...DEFAULT_RANGE_MAPPING, ...partial };
}

/**
 * Projette `input` sur la plage de sortie.
 *
 * - L'entrée est bornée par `min(max(input, inputLow), inputHigh)`; avec des bornes
 *   d'entrée inversées le résultat se réduit à un point (comportement conservé).
 * - Plage d'entrée nulle: retourne `outputLow`.
 * - Arrondi à l'entier le plus proche, égalités éloignées de zéro.
 * - NaN est traité comme `inputLow`.
 */
export function mapValue(mapping: RangeMapping, input: number): number {
  const { inputLow, inputHigh, outputLow, outputHigh } = mapping;
  const x = Number.isNaN(input) ? inputLow : input;
  const clamped = Math.min(Math.max(x, inputLow), inputHigh);
  const inputRange = inputHigh - inputLow;
  if (inputRange === 0) return outputLow;
  const normalized = (clamped - inputLow) / inputRange;
  const mapped = normalized * (outputHigh - outputLow) + outputLow;
  return roundHalfAwayFromZero(mapped);
}
