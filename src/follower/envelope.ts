import { encodeCc } from "../midi/encoder";
import type { ControlChangeEvent } from "../midi/events";
import { clamp, roundHalfAwayFromZero } from "../shared/num";

/** Bornes des paramètres réglables (identiques aux curseurs de l'interface). */
export const ENVELOPE_LIMITS = {
  threshold: { min: 0, max: 0.5 },
  gain: { min: 0.1, max: 10 },
  smoothing: { min: 0, max: 0.99 },
  ccNumber: { min: 0, max: 127 },
  midiChannel: { min: 1, max: 16 },
} as const;

export interface EnvelopeParams {
  /** Seuil du noise gate, soustrait à l'amplitude lissée (0..0.5). */
  threshold: number;
  /** Gain appliqué après le seuil (0.1..10). */
  gain: number;
  /** Coefficient du filtre passe-bas un pôle (0 = suivi instantané, 0.99 = très amorti). */
  smoothing: number;
  /** Contrôleur émis. */
  ccNumber: number;
  /** Canal 1..16. */
  midiChannel: number;
  /** Borne l'amplitude entrante à [0, 1] avant lissage. Désactivé par défaut. */
  clampInput: boolean;
}

export const DEFAULT_ENVELOPE_PARAMS: Readonly<EnvelopeParams> = Object.freeze({
  threshold: 0.1,
  gain: 1,
  smoothing: 0.8,
  ccNumber: 1,
  midiChannel: 1,
  clampInput: false,
});

/**
 * État courant du suiveur d'enveloppe. Possédé et muté par un seul appelant (callback audio);
 * `ccValue` et `smoothedAmplitude` sont lisibles pour l'affichage.
 */
export interface EnvelopeFollowerState extends EnvelopeParams {
  smoothedAmplitude: number;
  /** Dernière valeur quantifiée 0..127, mise à jour même si l'émission est coupée. */
  ccValue: number;
  isActive: boolean;
}

/**
 * Applique des paramètres en les bornant à leurs plages. Le lissage en cours n'est pas remis à zéro.
 */
export function applyEnvelopeParams(state: EnvelopeParams, params: Partial<EnvelopeParams>): void {
  const L = ENVELOPE_LIMITS;
  if (params.threshold !== undefined) state.threshold = clamp(params.threshold, L.threshold.min, L.threshold.max);
  if (params.gain !== undefined) state.gain = clamp(params.gain, L.gain.min, L.gain.max);
  if (params.smoothing !== undefined) state.smoothing = clamp(params.smoothing, L.smoothing.min, L.smoothing.max);
  if (params.ccNumber !== undefined) state.ccNumber = clamp(Math.trunc(params.ccNumber), L.ccNumber.min, L.ccNumber.max);
  if (params.midiChannel !== undefined) {
    state.midiChannel = clamp(Math.trunc(params.midiChannel), L.midiChannel.min, L.midiChannel.max);
  }
  if (params.clampInput !== undefined) state.clampInput = params.clampInput;
}

export function createEnvelopeState(params: Partial<EnvelopeParams> = {}): EnvelopeFollowerState {
  const state: EnvelopeFollowerState = {
    ...DEFAULT_ENVELOPE_PARAMS,
    smoothedAmplitude: 0,
    ccValue: 0,
    isActive: false,
  };
  applyEnvelopeParams(state, params);
  return state;
}

/** Quantifie une valeur traitée (>= 0) en CC 0..127, saturée et non repliée. NaN donne 0. */
export function quantizeToCc(processed: number): number {
  if (Number.isNaN(processed)) return 0;
  return clamp(roundHalfAwayFromZero(processed * 127), 0, 127);
}

/**
 * Traite un échantillon d'amplitude.
 *
 * 1. lissage exponentiel: `s = s*k + a*(1-k)`
 * 2. seuil + gain: `max(0, (s - seuil) * gain)`
 * 3. quantification 0..127, stockée dans `ccValue` quel que soit l'état actif
 * 4. si actif: retourne le Control Change correspondant, sinon null
 *
 * Chemin temps réel: pas de log, pas d'E/S. Un échantillon non fini (NaN, ±Infinity) compte comme 0.
 */
export function processSample(state: EnvelopeFollowerState, amplitude: number): ControlChangeEvent | null {
  let a = Number.isFinite(amplitude) ? amplitude : 0;
  if (state.clampInput) a = clamp(a, 0, 1);
  const k = state.smoothing;
  state.smoothedAmplitude = state.smoothedAmplitude * k + a * (1 - k);

  const processed = Math.max(0, (state.smoothedAmplitude - state.threshold) * state.gain);
  const midiValue = quantizeToCc(processed);
  state.ccValue = midiValue;

  if (!state.isActive) return null;
  return encodeCc(state.ccNumber, midiValue, state.midiChannel);
}
