/**
 * Évènements MIDI "fil" produits par le moteur (jamais persistés).
 *
 * Les canaux sont ici indexés à partir de 0 (nibble bas du status, 0..15), contrairement
 * au modèle de mapping qui expose des canaux 1..16.
 */

export interface NoteEvent {
  type: "noteOn" | "noteOff";
  note: number; // 0..127
  velocity: number; // 0..127
  channel: number; // 0..15
}

export interface ControlChangeEvent {
  type: "controlChange";
  controller: number; // 0..127
  value: number; // 0..127
  channel: number; // 0..15
}

export interface SystemExclusiveEvent {
  type: "systemExclusive";
  /** Trame complète (F0 … F7), non validée ici. */
  data: number[];
}

export type MidiEvent = NoteEvent | ControlChangeEvent | SystemExclusiveEvent;

