import { createRangeMapping } from "./range";
import type { RangeMapping } from "./range";

/**
 * Liaison d'un contrôle vers une destination MIDI.
 * Le canal est exprimé en 1..16; la conversion 0..15 se fait à l'encodage.
 * Les valeurs stockées ne sont pas bornées: elles sont masquées à l'encodage.
 */
export interface MidiMapping {
  ccNumber: number;
  midiChannel: number;
  noteNumber?: number;
  rangeMapping: RangeMapping;
}

export interface MidiMappingInit {
  ccNumber?: number;
  midiChannel?: number;
  noteNumber?: number;
  rangeMapping?: Partial<RangeMapping>;
}

/** Mapping par défaut d'un composant: CC 1, canal 1, plage 0..1 → 0..127. */
export function createMidiMapping(init: MidiMappingInit = {}): MidiMapping {
  const mapping: MidiMapping = {
    ccNumber: init.ccNumber ?? 1,
    midiChannel: init.midiChannel ?? 1,
    rangeMapping: createRangeMapping(init.rangeMapping),
  };
  if (init.noteNumber !== undefined) mapping.noteNumber = init.noteNumber;
  return mapping;
}
