import type { ComponentKind } from "../controls/componentTypes";
import { encodeCc, encodeNoteOff, encodeNoteOn } from "../midi/encoder";
import type { MidiEvent } from "../midi/events";
import type { MidiMapping } from "./midiMapping";
import { mapValue } from "./range";

/** Position normalisée d'un pad XY (0..1 sur chaque axe). */
export interface XYValue {
  x: number;
  y: number;
}

/**
 * Valeur émise par un contrôle: scalaire 0..1 (knob, slider, gyro, drum pad),
 * booléen (toggle) ou couple XY.
 */
export type ControlValue = number | boolean | XYValue;

function scalar(value: ControlValue): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  return value.x;
}

/**
 * Traduit une valeur de contrôle en évènements MIDI selon le mapping du composant.
 *
 * - knob / slider / gyro / toggle: un CC sur `ccNumber`
 * - pad XY: X sur `ccNumber`, Y sur `ccNumber + 1`
 * - drum pad: Note On/Off sur `noteNumber` si défini (vélocité issue de la plage), sinon un CC
 */
export function componentValueToEvents(kind: ComponentKind, mapping: MidiMapping, value: ControlValue): MidiEvent[] {
  const { ccNumber, midiChannel, noteNumber, rangeMapping } = mapping;
  switch (kind) {
    case "xyPadMinimal1": {
      if (typeof value !== "object") {
        return [encodeCc(ccNumber, mapValue(rangeMapping, scalar(value)), midiChannel)];
      }
      return [
        encodeCc(ccNumber, mapValue(rangeMapping, value.x), midiChannel),
        encodeCc(ccNumber + 1, mapValue(rangeMapping, value.y), midiChannel),
      ];
    }
    case "drumPadMinimal1": {
      const v = scalar(value);
      if (noteNumber === undefined) return [encodeCc(ccNumber, mapValue(rangeMapping, v), midiChannel)];
      if (v > rangeMapping.inputLow) return [encodeNoteOn(noteNumber, mapValue(rangeMapping, v), midiChannel)];
      return [encodeNoteOff(noteNumber, 0, midiChannel)];
    }
    case "knobMinimal1":
    case "sliderMinimal1":
    case "toggleButtonNeumorphic1":
    case "gyroMinimal":
      return [encodeCc(ccNumber, mapValue(rangeMapping, scalar(value)), midiChannel)];
  }
}
