import { to4bit, to7bit } from "../shared/num";
import type { ControlChangeEvent, MidiEvent, NoteEvent, SystemExclusiveEvent } from "./events";

/**
 * Construction d'évènements MIDI à partir des valeurs du modèle.
 *
 * Aucune entrée n'est rejetée: les numéros hors plage sont masqués (`& 0x7F`, `& 0x0F`),
 * pas bornés. Un canal 17 devient donc le canal 0, un CC 200 devient 72.
 */

/** Canal 1..16 du modèle → nibble 0..15. */
export function channelNibble(channel1: number): number {
  return to4bit((channel1 | 0) - 1);
}

/** Control Change. */
export function encodeCc(ccNumber: number, value: number, channel1: number): ControlChangeEvent {
  return {
    type: "controlChange",
    controller: to7bit(ccNumber),
    value: to7bit(value),
    channel: channelNibble(channel1),
  };
}

/** Note On. */
export function encodeNoteOn(note: number, velocity: number, channel1: number): NoteEvent {
  return { type: "noteOn", note: to7bit(note), velocity: to7bit(velocity), channel: channelNibble(channel1) };
}

/** Note Off (vélocité de relâchement 0 par défaut). */
export function encodeNoteOff(note: number, velocity: number = 0, channel1: number = 1): NoteEvent {
  return { type: "noteOff", note: to7bit(note), velocity: to7bit(velocity), channel: channelNibble(channel1) };
}

/** SysEx: la trame est transmise telle quelle (le cadrage F0…F7 relève du transport). */
export function encodeSysEx(data: readonly number[]): SystemExclusiveEvent {
  return { type: "systemExclusive", data: data.slice() };
}

/**
 * Sérialise un évènement en octets prêts à l'envoi: [status|canal, data1, data2] ou la trame SysEx.
 */
export function toRawBytes(evt: MidiEvent): number[] {
  switch (evt.type) {
    case "noteOn":
      return [0x90 | to4bit(evt.channel), to7bit(evt.note), to7bit(evt.velocity)];
    case "noteOff":
      return [0x80 | to4bit(evt.channel), to7bit(evt.note), to7bit(evt.velocity)];
    case "controlChange":
      return [0xb0 | to4bit(evt.channel), to7bit(evt.controller), to7bit(evt.value)];
    case "systemExclusive":
      return evt.data.slice();
  }
}
