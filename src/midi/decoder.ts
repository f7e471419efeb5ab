import type { MidiEvent } from "./events";

/**
 * Raison pour laquelle une trame brute ne produit aucun évènement.
 * - `empty`: tableau vide
 * - `tooShort`: message "channel voice" de moins de 3 octets
 * - `unsupported`: status hors Note On/Off, CC, SysEx (ex: Pitch Bend, Program Change, temps réel)
 */
export type DecodeSkipReason = "empty" | "tooShort" | "unsupported";

export type DecodeResult =
  | { ok: true; event: MidiEvent }
  | { ok: false; reason: DecodeSkipReason; status?: number };

/**
 * Décode une trame brute (ex: protocole Mackie Control) et explique l'absence d'évènement.
 * Ne lève jamais d'exception.
 */
export function decodeRawMidiDetailed(raw: readonly number[]): DecodeResult {
  if (raw.length === 0) return { ok: false, reason: "empty" };
  const status = raw[0] & 0xff;
  if (status === 0xf0) {
    return { ok: true, event: { type: "systemExclusive", data: raw.slice() } };
  }
  if (raw.length < 3) return { ok: false, reason: "tooShort", status };

  const channel = status & 0x0f; // 0..15
  const d1 = raw[1] & 0x7f;
  const d2 = raw[2] & 0x7f;

  switch (status & 0xf0) {
    case 0x90:
      // Note On vélocité 0 conservé tel quel (pas de conversion implicite en Note Off)
      return { ok: true, event: { type: "noteOn", note: d1, velocity: d2, channel } };
    case 0x80:
      return { ok: true, event: { type: "noteOff", note: d1, velocity: d2, channel } };
    case 0xb0:
      return { ok: true, event: { type: "controlChange", controller: d1, value: d2, channel } };
    default:
      return { ok: false, reason: "unsupported", status };
  }
}

/**
 * Décode une trame brute en évènement, ou null si la trame n'est pas prise en charge.
 */
export function decodeRawMidi(raw: readonly number[]): MidiEvent | null {
  const res = decodeRawMidiDetailed(raw);
  return res.ok ? res.event : null;
}

/** Représentation courte pour les logs. Canaux affichés en 1..16. */
export function formatEvent(evt: MidiEvent): string {
  switch (evt.type) {
    case "noteOn":
      return `NoteOn ch=${evt.channel + 1} note=${evt.note} vel=${evt.velocity}`;
    case "noteOff":
      return `NoteOff ch=${evt.channel + 1} note=${evt.note} vel=${evt.velocity}`;
    case "controlChange":
      return `CC ch=${evt.channel + 1} cc=${evt.controller} val=${evt.value}`;
    case "systemExclusive":
      return `SysEx len=${evt.data.length}`;
  }
}
