import { decodeRawMidiDetailed, formatEvent } from "./decoder";

/**
 * Retourne une représentation hexadécimale lisible (ex: "90 3c 7f").
 */
export function hex(bytes: readonly number[]): string {
  return bytes.map((b) => (b & 0xff).toString(16).padStart(2, "0")).join(" ");
}

/**
 * Retourne une description humaine d'une trame MIDI, y compris pour les trames ignorées.
 */
export function human(bytes: readonly number[]): string {
  const res = decodeRawMidiDetailed(bytes);
  if (res.ok) {
    const evt = res.event;
    if (evt.type === "controlChange") {
      return `${formatEvent(evt)} (cc=0x${evt.controller.toString(16)} val=0x${evt.value.toString(16)})`;
    }
    return formatEvent(evt);
  }
  const status = res.status !== undefined ? ` status=0x${res.status.toString(16)}` : "";
  return `Ignored reason=${res.reason}${status}`;
}

