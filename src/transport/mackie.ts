import { scopedLogger } from "../logger";
import { decodeRawMidiDetailed } from "../midi/decoder";
import type { MidiSink } from "../midi/sink";
import { hex } from "../midi/utils";
import { delay } from "../shared/time";

const log = scopedLogger("mackie");

/**
 * Boutons de transport Mackie Control (notes sur le canal 1).
 */
export const MACKIE_COMMANDS = {
  rewind: 0x5b,
  fastForward: 0x5c,
  stop: 0x5d,
  play: 0x5e,
  record: 0x5f,
  cursorUp: 0x60,
  cursorDown: 0x61,
  cursorLeft: 0x62,
  cursorRight: 0x63,
  zoom: 0x64,
  scrub: 0x65,
  loop: 0x66,
  click: 0x67,
} as const;

export type MackieCommand = keyof typeof MACKIE_COMMANDS;

export function isMackieCommand(value: string): value is MackieCommand {
  return Object.prototype.hasOwnProperty.call(MACKIE_COMMANDS, value);
}

/** Trames brutes d'un appui: Note On vélocité 127 puis Note Off vélocité 0. */
export function commandBytes(cmd: MackieCommand): { press: number[]; release: number[] } {
  const note = MACKIE_COMMANDS[cmd];
  return { press: [0x90, note, 0x7f], release: [0x80, note, 0x00] };
}

/**
 * Décode une trame brute et la transmet au sink. Les trames non prises en charge
 * sont signalées en log et ignorées.
 * @returns true si un évènement a été transmis
 */
export function sendRawToSink(sink: MidiSink, raw: readonly number[]): boolean {
  const res = decodeRawMidiDetailed(raw);
  if (!res.ok) {
    log.warn(`Trame MIDI ignorée (${res.reason}): ${hex(raw)}`);
    return false;
  }
  sink.send(res.event);
  return true;
}

/**
 * Envoie un appui de bouton de transport: press, attente `releaseMs`, release.
 */
export async function sendMackieCommand(sink: MidiSink, cmd: MackieCommand, releaseMs: number = 100): Promise<void> {
  const { press, release } = commandBytes(cmd);
  log.debug(`Commande ${cmd} (note 0x${MACKIE_COMMANDS[cmd].toString(16)})`);
  sendRawToSink(sink, press);
  await delay(releaseMs);
  sendRawToSink(sink, release);
}
