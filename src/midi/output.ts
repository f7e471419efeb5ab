import { Output } from "@julusian/midi";
import type { Input } from "@julusian/midi";
import { scopedLogger } from "../logger";
import { decodeRawMidiDetailed, formatEvent } from "./decoder";
import { toRawBytes } from "./encoder";
import type { MidiEvent } from "./events";
import type { MidiSink } from "./sink";
import { hex } from "./utils";

const log = scopedLogger("midi-out");

export interface MidiPortInfo {
  index: number;
  name: string;
}

/**
 * Index du premier port dont le nom contient le fragment (insensible à la casse).
 */
export function findPortIndexByNameFragment(device: Input | Output, nameFragment: string): number | null {
  const needle = nameFragment.trim().toLowerCase();
  const count = device.getPortCount();
  for (let i = 0; i < count; i += 1) {
    const name = device.getPortName(i) ?? "";
    if (name.toLowerCase().includes(needle)) return i;
  }
  return null;
}

export function listOutputPorts(): MidiPortInfo[] {
  const output = new Output();
  const ports: MidiPortInfo[] = [];
  const count = output.getPortCount();
  for (let i = 0; i < count; i += 1) ports.push({ index: i, name: output.getPortName(i) });
  output.closePort();
  return ports;
}

export interface OpenOutputOptions {
  /** Fragment du nom d'un port existant. */
  portName?: string;
  /** Nom du port virtuel ouvert si aucun port ne correspond. */
  virtualName: string;
}

/**
 * Sortie MIDI sur un port système ou virtuel. Les erreurs d'envoi sont journalisées
 * et n'interrompent jamais l'appelant.
 */
export class MidiOutputSink implements MidiSink {
  private output: Output | null = null;
  private portLabel = "";

  get isOpen(): boolean {
    return this.output !== null;
  }

  get port(): string {
    return this.portLabel;
  }

  /**
   * Ouvre le port demandé, ou un port virtuel à défaut.
   */
  open(opts: OpenOutputOptions): void {
    this.close();
    const output = new Output();
    const fragment = opts.portName?.trim() ?? "";
    const index = fragment ? findPortIndexByNameFragment(output, fragment) : null;
    if (index !== null) {
      output.openPort(index);
      this.portLabel = output.getPortName(index);
      log.info(`Port MIDI ouvert: [${index}] ${this.portLabel}`);
    } else {
      if (fragment) log.warn(`Port MIDI "${fragment}" introuvable, ouverture d'un port virtuel`);
      output.openVirtualPort(opts.virtualName);
      this.portLabel = opts.virtualName;
      log.info(`Port MIDI virtuel ouvert: ${opts.virtualName}`);
    }
    this.output = output;
  }

  send(event: MidiEvent): void {
    if (!this.output) {
      log.warn(`Aucune connexion MIDI pour ${formatEvent(event)}`);
      return;
    }
    try {
      this.output.sendMessage(toRawBytes(event));
    } catch (err) {
      log.error(`Échec d'envoi ${formatEvent(event)}:`, err);
    }
  }

  /**
   * Envoie une trame brute (ex: Mackie Control) après décodage; les trames non prises
   * en charge sont ignorées avec un avertissement.
   */
  sendRaw(raw: readonly number[]): boolean {
    const res = decodeRawMidiDetailed(raw);
    if (!res.ok) {
      log.warn(`Trame MIDI non prise en charge (${res.reason}): ${hex(raw)}`);
      return false;
    }
    this.send(res.event);
    return true;
  }

  close(): void {
    if (!this.output) return;
    try {
      this.output.closePort();
      log.info(`Port MIDI fermé: ${this.portLabel}`);
    } catch (err) {
      log.warn("Fermeture du port MIDI en erreur:", err);
    }
    this.output = null;
    this.portLabel = "";
  }
}
