import type { MidiEvent } from "./events";

/**
 * Capacité d'envoi MIDI injectée dans le moteur. Le moteur ne possède pas le transport:
 * il ne l'ouvre ni ne le ferme.
 */
export interface MidiSink {
  send(event: MidiEvent): void;
}

/** Sink mémoire: conserve les évènements envoyés (outillage de test et d'inspection). */
export class RecordingSink implements MidiSink {
  readonly events: MidiEvent[] = [];

  send(event: MidiEvent): void {
    this.events.push(event);
  }

  clear(): void {
    this.events.length = 0;
  }
}
