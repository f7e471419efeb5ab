import type { EnvelopeFollower } from "../follower/follower";
import type { MidiSink } from "../midi/sink";
import { isMackieCommand, sendMackieCommand } from "../transport/mackie";
import type { MackieCommand } from "../transport/mackie";

/**
 * Ligne lue sur l'entrée du service:
 * - un ou plusieurs nombres séparés par des espaces: bloc d'amplitudes
 * - `start` | `stop` | `toggle`: cycle de vie du suiveur
 * - `mcu <bouton>` (`mcu play`, `mcu record`…): commande de transport Mackie
 * - vide ou `#…`: ignorée
 */
export type InputCommand =
  | { kind: "samples"; amplitudes: number[] }
  | { kind: "start" }
  | { kind: "stop" }
  | { kind: "toggle" }
  | { kind: "transport"; command: MackieCommand }
  | { kind: "invalid"; text: string };

export function parseInputLine(line: string): InputCommand | null {
  const text = line.trim();
  if (text === "" || text.startsWith("#")) return null;
  if (text === "start" || text === "stop" || text === "toggle") return { kind: text };
  const mcu = /^mcu\s+(\S+)$/.exec(text);
  if (mcu) {
    const name = mcu[1];
    return isMackieCommand(name) ? { kind: "transport", command: name } : { kind: "invalid", text };
  }
  const amplitudes: number[] = [];
  for (const token of text.split(/\s+/)) {
    const n = Number(token);
    if (!Number.isFinite(n)) return { kind: "invalid", text };
    amplitudes.push(n);
  }
  return { kind: "samples", amplitudes };
}

export interface CommandContext {
  follower: EnvelopeFollower;
  sink: MidiSink;
  /** Délai press → release des commandes de transport (ms). */
  releaseMs?: number;
}

/**
 * Applique une commande au suiveur ou au sink.
 * La promesse se résout une fois le relâchement d'une commande de transport envoyé.
 */
export async function applyInputCommand(cmd: InputCommand, ctx: CommandContext): Promise<void> {
  switch (cmd.kind) {
    case "samples":
      ctx.follower.ingestBlock(cmd.amplitudes);
      return;
    case "start":
      ctx.follower.start();
      return;
    case "stop":
      ctx.follower.stop();
      return;
    case "toggle":
      ctx.follower.toggleActive();
      return;
    case "transport":
      await sendMackieCommand(ctx.sink, cmd.command, ctx.releaseMs);
      return;
    case "invalid":
      throw new Error(`Entrée non reconnue: "${cmd.text}"`);
  }
}
