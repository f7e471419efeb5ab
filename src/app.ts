import readline from "readline";
import { logger, setLogLevel } from "./logger";
import { envelopeParamsFromConfig, findConfigPath, loadConfig, parseConfig, watchConfig } from "./config";
import type { FollowerConfig } from "./config";
import { EnvelopeFollower } from "./follower/follower";
import { MidiOutputSink } from "./midi/output";
import { applyInputCommand, parseInputLine } from "./app/commands";

export interface StartAppOptions {
  /** Chemin explicite du fichier YAML. */
  configPath?: string;
  /** Source des lignes d'entrée (défaut: stdin). */
  input?: NodeJS.ReadableStream;
  /** Appelée quand l'entrée est épuisée. */
  onInputEnd?: () => void;
}

/**
 * Point d'entrée du service.
 * - Charge la configuration (défauts si aucun fichier), applique le niveau de log
 * - Ouvre la sortie MIDI et démarre le suiveur d'enveloppe
 * - Lit les amplitudes/commandes ligne par ligne
 * - Active le hot‑reload de la configuration
 *
 * @returns Fonction de nettoyage (arrêt propre des composants)
 */
export async function startApp(opts: StartAppOptions = {}): Promise<() => void> {
  logger.info("Démarrage CC Follower…");
  const configPath = await findConfigPath(opts.configPath);
  let cfg: FollowerConfig;
  if (configPath) {
    logger.info(`Chargement configuration: ${configPath}`);
    cfg = await loadConfig(configPath);
  } else {
    logger.warn("Aucun config.yaml trouvé, paramètres par défaut");
    cfg = parseConfig("");
  }
  if (cfg.log_level) setLogLevel(cfg.log_level);
  logger.debug("Configuration chargée:", JSON.stringify(cfg));

  const sink = new MidiOutputSink();
  sink.open({ portName: cfg.midi.output_port, virtualName: cfg.midi.virtual_port });

  const follower = new EnvelopeFollower(sink, envelopeParamsFromConfig(cfg));
  // Pas de permission micro à demander ici: l'entrée est un flux déjà ouvert.
  follower.setInputAccess(true);
  let lastCc = -1;
  const unsubscribe = follower.subscribe((snap) => {
    if (snap.ccValue === lastCc) return;
    lastCc = snap.ccValue;
    logger.debug(`CC ${snap.ccValue} (amplitude ${snap.currentAmplitude.toFixed(3)})`);
  });
  follower.start();

  const stopWatch = configPath
    ? watchConfig(
        configPath,
        (next) => {
          if (next.log_level) setLogLevel(next.log_level);
          follower.configure(envelopeParamsFromConfig(next));
          if (next.midi.output_port !== cfg.midi.output_port || next.midi.virtual_port !== cfg.midi.virtual_port) {
            sink.open({ portName: next.midi.output_port, virtualName: next.midi.virtual_port });
          }
          cfg = next;
          logger.info("Configuration rechargée.");
        },
        (err) => logger.warn("Erreur hot reload config:", err)
      )
    : () => undefined;

  const rl = readline.createInterface({ input: opts.input ?? process.stdin, terminal: false });
  // Commandes en cours (ex: relâchement Mackie différé), attendues avant la fin de l'entrée
  const pending = new Set<Promise<void>>();
  rl.on("line", (line) => {
    const cmd = parseInputLine(line);
    if (!cmd) return;
    const task: Promise<void> = applyInputCommand(cmd, { follower, sink })
      .catch((err) => logger.warn(err instanceof Error ? err.message : String(err)))
      .finally(() => pending.delete(task));
    pending.add(task);
  });
  rl.on("close", () => {
    void Promise.allSettled([...pending]).then(() => {
      logger.info("Fin de l'entrée");
      opts.onInputEnd?.();
    });
  });

  logger.info(`Suiveur prêt: CC ${follower.params.ccNumber} canal ${follower.params.midiChannel} → ${sink.port}`);

  let stopped = false;
  return () => {
    if (stopped) return;
    stopped = true;
    rl.close();
    stopWatch();
    unsubscribe();
    follower.stop();
    sink.close();
  };
}
