import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { z } from "zod";
import { parseLogLevel } from "./logger";
import type { EnvelopeParams } from "./follower/envelope";

/**
 * Erreur de configuration (fichier introuvable, YAML invalide ou champs hors schéma).
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

const logLevelSchema = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `niveau de log inconnu "${value}"` });
    return z.NEVER;
  }
  return level;
});

const configSchema = z.object({
  /** Sortie MIDI: fragment de nom d'un port existant, sinon port virtuel. */
  midi: z
    .object({
      output_port: z.string().optional(),
      virtual_port: z.string().min(1).default("CC Follower"),
    })
    .default({}),
  /** Paramètres du suiveur d'enveloppe (bornés à l'application). */
  envelope: z
    .object({
      threshold: z.number().finite().default(0.1),
      gain: z.number().finite().default(1),
      smoothing: z.number().finite().default(0.8),
      cc_number: z.number().int().min(0).max(127).default(1),
      midi_channel: z.number().int().min(1).max(16).default(1),
      clamp_input: z.boolean().default(false),
    })
    .default({}),
  /** Source des amplitudes pour le service: une valeur par ligne sur stdin. */
  input: z
    .object({
      format: z.literal("lines").default("lines"),
    })
    .default({}),
  /** Surcharge LOG_LEVEL si défini. */
  log_level: logLevelSchema.optional(),
});

/**
 * Configuration racine (défauts appliqués).
 */
export type FollowerConfig = z.infer<typeof configSchema>;

const DEFAULT_PATHS = ["config.yaml", path.join("config", "config.yaml")];

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // candidat suivant
    }
  }
  return null;
}

/**
 * Parse et valide un document YAML. Un document vide donne la configuration par défaut.
 * @throws ConfigError si le YAML est invalide ou ne respecte pas le schéma
 */
export function parseConfig(text: string): FollowerConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(text);
  } catch (err) {
    throw new ConfigError("YAML invalide", [err instanceof Error ? err.message : String(err)]);
  }
  const res = configSchema.safeParse(doc ?? {});
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(racine)"}: ${i.message}`);
    throw new ConfigError("Configuration invalide", issues);
  }
  return res.data;
}

/**
 * Charge et valide le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws ConfigError si aucun fichier n'est trouvé ou s'il est invalide
 */
export async function loadConfig(filePath?: string): Promise<FollowerConfig> {
  const p = await findConfigPath(filePath);
  if (!p) {
    throw new ConfigError("Aucun fichier de configuration trouvé (config.yaml)");
  }
  const raw = await fs.readFile(p, "utf8");
  return parseConfig(raw);
}

/** Paramètres d'enveloppe tirés de la configuration. */
export function envelopeParamsFromConfig(cfg: FollowerConfig): EnvelopeParams {
  const e = cfg.envelope;
  return {
    threshold: e.threshold,
    gain: e.gain,
    smoothing: e.smoothing,
    ccNumber: e.cc_number,
    midiChannel: e.midi_channel,
    clampInput: e.clamp_input,
  };
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * Un fichier invalide déclenche `onError`; la configuration précédente reste en vigueur.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: FollowerConfig) => void,
  onError?: (err: unknown) => void
): () => void {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const reload = async (): Promise<void> => {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      onChange(parseConfig(raw));
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", () => {
    void reload();
  });
  return () => void watcher.close();
}
