import { z } from "zod";
import { createMidiMapping } from "../mapping/midiMapping";
import { COMPONENT_KINDS } from "./componentTypes";
import { createComponent, RecordDecodeError } from "./records";
import type { CanvasComponent } from "./records";
import presetData from "./presets.json";

export const FACTORY_PRESETS = ["dj", "producer", "performance"] as const;
export type FactoryPresetName = (typeof FACTORY_PRESETS)[number];

const presetEntrySchema = z.object({
  kind: z.enum(COMPONENT_KINDS),
  x: z.number(),
  y: z.number(),
  channel: z.number().int(),
  cc: z.number().int(),
  label: z.string(),
  scale: z.number().default(1),
});

const presetFileSchema = z.object({
  dj: z.array(presetEntrySchema),
  producer: z.array(presetEntrySchema),
  performance: z.array(presetEntrySchema),
});

type PresetFile = z.infer<typeof presetFileSchema>;

let cache: PresetFile | null = null;

function presets(): PresetFile {
  if (cache) return cache;
  const parsed = presetFileSchema.safeParse(presetData);
  if (!parsed.success) {
    throw new RecordDecodeError(
      "presets.json invalide",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  cache = parsed.data;
  return cache;
}

export function isFactoryPresetName(value: string): value is FactoryPresetName {
  return FACTORY_PRESETS.some((p) => p === value);
}

/**
 * Matérialise un layout d'usine: chaque entrée devient un composant neuf (nouvel id),
 * avec la plage par défaut 0..1 → 0..127.
 */
export function buildFactoryPreset(name: FactoryPresetName): CanvasComponent[] {
  return presets()[name].map((entry) =>
    createComponent(entry.kind, {
      position: { x: entry.x, y: entry.y },
      label: entry.label,
      scale: entry.scale,
      midiMapping: createMidiMapping({ ccNumber: entry.cc, midiChannel: entry.channel }),
    })
  );
}
