import { randomUUID } from "crypto";
import { z } from "zod";
import { createMidiMapping } from "../mapping/midiMapping";
import type { MidiMapping } from "../mapping/midiMapping";
import { COMPONENT_KINDS, describeKind } from "./componentTypes";
import type { ComponentKind, ComponentSize } from "./componentTypes";

/** Styles visuels connus. Le style est un champ explicite de l'enregistrement. */
export const COMPONENT_STYLES = ["Minimal", "Neumorphic", "Dotted"] as const;
export type ComponentStyle = (typeof COMPONENT_STYLES)[number];

export const DEFAULT_STYLE: ComponentStyle = "Minimal";
export const DEFAULT_COLOR = "#FFFFFF";

export interface ComponentCustomization {
  label: string;
  color: string;
  scale: number;
}

export interface Point {
  x: number;
  y: number;
}

/** Contrôle placé sur le canvas, avec sa liaison MIDI. */
export interface CanvasComponent {
  id: string;
  kind: ComponentKind;
  position: Point;
  size: ComponentSize;
  midiMapping: MidiMapping;
  customization: ComponentCustomization;
  style: ComponentStyle;
}

const rangeMappingSchema = z.object({
  inputLow: z.number(),
  inputHigh: z.number(),
  outputLow: z.number().int(),
  outputHigh: z.number().int(),
});

const midiMappingSchema = z.object({
  ccNumber: z.number().int(),
  midiChannel: z.number().int(),
  noteNumber: z.number().int().nullish(),
  rangeMapping: rangeMappingSchema.optional(),
});

const customizationSchema = z.object({
  label: z.string(),
  color: z.string().default(DEFAULT_COLOR),
  scale: z.number().default(1),
});

/**
 * Schéma de l'enregistrement persisté d'un composant (champs à plat pour position/taille).
 * `style` absent ou inconnu → "Minimal" (fichiers antérieurs au champ).
 */
export const componentRecordSchema = z.object({
  id: z.string().min(1),
  type: z.enum(COMPONENT_KINDS),
  positionX: z.number(),
  positionY: z.number(),
  sizeWidth: z.number(),
  sizeHeight: z.number(),
  midiMapping: midiMappingSchema,
  customization: customizationSchema.optional(),
  style: z.enum(COMPONENT_STYLES).optional().catch(undefined),
});

export type ComponentRecordInput = z.input<typeof componentRecordSchema>;

/** Forme écrite sur disque: tous les champs explicites. */
export interface ComponentRecord {
  id: string;
  type: ComponentKind;
  positionX: number;
  positionY: number;
  sizeWidth: number;
  sizeHeight: number;
  midiMapping: {
    ccNumber: number;
    midiChannel: number;
    noteNumber?: number;
    rangeMapping: { inputLow: number; inputHigh: number; outputLow: number; outputHigh: number };
  };
  customization: ComponentCustomization;
  style: ComponentStyle;
}

/**
 * Erreur de décodage d'un enregistrement persisté. `issues` liste les champs fautifs.
 */
export class RecordDecodeError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(`${message}: ${issues.join("; ")}`);
    this.name = "RecordDecodeError";
  }
}

function formatIssues(err: z.ZodError): string[] {
  return err.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(racine)"}: ${i.message}`);
}

function isComponentStyle(value: string): value is ComponentStyle {
  return COMPONENT_STYLES.some((s) => s === value);
}

/**
 * Lit l'ancien encodage "STYLE:<style>|<label>" (shim de migration, jamais réécrit).
 * Sans préfixe, retombe sur la présence des noms de style dans le libellé.
 *
 * {@link decodeComponentRecord} ne l'appelle que pour un libellé préfixé par "STYLE:" et sans
 * champ `style`: un libellé comme "Neumorphic Knob" y reste en style par défaut. Le repli sur
 * les noms de style ne sert qu'aux appels directs.
 */
export function parseLegacyLabel(label: string): { style?: ComponentStyle; label: string } {
  if (label.startsWith("STYLE:")) {
    const [head, ...rest] = label.split("|");
    const style = head.slice("STYLE:".length);
    const cleaned = rest.join("|");
    return isComponentStyle(style) ? { style, label: cleaned } : { label: cleaned };
  }
  if (label.includes("Neumorphic")) return { style: "Neumorphic", label };
  if (label.includes("Dotted")) return { style: "Dotted", label };
  if (label.includes("Minimal")) return { style: "Minimal", label };
  return { label };
}

/**
 * Valide et convertit un enregistrement persisté en composant.
 * @throws RecordDecodeError si l'enregistrement est invalide
 */
export function decodeComponentRecord(input: unknown): CanvasComponent {
  const parsed = componentRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new RecordDecodeError("Enregistrement de composant invalide", formatIssues(parsed.error));
  }
  const rec = parsed.data;
  const info = describeKind(rec.type);
  const mm = rec.midiMapping;

  let label = rec.customization?.label ?? info.displayName;
  let style = rec.style;
  if (style === undefined && label.startsWith("STYLE:")) {
    const legacy = parseLegacyLabel(label);
    label = legacy.label;
    style = legacy.style;
  }

  return {
    id: rec.id,
    kind: rec.type,
    position: { x: rec.positionX, y: rec.positionY },
    size: { width: rec.sizeWidth, height: rec.sizeHeight },
    midiMapping: createMidiMapping({
      ccNumber: mm.ccNumber,
      midiChannel: mm.midiChannel,
      noteNumber: mm.noteNumber ?? undefined,
      rangeMapping: mm.rangeMapping,
    }),
    customization: {
      label,
      color: rec.customization?.color ?? DEFAULT_COLOR,
      scale: rec.customization?.scale ?? 1,
    },
    style: style ?? DEFAULT_STYLE,
  };
}

/**
 * Décode une liste d'enregistrements (layout complet). Les erreurs sont préfixées par l'index.
 * @throws RecordDecodeError
 */
export function decodeComponentList(input: unknown): CanvasComponent[] {
  if (!Array.isArray(input)) {
    throw new RecordDecodeError("Layout invalide", ["(racine): tableau attendu"]);
  }
  return input.map((item: unknown, index) => {
    try {
      return decodeComponentRecord(item);
    } catch (err) {
      if (err instanceof RecordDecodeError) {
        throw new RecordDecodeError(`Composant #${index} invalide`, err.issues);
      }
      throw err;
    }
  });
}

/** Sérialise un composant au format persisté (style toujours explicite). */
export function encodeComponentRecord(c: CanvasComponent): ComponentRecord {
  const rm = c.midiMapping.rangeMapping;
  const midiMapping: ComponentRecord["midiMapping"] = {
    ccNumber: c.midiMapping.ccNumber,
    midiChannel: c.midiMapping.midiChannel,
    rangeMapping: { inputLow: rm.inputLow, inputHigh: rm.inputHigh, outputLow: rm.outputLow, outputHigh: rm.outputHigh },
  };
  if (c.midiMapping.noteNumber !== undefined) midiMapping.noteNumber = c.midiMapping.noteNumber;
  return {
    id: c.id,
    type: c.kind,
    positionX: c.position.x,
    positionY: c.position.y,
    sizeWidth: c.size.width,
    sizeHeight: c.size.height,
    midiMapping,
    customization: { ...c.customization },
    style: c.style,
  };
}

export interface CreateComponentOptions {
  id?: string;
  position?: Point;
  style?: ComponentStyle;
  midiMapping?: MidiMapping;
  label?: string;
  scale?: number;
}

/**
 * Crée un composant avec les valeurs par défaut du type (taille, libellé, CC 1 canal 1).
 */
export function createComponent(kind: ComponentKind, opts: CreateComponentOptions = {}): CanvasComponent {
  const info = describeKind(kind);
  return {
    id: opts.id ?? randomUUID(),
    kind,
    position: opts.position ?? { x: 200, y: 200 },
    size: info.defaultSize,
    midiMapping: opts.midiMapping ?? createMidiMapping(),
    customization: { label: opts.label ?? info.displayName, color: DEFAULT_COLOR, scale: opts.scale ?? 1 },
    style: opts.style ?? DEFAULT_STYLE,
  };
}
