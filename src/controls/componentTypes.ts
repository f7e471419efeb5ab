/**
 * Types de contrôles tactiles disponibles sur le canvas.
 * Les identifiants sont ceux des enregistrements persistés; ne pas les renommer.
 */
export const COMPONENT_KINDS = [
  "knobMinimal1",
  "sliderMinimal1",
  "xyPadMinimal1",
  "drumPadMinimal1",
  "toggleButtonNeumorphic1",
  "gyroMinimal",
] as const;

export type ComponentKind = (typeof COMPONENT_KINDS)[number];

export interface ComponentSize {
  width: number;
  height: number;
}

export interface ComponentKindInfo {
  displayName: string;
  defaultSize: ComponentSize;
}

const KIND_INFO: Record<ComponentKind, ComponentKindInfo> = {
  knobMinimal1: { displayName: "Minimal Knob", defaultSize: { width: 80, height: 80 } },
  sliderMinimal1: { displayName: "Minimal Slider", defaultSize: { width: 150, height: 50 } },
  xyPadMinimal1: { displayName: "XY Pad", defaultSize: { width: 180, height: 180 } },
  drumPadMinimal1: { displayName: "Drum Pad", defaultSize: { width: 100, height: 100 } },
  toggleButtonNeumorphic1: { displayName: "Toggle Button", defaultSize: { width: 80, height: 80 } },
  gyroMinimal: { displayName: "Gyroscope", defaultSize: { width: 120, height: 120 } },
};

export function describeKind(kind: ComponentKind): ComponentKindInfo {
  const info = KIND_INFO[kind];
  return { displayName: info.displayName, defaultSize: { ...info.defaultSize } };
}
