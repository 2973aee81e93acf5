import type { CascadeOptions, Transform } from "../types/index.js";
import type { CascadeEventEmitter } from "../events/emitter.js";
import { ExternalStylesheetTransform } from "./external-stylesheet.js";
import { CascadeTransform } from "./cascade-transform.js";
import { InvisibleElementTransform } from "./invisible-transform.js";

export { ExternalStylesheetTransform } from "./external-stylesheet.js";
export { CascadeTransform } from "./cascade-transform.js";
export { InvisibleElementTransform } from "./invisible-transform.js";
export { TransformRegistry } from "./registry.js";

export interface PhaseSelection {
  linkCss: boolean;
  inlineCss: boolean;
  removeInvisible: boolean;
}

export interface PhaseConfig {
  basePath?: string;
  options?: Partial<CascadeOptions>;
  emitter?: CascadeEventEmitter;
}

/** The selected phases, in the order they must run. */
export function documentPhases(selection: PhaseSelection, config: PhaseConfig = {}): Transform[] {
  const phases: Transform[] = [];
  if (selection.linkCss) {
    phases.push(new ExternalStylesheetTransform(config.basePath, config.emitter));
  }
  if (selection.inlineCss) {
    phases.push(new CascadeTransform(config.options, config.emitter));
  }
  if (selection.removeInvisible) {
    phases.push(new InvisibleElementTransform(config.options, config.emitter));
  }
  return phases;
}
