export {
  findInvisibleElements,
  removeInvisibleElements,
  invisibilityReason,
  hasExplicitSize,
} from "./invisible.js";
export type { InvisibleElement, InvisibleReason } from "./invisible.js";
