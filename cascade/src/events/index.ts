export { CascadeEventEmitter } from "./emitter.js";
