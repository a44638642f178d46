/**
 * @weft/yoga
 *
 * Flexbox layout for @weft/core, backed by the yoga-layout npm package.
 */

export {
  createYogaLayoutEngine,
  toYogaMeasure,
  type YogaHandle,
  type YogaLayoutEngineOptions,
} from "./yogaEngine.js";
