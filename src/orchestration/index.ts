export {
  type ReorderError,
  applyReorder,
} from "./orchestrator.js";
export { limitLevels } from "./report-transforms.js";
