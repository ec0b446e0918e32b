/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer for running the structure stages
 * with progress tracking.
 */

export {
  type Progress,
  type ProgressEvent,
  type StepName,
  nullProgress,
  createConsoleProgress,
  createCallbackProgress,
  formatStepName,
} from "./types";

export {
  convertDocument,
  type ConvertOptions,
  type ConversionResult,
} from "./convert-document";

export {
  spansNode,
  linesNode,
  footnotesNode,
  blocksNode,
  captionsNode,
  placedBlocksNode,
  treeNode,
  manifestNode,
} from "./nodes";
