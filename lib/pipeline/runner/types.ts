/**
 * Runner layer types.
 *
 * These interfaces define the contract between the pure structure stages
 * and whoever is watching them run (CLI console, a test, a job callback).
 */

import type { Diagnostic } from "../diagnostics";

// ============================================================================
// Progress Interface
// ============================================================================

export type StepName =
  | "extract"
  | "lines"
  | "footnotes"
  | "blocks"
  | "captions"
  | "tree"
  | "manifest"
  | "render";

export type ProgressEvent =
  | { type: "step-start"; step: StepName }
  | { type: "step-progress"; step: StepName; message: string; page?: number; totalPages?: number }
  | { type: "step-complete"; step: StepName; count?: number }
  | { type: "step-error"; step: StepName; error: string }
  | { type: "diagnostic"; diagnostic: Diagnostic };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, collect events in a test, forward to a callback, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "step-start":
          console.log(`Starting ${formatStepName(event.step)}...`);
          break;
        case "step-progress":
          if (event.page !== undefined && event.totalPages !== undefined) {
            console.log(`${formatStepName(event.step)}: ${event.message} (${event.page}/${event.totalPages})`);
          } else {
            console.log(`${formatStepName(event.step)}: ${event.message}`);
          }
          break;
        case "step-complete":
          console.log(
            event.count === undefined
              ? `Completed ${formatStepName(event.step)}`
              : `Completed ${formatStepName(event.step)} (${event.count})`
          );
          break;
        case "step-error":
          console.error(`Error in ${formatStepName(event.step)}: ${event.error}`);
          break;
        case "diagnostic":
          if (event.diagnostic.severity === "warning") {
            console.warn(`Warning [${event.diagnostic.category}]: ${event.diagnostic.message}`);
          } else {
            console.log(`Info [${event.diagnostic.category}]: ${event.diagnostic.message}`);
          }
          break;
      }
    },
  };
}

/**
 * Callback-based progress emitter for embedding in another tool.
 */
export function createCallbackProgress(
  callback: (message: string) => void
): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "step-start":
          callback(`Starting ${formatStepName(event.step)}`);
          break;
        case "step-progress":
          if (event.page !== undefined && event.totalPages !== undefined) {
            callback(`${event.message} (${event.page}/${event.totalPages})`);
          } else {
            callback(event.message);
          }
          break;
        case "step-complete":
          callback(`Completed ${formatStepName(event.step)}`);
          break;
        case "step-error":
          callback(`Error: ${event.error}`);
          break;
        case "diagnostic":
          callback(`${event.diagnostic.category}: ${event.diagnostic.message}`);
          break;
      }
    },
  };
}

export function formatStepName(step: StepName): string {
  switch (step) {
    case "extract":
      return "span extraction";
    case "lines":
      return "line merging";
    case "footnotes":
      return "footnote detection";
    case "blocks":
      return "block assembly";
    case "captions":
      return "caption binding";
    case "tree":
      return "section tree";
    case "manifest":
      return "manifest";
    case "render":
      return "section rendering";
  }
}
