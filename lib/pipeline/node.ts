import { Observable, shareReplay } from "rxjs";
import type { StructureConfig } from "../config";
import type { DocumentInput } from "./core/types";
import { Diagnostics } from "./diagnostics";
import { NumberingProcessor } from "./headings/numbering";
import type { Progress } from "./runner/types";
import { nullProgress } from "./runner/types";
import { SlugAllocator } from "./slug";

/**
 * Everything one document run shares. The numbering processor, slug
 * allocator and diagnostics are created per context and never reused
 * for another document.
 */
export interface PipelineContext {
  label: string;
  input: DocumentInput;
  config: StructureConfig;
  diagnostics: Diagnostics;
  numbering: NumberingProcessor;
  slugs: SlugAllocator;
  progress: Progress;
}

export interface Node<T> {
  readonly name: string;
  resolve(ctx: PipelineContext): Observable<T>;
}

/**
 * Define a pipeline node. The observable is built once per context and
 * replayed to every later subscriber, so a node feeding several others runs once.
 */
export function defineNode<T>(config: {
  name: string;
  resolve: (ctx: PipelineContext) => Observable<T>;
}): Node<T> {
  const cache = new WeakMap<PipelineContext, Observable<T>>();
  return {
    name: config.name,
    resolve(ctx: PipelineContext): Observable<T> {
      const cached = cache.get(ctx);
      if (cached) return cached;

      const obs = config.resolve(ctx).pipe(shareReplay({ bufferSize: 1, refCount: false }));
      cache.set(ctx, obs);
      return obs;
    },
  };
}

export function createContext(
  label: string,
  options: {
    input: DocumentInput;
    config: StructureConfig;
    progress?: Progress;
  }
): PipelineContext {
  const { config } = options;
  const diagnostics = new Diagnostics(config.numbering_fail_on);
  return {
    label,
    input: options.input,
    config,
    diagnostics,
    numbering: new NumberingProcessor(
      {
        validateGaps: config.numbering_validate_gaps,
        allowChapterResets: config.numbering_allow_chapter_resets,
        maxDepth: config.numbering_max_depth,
        appendixRequiresPageBreak: config.appendix_requires_page_break,
      },
      diagnostics
    ),
    slugs: new SlugAllocator(config.slug_prefix_width),
    progress: options.progress ?? nullProgress,
  };
}

/**
 * Resolve a node whose observable completes during subscription. Every
 * structure stage is synchronous; a node that would emit later is an error.
 */
export function resolveNodeSync<T>(node: Node<T>, ctx: PipelineContext): T {
  const state: {
    emitted?: { value: T };
    failed?: { error: unknown };
    completed: boolean;
  } = { completed: false };

  const subscription = node.resolve(ctx).subscribe({
    next(v) {
      state.emitted = { value: v };
    },
    error(err: unknown) {
      state.failed = { error: err };
    },
    complete() {
      state.completed = true;
    },
  });
  subscription.unsubscribe();

  if (state.failed) throw state.failed.error;
  if (!state.completed) {
    throw new Error(`Node "${node.name}" did not complete synchronously (${ctx.label})`);
  }
  if (!state.emitted) {
    throw new Error(`Node "${node.name}" completed without emitting a value (${ctx.label})`);
  }
  return state.emitted.value;
}
