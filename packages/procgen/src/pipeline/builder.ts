/**
 * Type-safe pipeline builder DSL.
 *
 * Composes passes into pipelines with compile-time checking of artifact
 * flow: each `pipe` only accepts a pass whose input is the previous output.
 */

import type { Pass, PassContext, Pipeline, PipelineResult } from "./types";

type Runner<TStart, TCurrent> = (input: TStart, ctx: PassContext) => TCurrent;

/**
 * Run one pass between trace start/end events
 */
function runPass<TIn, TOut>(
  pass: Pass<TIn, TOut>,
  input: TIn,
  ctx: PassContext,
): TOut {
  ctx.trace.start(pass.id);
  const stepStart = performance.now();
  const output = pass.run(input, ctx);
  ctx.trace.end(pass.id, performance.now() - stepStart);
  return output;
}

/**
 * Pipeline builder for composing passes.
 *
 * Type parameters:
 * - TStart: The input artifact type for the pipeline
 * - TCurrent: The current output artifact type (evolves as passes are added)
 */
export class PipelineBuilder<TStart, TCurrent> {
  private constructor(
    private readonly id: string,
    private readonly runner: Runner<TStart, TCurrent>,
    private readonly passIds: readonly string[],
  ) {}

  /**
   * Create a new pipeline builder
   */
  static create<TStart>(id: string): PipelineBuilder<TStart, TStart> {
    return new PipelineBuilder<TStart, TStart>(id, (input) => input, []);
  }

  /**
   * Add a pass to the pipeline
   */
  pipe<TNext>(pass: Pass<TCurrent, TNext>): PipelineBuilder<TStart, TNext> {
    const previous = this.runner;
    return new PipelineBuilder<TStart, TNext>(
      this.id,
      (input, ctx) => runPass(pass, previous(input, ctx), ctx),
      [...this.passIds, pass.id],
    );
  }

  /**
   * Build the final pipeline
   */
  build(): Pipeline<TStart, TCurrent> {
    const runner = this.runner;

    return {
      id: this.id,
      passIds: this.passIds,

      run(input: TStart, ctx: PassContext): PipelineResult<TCurrent> {
        const startTime = performance.now();
        const artifact = runner(input, ctx);
        return { artifact, durationMs: performance.now() - startTime };
      },
    };
  }
}

/**
 * Convenience function to create a pipeline
 */
export function createPipeline<TStart>(
  id: string,
): PipelineBuilder<TStart, TStart> {
  return PipelineBuilder.create<TStart>(id);
}
