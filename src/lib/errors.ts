// src/lib/errors.ts
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Upload is not usable tabular data. Surfaced to the user as a 4xx. */
export class ParseError extends PipelineError {}

/** The suggestion service failed; recovered locally. */
export class AIServiceError extends PipelineError {}

/** A figure could not be serialized; the chart is dropped. */
export class RenderError extends PipelineError {}
