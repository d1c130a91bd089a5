/**
 * Fatal pipeline conditions. Recoverable gaps (missing codebook entries,
 * out-of-domain bucket values) never surface as errors; they show up as
 * unlabeled dimensions, fallback labels and diagnostics instead.
 */
export abstract class PipelineError extends Error {
  readonly fatal = true;

  constructor(
    message: string,
    public readonly entity: string
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class MissingMeasureError extends PipelineError {
  constructor(measure: string) {
    super(`Required measure column "${measure}" is missing from the fact relation`, measure);
  }
}

export class MissingColumnError extends PipelineError {
  constructor(column: string) {
    super(`Column "${column}" is missing from the fact relation`, column);
  }
}

export class MalformedFactError extends PipelineError {
  constructor(
    message: string,
    public readonly rowIndex?: number
  ) {
    super(message, rowIndex === undefined ? 'fact' : `fact[${rowIndex}]`);
  }
}

export class MalformedCodebookError extends PipelineError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message, path);
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} ${id} not found`);
    this.name = 'NotFoundError';
  }
}
