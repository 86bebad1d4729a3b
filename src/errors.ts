/**
 * Error types raised by the writer
 */

export class GrisuWriterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The output file cannot be opened for writing; fatal for the run */
export class OutputOpenError extends GrisuWriterError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Error opening output file: ${path}`, options);
    this.path = path;
  }
}

/** Extended shower info needs an atmosphere model */
export class AtmosphereRequiredError extends GrisuWriterError {
  constructor() {
    super("Extended shower info requires an atmosphere model (atmosphere id >= 0)");
  }
}

/** No atmosphere model with this id */
export class UnknownAtmosphereError extends GrisuWriterError {
  readonly modelId: number;

  constructor(modelId: number) {
    super(`Unknown atmosphere model: ${modelId}`);
    this.modelId = modelId;
  }
}

/** The input record document is malformed */
export class InputFormatError extends GrisuWriterError {
  readonly path: string;

  constructor(path: string, expected: string) {
    super(`Invalid input at ${path}: expected ${expected}`);
    this.path = path;
  }
}
