/**
 * Stage reporting for the docs pipeline. Messages are single lines; the
 * reporter decides how to decorate them.
 */
export interface ProgressReporter {
  /** Opens a group of steps such as "Generating diagrams". */
  section(title: string): void;
  start(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
  /** Something in the schema the diagrams draw around instead of rejecting. */
  warn(message: string): void;
  info(message: string): void;
}

const ignore = (_message: string): void => undefined;

/** Reporter for library callers that want no output. */
export class SilentProgress implements ProgressReporter {
  readonly section = ignore;
  readonly start = ignore;
  readonly succeed = ignore;
  readonly fail = ignore;
  readonly warn = ignore;
  readonly info = ignore;
}
