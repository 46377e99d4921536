/** A structured command ready for execution. Never a shell string. */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
