/**
 * A structured command ready for execution.
 * Package-manager adapters never build raw command strings; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
