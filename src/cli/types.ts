/**
 * Shared types for CLI commands.
 */

/** Flag (with its value placeholder) → one-line description */
export type CommandOptions = Readonly<Record<string, string>>;

export interface Command {
  readonly name: string;
  readonly description: string;
  readonly usage: string;
  /** Listed under "Options:" by `studyrag <command> --help` */
  readonly options?: CommandOptions;
  /** Throws UsageError for bad arguments; other errors exit 1 */
  handler(args: string[]): Promise<void>;
}
