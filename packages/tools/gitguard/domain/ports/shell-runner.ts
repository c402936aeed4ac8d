// Shell runner port - interface for running plan commands

/**
 * Options for running a command string.
 */
export type ShellOptions = {
  readonly cwd?: string;
};

/**
 * Captured result of a command string.
 */
export type ShellResult = {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
};

/**
 * Runs one command string through the shell. Rejects only when the
 * process could not be started.
 */
export interface ShellRunner {
  run(command: string, options?: ShellOptions): Promise<ShellResult>;
}
