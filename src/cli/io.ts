/**
 * Where CLI commands write. Defaults to the console; tests pass a
 * collector.
 */
export interface CliOutput {
  log(line?: string): void;
  error(line: string): void;
}

export const consoleOutput: CliOutput = {
  log: (line = '') => console.log(line),
  error: (line) => console.error(line),
};
