export const EXIT_OK = 0;
export const EXIT_USAGE = 1;

/**
 * Result of walking a token vector.
 *
 * Everything except `ok` is a point where a command-line program would stop:
 * the parser either prints and exits (`parseVec`) or hands the outcome back
 * (`parseTokens`) so the caller decides.
 */
export type ParseOutcome =
  | { kind: 'ok' }
  | { kind: 'help'; exitCode: number }
  | { kind: 'version'; exitCode: number }
  | { kind: 'unexpected'; token: string; exitCode: number }
  | { kind: 'missing'; name: string; exitCode: number }
  | { kind: 'empty'; exitCode: number };

/** Where a parser writes text and how it terminates. */
export interface ParserIo {
  stdout(text: string): void;
  stderr(text: string): void;
  exit(code: number): never;
}

export const processIo: ParserIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  exit: (code) => process.exit(code),
};

export function isTerminal(outcome: ParseOutcome): outcome is Exclude<ParseOutcome, { kind: 'ok' }> {
  return outcome.kind !== 'ok';
}
