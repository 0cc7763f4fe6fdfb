import { Arg, ArgDeclarationError } from '../args/arg';
import { flagKind, optionKind, wordBoolean, wordKind, wordString, type ArgKind, type WordValue } from '../args/kinds';
import { renderHelp, renderVersionLine, type ProgramInfo } from '../help/renderHelp';
import { EXIT_OK, EXIT_USAGE, isTerminal, processIo, type ParseOutcome, type ParserIo } from './outcome';

export type ArgParserOptions = {
  /** Defaults to the real process streams and `process.exit`. */
  io?: ParserIo;
};

export type ArgEntry = {
  name: string;
  short: string;
  kind: ArgKind;
  required: boolean;
  set: boolean;
};

const HELP = 'help';
const VERSION = 'version';
const HELP_SHORT = 'h';
const VERSION_SHORT = 'v';

function takesValue(next: string | undefined): next is string {
  return next !== undefined && !next.startsWith('-');
}

/**
 * Registry of argument declarations plus the program metadata shown in help.
 *
 * Tokens are recognized in this order: bare word names, `--long`, then
 * `-abc` clusters. Anything else is ignored.
 */
export class ArgParser {
  private readonly registry = new Map<string, Arg>();
  private readonly program: ProgramInfo;
  private readonly io: ParserIo;
  private requireArgsValue = false;

  constructor(programName: string, options: ArgParserOptions = {}) {
    this.io = options.io ?? processIo;
    this.program = {
      name: programName,
      author: '',
      version: '',
      copyright: '',
      info: '',
      usage: `${programName} [flags] [options]`,
    };

    this.args([
      new Arg(HELP).short(HELP_SHORT).help('Prints the help dialog').flag(false),
      new Arg(VERSION).short(VERSION_SHORT).help('Prints the version').flag(false),
    ]);
  }

  name(name: string): this {
    this.program.name = name;
    return this;
  }

  author(author: string): this {
    this.program.author = author;
    return this;
  }

  version(version: string): this {
    this.program.version = version;
    return this;
  }

  copyright(copyright: string): this {
    this.program.copyright = copyright;
    return this;
  }

  info(info: string): this {
    this.program.info = info;
    return this;
  }

  usage(usage: string): this {
    this.program.usage = usage;
    return this;
  }

  /** When set, an empty token vector prints help and fails. */
  requireArgs(require: boolean): this {
    this.requireArgsValue = require;
    return this;
  }

  get programInfo(): Readonly<ProgramInfo> {
    return { ...this.program };
  }

  arg(arg: Arg): this {
    if (arg.kind.kind === 'unknown') {
      throw new ArgDeclarationError(`Arg "${arg.name}" has no kind; call flag(), option() or word() before registering it`);
    }
    this.registry.set(arg.name, arg.clone());
    return this;
  }

  args(args: Iterable<Arg>): this {
    for (const arg of args) this.arg(arg);
    return this;
  }

  /** Parses the current process's arguments (everything after the runtime and script path). */
  parse(): this {
    return this.parseVec(process.argv.slice(2));
  }

  /** Parses tokens that no longer include the program name; exits through the parser's io on any terminal outcome. */
  parseVec(tokens: readonly string[]): this {
    const outcome = this.parseTokens(tokens);
    if (isTerminal(outcome)) this.io.exit(this.report(outcome));
    return this;
  }

  parseTokens(tokens: readonly string[]): ParseOutcome {
    if (tokens.length === 0 && this.requireArgsValue) return { kind: 'empty', exitCode: EXIT_USAGE };

    for (let idx = 0; idx < tokens.length; idx++) {
      const token = tokens[idx];
      const next = tokens[idx + 1];

      const word = this.registry.get(token);
      if (word && word.kind.kind === 'word') {
        this.applyWord(word, word.kind.value, next);
        continue;
      }

      if (token.startsWith('--')) {
        const outcome = this.applyLong(token.slice(2), next);
        if (isTerminal(outcome)) return outcome;
      } else if (token.startsWith('-')) {
        const outcome = this.applyCluster(token.slice(1), next);
        if (isTerminal(outcome)) return outcome;
      }
    }

    for (const arg of this.registry.values()) {
      if (arg.isRequired && !arg.isSet) return { kind: 'missing', name: arg.name, exitCode: EXIT_USAGE };
    }
    return { kind: 'ok' };
  }

  /** Writes what an outcome calls for and returns its exit code. Never exits. */
  report(outcome: ParseOutcome): number {
    switch (outcome.kind) {
      case 'ok':
        return EXIT_OK;
      case 'version':
        this.io.stdout(renderVersionLine(this.program));
        return outcome.exitCode;
      case 'unexpected':
        this.io.stderr(`Unexpected argument: "${outcome.token}"\n`);
        break;
      case 'missing':
        this.io.stdout(`Didn't find "${outcome.name}"\n\n`);
        break;
      case 'help':
      case 'empty':
        break;
    }
    this.printHelp();
    return outcome.exitCode;
  }

  private applyWord(arg: Arg, word: WordValue, next: string | undefined): void {
    if (word.kind === 'boolean') {
      arg.setKind(wordKind(wordBoolean(!word.value)));
      arg.markSet();
    } else if (takesValue(next)) {
      arg.setKind(wordKind(wordString(next)));
      arg.markSet();
    }
  }

  private applyLong(name: string, next: string | undefined): ParseOutcome {
    if (name === HELP) return { kind: 'help', exitCode: EXIT_OK };
    if (name === VERSION) return { kind: 'version', exitCode: EXIT_OK };

    const arg = this.registry.get(name);
    if (!arg) return { kind: 'unexpected', token: `--${name}`, exitCode: EXIT_USAGE };

    if (arg.kind.kind === 'flag') {
      arg.setKind(flagKind(!arg.kind.value));
      arg.markSet();
    } else if (arg.kind.kind === 'option' && takesValue(next)) {
      arg.setKind(optionKind(next));
      arg.markSet();
    }
    return { kind: 'ok' };
  }

  private applyCluster(cluster: string, next: string | undefined): ParseOutcome {
    for (const ch of cluster) {
      if (ch === HELP_SHORT) return { kind: 'help', exitCode: EXIT_OK };
      if (ch === VERSION_SHORT) return { kind: 'version', exitCode: EXIT_OK };

      // Every arg sharing this short is applied.
      for (const arg of this.registry.values()) {
        if (arg.shortName !== ch) continue;
        if (arg.kind.kind === 'flag') {
          arg.setKind(flagKind(!arg.kind.value));
          arg.markSet();
        } else if (arg.kind.kind === 'option' && next !== undefined) {
          if (!takesValue(next)) return { kind: 'unexpected', token: next, exitCode: EXIT_USAGE };
          arg.setKind(optionKind(next));
          arg.markSet();
        }
      }
    }
    return { kind: 'ok' };
  }

  getFlag(name: string): boolean | undefined {
    const kind = this.registry.get(name)?.kind;
    return kind?.kind === 'flag' ? kind.value : undefined;
  }

  getOption(name: string): string | undefined {
    const kind = this.registry.get(name)?.kind;
    return kind?.kind === 'option' ? kind.value : undefined;
  }

  getWord(name: string): WordValue | undefined {
    const kind = this.registry.get(name)?.kind;
    return kind?.kind === 'word' ? { ...kind.value } : undefined;
  }

  /** Whether parsing saw `name` in its input; undefined for names never registered. */
  wasSet(name: string): boolean | undefined {
    return this.registry.get(name)?.isSet;
  }

  snapshot(): ArgEntry[] {
    return Array.from(this.registry.values(), (arg) => ({
      name: arg.name,
      short: arg.shortName,
      kind: arg.clone().kind,
      required: arg.isRequired,
      set: arg.isSet,
    }));
  }

  helpText(): string {
    return renderHelp(this.program, this.registry.values());
  }

  printHelp(): void {
    this.io.stdout(this.helpText());
  }
}
