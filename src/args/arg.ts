import { flagKind, optionKind, UNKNOWN_KIND, wordKind, type ArgKind, type WordValue } from './kinds';

/** Thrown for declarations the host program got wrong (never for user input). */
export class ArgDeclarationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgDeclarationError';
  }
}

/**
 * One recognized command-line argument.
 *
 * Built by the host with chained calls, e.g.
 * `new Arg('output').short('o').help('Where to write').option('out.txt')`,
 * then handed to a parser, which keeps its own copy and updates it while parsing.
 */
export class Arg {
  readonly name: string;
  private shortChar: string;
  private helpValue = '';
  private kindValue: ArgKind = UNKNOWN_KIND;
  private requiredValue = false;
  private setValue = false;

  constructor(name: string) {
    if (name.length === 0) throw new ArgDeclarationError('Arg names cannot be empty');
    this.name = name;
    this.shortChar = Array.from(name)[0] ?? name;
  }

  get shortName(): string {
    return this.shortChar;
  }

  get helpText(): string {
    return this.helpValue;
  }

  get kind(): ArgKind {
    return this.kindValue;
  }

  get isRequired(): boolean {
    return this.requiredValue;
  }

  /** True once a parser has seen this argument in its input. */
  get isSet(): boolean {
    return this.setValue;
  }

  flag(defaultValue: boolean): this {
    this.kindValue = flagKind(defaultValue);
    return this;
  }

  option(defaultValue: string): this {
    this.kindValue = optionKind(defaultValue);
    return this;
  }

  word(defaultValue: WordValue): this {
    this.kindValue = wordKind(defaultValue);
    return this;
  }

  help(text: string): this {
    this.helpValue = text;
    return this;
  }

  short(char: string): this {
    if (Array.from(char).length !== 1) {
      throw new ArgDeclarationError(`Short name for "${this.name}" must be a single character, got "${char}"`);
    }
    this.shortChar = char;
    return this;
  }

  /** Parsing fails when a required argument never shows up in the input. */
  required(required = true): this {
    this.requiredValue = required;
    return this;
  }

  /** @internal */
  setKind(kind: ArgKind): void {
    this.kindValue = kind;
  }

  /** @internal */
  markSet(): void {
    this.setValue = true;
  }

  clone(): Arg {
    const copy = new Arg(this.name);
    copy.shortChar = this.shortChar;
    copy.helpValue = this.helpValue;
    copy.kindValue = cloneKind(this.kindValue);
    copy.requiredValue = this.requiredValue;
    return copy;
  }
}

function cloneKind(kind: ArgKind): ArgKind {
  return kind.kind === 'word' ? { kind: 'word', value: { ...kind.value } } : { ...kind };
}
