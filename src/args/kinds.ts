/** Value carried by a word argument: toggled like a flag, or filled like an option. */
export type WordValue =
  | { kind: 'boolean'; value: boolean }
  | { kind: 'string'; value: string };

/**
 * What an argument is and the value it currently holds.
 * `unknown` only exists between `new Arg(...)` and the call that gives it a real kind.
 */
export type ArgKind =
  | { kind: 'unknown' }
  | { kind: 'flag'; value: boolean }
  | { kind: 'option'; value: string }
  | { kind: 'word'; value: WordValue };

export const UNKNOWN_KIND: ArgKind = { kind: 'unknown' };

export function wordBoolean(value: boolean): WordValue {
  return { kind: 'boolean', value };
}

export function wordString(value: string): WordValue {
  return { kind: 'string', value };
}

export function wordAsBoolean(word: WordValue): boolean | undefined {
  return word.kind === 'boolean' ? word.value : undefined;
}

export function wordAsString(word: WordValue): string | undefined {
  return word.kind === 'string' ? word.value : undefined;
}

export function flagKind(value: boolean): ArgKind {
  return { kind: 'flag', value };
}

export function optionKind(value: string): ArgKind {
  return { kind: 'option', value };
}

export function wordKind(value: WordValue): ArgKind {
  return { kind: 'word', value };
}
