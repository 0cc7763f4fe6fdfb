import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import type { ArgKind } from '../args/kinds';
import type { ArgParser } from '../parser/argParser';
import { stableStringify } from './deterministicJson';

export type ResolvedKind = 'flag' | 'option' | 'word-boolean' | 'word-string';

export type ResolvedValue = {
  kind: ResolvedKind;
  value: boolean | string;
  set: boolean;
};

export type ResolvedValues = {
  schema: 'resolved-args-v1';
  program: { name: string; version: string };
  values: Record<string, ResolvedValue>;
};

function describeKind(kind: ArgKind): Omit<ResolvedValue, 'set'> | undefined {
  switch (kind.kind) {
    case 'flag':
      return { kind: 'flag', value: kind.value };
    case 'option':
      return { kind: 'option', value: kind.value };
    case 'word':
      return kind.value.kind === 'boolean'
        ? { kind: 'word-boolean', value: kind.value.value }
        : { kind: 'word-string', value: kind.value.value };
    case 'unknown':
      return undefined;
  }
}

/** Every registered argument's current value, keyed by long name. */
export function resolvedValues(parser: ArgParser): ResolvedValues {
  const values: Record<string, ResolvedValue> = {};
  for (const entry of parser.snapshot()) {
    const described = describeKind(entry.kind);
    if (described) values[entry.name] = { ...described, set: entry.set };
  }
  const { name, version } = parser.programInfo;
  return { schema: 'resolved-args-v1', program: { name, version }, values };
}

export function serializeResolvedValues(doc: ResolvedValues): string {
  return stableStringify(doc);
}

export async function writeResolvedValuesFile(filePath: string, doc: ResolvedValues): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeResolvedValues(doc), 'utf8');
}
