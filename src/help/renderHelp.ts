import type { Arg } from '../args/arg';

export type ProgramInfo = {
  name: string;
  author: string;
  version: string;
  copyright: string;
  info: string;
  usage: string;
};

function section(title: string, lines: string[]): string {
  if (lines.length === 0) return '';
  return `\n${title}:\n${lines.join('')}`;
}

export function renderVersionLine(program: ProgramInfo): string {
  return `${program.name} ${program.version}\n`;
}

/**
 * Help dialog text. Entries keep the order in which `args` lists them
 * (registration order for a parser).
 */
export function renderHelp(program: ProgramInfo, args: Iterable<Arg>): string {
  const flags: string[] = [];
  const options: string[] = [];
  const words: string[] = [];

  for (const arg of args) {
    switch (arg.kind.kind) {
      case 'flag':
        flags.push(`\t-${arg.shortName}, --${arg.name}\t${arg.helpText}\n`);
        break;
      case 'option':
        options.push(`\t-${arg.shortName}, --${arg.name}\t${arg.helpText}\n`);
        break;
      case 'word':
        words.push(`\t${arg.name}\t${arg.helpText}\n`);
        break;
      default:
        break;
    }
  }

  let out = `${program.name} ${program.version}\n${program.author}\n${program.info}\n${program.copyright}\n`;
  out += `\nUsage:\n\t${program.usage}\n`;
  out += section('Flags', flags);
  out += section('Options', options);
  out += section('Words', words);
  return out;
}
