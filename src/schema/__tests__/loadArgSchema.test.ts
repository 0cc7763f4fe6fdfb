import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { recordingIo } from '../../testing/recordingIo';
import { ArgSchemaError, loadArgSchemaFile, parserFromSchema, validateArgSchema, type ArgSchemaDocument } from '../loadArgSchema';

function sampleDocument(): ArgSchemaDocument {
  return {
    schema: 'arg-schema-v1',
    program: {
      name: 'deploy',
      version: '3.1.0',
      author: 'Ops Team',
      info: 'Ships builds',
      requireArgs: true,
    },
    args: [
      { name: 'dry-run', short: 'n', help: 'Do nothing', kind: 'flag', default: false },
      { name: 'target', help: 'Where to deploy', kind: 'option', default: 'staging', required: true },
      { name: 'rollback', kind: 'word', default: false },
      { name: 'tag', kind: 'word', default: '' },
    ],
  };
}

describe('argument schema', () => {
  test('accepts a well-formed document', () => {
    const doc = sampleDocument();
    expect(validateArgSchema(doc)).toBe(doc);
  });

  test.each([
    ['flag with a string default', { name: 'x', kind: 'flag', default: 'yes' }],
    ['option with a boolean default', { name: 'x', kind: 'option', default: true }],
    ['two-character short', { name: 'x', short: 'xy', kind: 'flag', default: false }],
    ['unknown kind', { name: 'x', kind: 'count', default: false }],
    ['missing default', { name: 'x', kind: 'flag' }],
  ])('rejects an arg with %s', (_label, arg) => {
    const doc = { ...sampleDocument(), args: [arg] };
    expect(() => validateArgSchema(doc)).toThrow(ArgSchemaError);
  });

  test('rejects a document without a program name', () => {
    expect(() => validateArgSchema({ schema: 'arg-schema-v1', program: {}, args: [] })).toThrow(
      /^Invalid argument schema: data\/program must have required property 'name'/,
    );
  });

  test('builds a parser carrying the declared args and metadata', () => {
    const io = recordingIo();
    const parser = parserFromSchema(sampleDocument(), { io });

    expect(parser.programInfo).toEqual({
      name: 'deploy',
      author: 'Ops Team',
      version: '3.1.0',
      copyright: '',
      info: 'Ships builds',
      usage: 'deploy [flags] [options]',
    });
    expect(parser.parseTokens([])).toEqual({ kind: 'empty', exitCode: 1 });
    expect(parser.parseTokens(['-n', 'rollback', 'tag', 'v7', '--target', 'prod'])).toEqual({ kind: 'ok' });
    expect(parser.getFlag('dry-run')).toBe(true);
    expect(parser.getOption('target')).toBe('prod');
    expect(parser.getWord('rollback')).toEqual({ kind: 'boolean', value: true });
    expect(parser.getWord('tag')).toEqual({ kind: 'string', value: 'v7' });
  });

  test('required flags from the document are enforced', () => {
    const parser = parserFromSchema(sampleDocument(), { io: recordingIo() });
    expect(parser.parseTokens(['-n'])).toEqual({ kind: 'missing', name: 'target', exitCode: 1 });
  });

  test('loads and validates a file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagbearer-schema-'));
    const file = path.join(dir, 'args.json');
    fs.writeFileSync(file, JSON.stringify(sampleDocument()), 'utf8');

    await expect(loadArgSchemaFile(file)).resolves.toEqual(sampleDocument());
  });

  test('reports malformed JSON as a schema error', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagbearer-schema-'));
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "schema": ', 'utf8');

    await expect(loadArgSchemaFile(file)).rejects.toBeInstanceOf(ArgSchemaError);
  });
});
