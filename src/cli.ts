import * as fs from 'fs';
import * as path from 'path';
import figlet from 'figlet';
import { Command, InvalidArgumentError } from '@commander-js/extra-typings';
import { NotFoundError } from './errors.js';
import { loadExtensions } from './extensions.js';
import { parseGimmickKey } from './gimmick-key.js';
import { entryToJson, JsonOptions, lvbToJson } from './json.js';
import { Logger } from './logger.js';
import { Lvb } from './lvb.js';
import { MapperRegistry } from './mapper-registry.js';
import { JsonValue } from './payloads.js';

export interface CliOutput {
  write(text: string): void;
}

const stdout: CliOutput = {
  write: text => {
    process.stdout.write(text);
  },
};

function parseIndent(value: string): number {
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0 || indent > 10) {
    throw new InvalidArgumentError('Expected an integer between 0 and 10.');
  }
  return indent;
}

async function openLvb(file: string, extensions: string[]): Promise<Lvb> {
  const resolvedFile = path.resolve(process.cwd(), file);
  Logger.log(`Reading ${resolvedFile}`);

  const registry = await loadExtensions(new MapperRegistry(), extensions);
  const data = await fs.promises.readFile(resolvedFile);
  return new Lvb(data, { registry });
}

export function createProgram(output: CliOutput = stdout) {
  const program = new Command()
    .name('lvb')
    .description('Dump gimmick placement data from LVB containers as JSON')
    .option('-d, --debug', 'log decoding steps to stderr')
    .option('--no-bytes', 'leave out the raw bytes of undecoded sections')
    .option('--indent <spaces>', 'JSON indentation', parseIndent, 1)
    .option('--ext <modules...>', 'extension modules with extra section decoders')
    .addHelpText('beforeAll', figlet.textSync('LVB'));

  program.hook('preAction', () => {
    if (program.opts().debug) {
      Logger.enableDebug();
    }
  });

  const print = (value: JsonValue) => {
    output.write(JSON.stringify(value, null, program.opts().indent) + '\n');
  };
  const jsonOptions = (): JsonOptions => ({ includeBytes: program.opts().bytes });

  program
    .command('full <file>')
    .description('dump the whole container')
    .action(async (file) => {
      const lvb = await openLvb(file, program.opts().ext ?? []);
      print(lvbToJson(lvb, jsonOptions()));
    });

  program
    .command('gimmick <file> <key>')
    .description('dump one gimmick by name or by hash written as <XXXXXXXX>')
    .action(async (file, key) => {
      const lvb = await openLvb(file, program.opts().ext ?? []);
      const gimmick = lvb.gimmick(parseGimmickKey(key));
      if (gimmick === undefined) {
        throw new NotFoundError(`gimmick not found: ${key}`);
      }
      print(entryToJson(lvb, gimmick, jsonOptions()));
    });

  program
    .command('bdat <file> <id>')
    .description('dump one gimmick by bdat id written as <XXXXXXXX>')
    .action(async (file, id) => {
      const lvb = await openLvb(file, program.opts().ext ?? []);
      const bdatId = parseGimmickKey(id);
      const gimmick = typeof bdatId === 'number' ? lvb.bdatGimmick(bdatId) : undefined;
      if (gimmick === undefined) {
        throw new NotFoundError(`gimmick not found: ${id}`);
      }
      print(entryToJson(lvb, gimmick, jsonOptions()));
    });

  return program;
}
