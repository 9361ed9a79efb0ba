import { Command } from 'commander';
import { parseEncoding } from '../config.js';
import { DEFAULT_GOLDEN_CASES, buildGoldenRecords, toJsonLines } from '../golden.js';
import { createLogger } from '../log.js';
import { tiktokenReference, type ReferenceTokenizer } from '../reference.js';
import { emit } from '../report.js';
import { ENCODINGS, type Encoding } from '../types.js';

type GoldenOptions = {
  encoding?: Encoding[];
  output?: string;
  debug?: boolean;
  quiet?: boolean;
};

function collectEncoding(value: string, previous: Encoding[] | undefined): Encoding[] {
  return [...(previous ?? []), parseEncoding(value)];
}

export function register(program: Command, deps: { tokenizer?: ReferenceTokenizer } = {}): void {
  program
    .command('golden')
    .description('Export reference token ids for the built-in golden cases as JSON lines')
    .option('--encoding <name>', 'Encoding to export (repeatable, default: all)', collectEncoding)
    .option('--output <file>', 'Write to a file instead of stdout')
    .action(function (this: Command) {
      const opts = this.optsWithGlobals<GoldenOptions>();
      const logger = createLogger({ debug: opts.debug, quiet: opts.quiet });
      const tokenizer = deps.tokenizer ?? tiktokenReference;
      const encodings = opts.encoding ?? [...ENCODINGS];

      logger.info(`Generating golden records for ${encodings.join(', ')}...`);
      const records = buildGoldenRecords(DEFAULT_GOLDEN_CASES, encodings, tokenizer, logger);

      emit(toJsonLines(records), opts.output);
      logger.info(`Generated ${records.length} records${opts.output ? ` to ${opts.output}` : ''}`);
    });
}
