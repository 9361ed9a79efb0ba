import { Command } from 'commander';
import { createHash } from 'node:crypto';
import { writeFileSync } from 'node:fs';
import { DEFAULT_SIZE, parseSeed } from '../config.js';
import { DEFAULT_SEED, generateCorpus } from '../corpus.js';
import { createLogger } from '../log.js';
import { parseSize } from '../size.js';

type CorpusCommandOptions = {
  size: string;
  seed: number;
  output?: string;
  debug?: boolean;
  quiet?: boolean;
};

export function register(program: Command): void {
  program
    .command('corpus')
    .description('Write the deterministic benchmark corpus (same bytes for the same size and seed)')
    .option('--size <size>', 'Corpus size (e.g. 1KB, 1MB)', DEFAULT_SIZE)
    .option('--seed <n>', 'Corpus seed', parseSeed, DEFAULT_SEED)
    .option('--output <file>', 'Write to a file instead of stdout')
    .action(function (this: Command) {
      const opts = this.optsWithGlobals<CorpusCommandOptions>();
      const logger = createLogger({ debug: opts.debug, quiet: opts.quiet });

      const text = generateCorpus(parseSize(opts.size), { seed: opts.seed });
      const digest = createHash('sha256').update(text).digest('hex');

      if (opts.output) {
        writeFileSync(opts.output, text);
        logger.info(`Wrote ${Buffer.byteLength(text)} bytes to ${opts.output}`);
      } else {
        process.stdout.write(text);
      }
      logger.info(`sha256 ${digest}`);
    });
}
