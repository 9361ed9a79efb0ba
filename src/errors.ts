import chalk from 'chalk';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }

  display(): string {
    return chalk.red(`Error: ${this.message}`);
  }

  get exitCode(): number { return 2; }
}

export class CandidateInvocationError extends Error {
  constructor(
    public argv: string[],
    public status: number | null,
    public stderr: string,
    options?: { cause?: unknown }
  ) {
    super(
      status === null
        ? `Candidate could not be run: ${argv.join(' ')}`
        : `Candidate exited with status ${status}: ${argv.join(' ')}`,
      options
    );
    this.name = 'CandidateInvocationError';
  }

  display(): string {
    const lines = [chalk.red(`Error: ${this.message}`)];
    const detail = this.stderr.trim();
    if (detail) {
      lines.push(chalk.dim(`  stderr: ${detail.split('\n').slice(0, 5).join('\n          ')}`));
    }
    return lines.join('\n');
  }

  get exitCode(): number { return 3; }
}

export class ReferenceTokenizerError extends Error {
  constructor(
    public tokenizer: string,
    public encoding: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Reference tokenizer ${tokenizer} failed on ${encoding}${reason}`, options);
    this.name = 'ReferenceTokenizerError';
  }

  display(): string {
    return chalk.red(`Error: ${this.message}`);
  }

  get exitCode(): number { return 4; }
}

export type DisplayableError = UsageError | CandidateInvocationError | ReferenceTokenizerError;

export function isDisplayableError(err: unknown): err is DisplayableError {
  return err instanceof UsageError
    || err instanceof CandidateInvocationError
    || err instanceof ReferenceTokenizerError;
}
