import { spawn } from 'child_process';
import { StringDecoder } from 'string_decoder';
import logger from '../config/logger';
import { JobExecutor } from '../types/batch';

export interface CommandExecutorOptions {
  /** Name attached to forwarded output lines. */
  label?: string;
  /** Extra environment variables for the child process. */
  env?: NodeJS.ProcessEnv;
}

const STDERR_TAIL_LINES = 5;

/**
 * Quote a value for POSIX shells.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildCommandLine(command: string, inputDir: string, outputDir: string): string {
  return command.replace(/\{input\}/g, shellQuote(inputDir)).replace(/\{output\}/g, shellQuote(outputDir));
}

/**
 * Wrap an external analysis program as a job executor.
 *
 * Exit code 0 resolves true. A non-zero exit or a signal rejects with the
 * exit status and the last lines the program wrote to stderr.
 */
export function createCommandExecutor(command: string, options: CommandExecutorOptions = {}): JobExecutor {
  const label = options.label ?? command;

  return (inputDir, outputDir) =>
    new Promise<boolean>((resolve, reject) => {
      const commandLine = buildCommandLine(command, inputDir, outputDir);
      const stderrTail: string[] = [];

      logger.debug('Spawning analysis command', { job: label, command: commandLine });

      const child = spawn(commandLine, {
        shell: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: {
          ...process.env,
          ...options.env,
          ANALYSIS_INPUT_DIR: inputDir,
          ANALYSIS_OUTPUT_DIR: outputDir,
        },
      });

      const stdoutLines = createLineBuffer((line) => logger.info(line, { job: label }));
      const stderrLines = createLineBuffer((line) => {
        logger.warn(line, { job: label });
        stderrTail.push(line);
        if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
      });

      child.stdout?.on('data', (chunk: Buffer) => stdoutLines.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderrLines.push(chunk));

      child.once('error', reject);

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        stdoutLines.flush();
        stderrLines.flush();
        if (code === 0) {
          resolve(true);
          return;
        }
        const status = signal ? `was terminated by ${signal}` : `exited with code ${code}`;
        const detail = stderrTail.length > 0 ? `: ${stderrTail.join(' | ')}` : '';
        reject(new Error(`Command for ${label} ${status}${detail}`));
      });
    });
}

/**
 * Executor for a job type that has no command configured. Always rejects.
 */
export function createMissingCommandExecutor(jobId: string, envVar: string): JobExecutor {
  return () => Promise.reject(new Error(`No command configured for ${jobId} (set ${envVar})`));
}

interface LineBuffer {
  push(chunk: Buffer): void;
  flush(): void;
}

/**
 * Reassemble output chunks into lines. A chunk boundary may fall inside a
 * line or inside a multi-byte character; the partial text is carried over.
 */
function createLineBuffer(onLine: (line: string) => void): LineBuffer {
  const decoder = new StringDecoder('utf8');
  let pending = '';

  const emit = (line: string) => {
    const trimmed = line.trimEnd();
    if (trimmed.length > 0) onLine(trimmed);
  };

  return {
    push(chunk) {
      const lines = (pending + decoder.write(chunk)).split('\n');
      pending = lines.pop() ?? '';
      lines.forEach(emit);
    },
    flush() {
      const rest = pending + decoder.end();
      pending = '';
      rest.split('\n').forEach(emit);
    },
  };
}
