import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ChildProcess, spawn } from 'child_process';

export interface CommandOptions {
  /** Added to the inherited environment. */
  env?: Record<string, string>;
  /** Values replaced by `***` wherever the command line or its output is logged. */
  secrets?: readonly string[];
}

export interface CommandResult {
  /** null when the process could not be started or was killed by a signal. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure, e.g. ENOENT for a missing executable. */
  error?: string;
}

const SECRET_MASK = '***';

/** How long a terminated tool gets to exit before it is killed outright. */
const KILL_GRACE_MS = 10_000;

export function maskSecrets(text: string, secrets: readonly string[]): string {
  return secrets
    .filter((secret) => secret.length > 0)
    .reduce((masked, secret) => masked.split(secret).join(SECRET_MASK), text);
}

function lastNonEmptyLine(text: string): string | undefined {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(-1)[0];
}

/**
 * One-line explanation of a failed command: the spawn error, or the exit code with the
 * last non-empty line of stderr. stdout is used only when stderr is empty.
 */
export function describeFailure(result: CommandResult, secrets: readonly string[] = []): string {
  if (result.error) {
    return maskSecrets(result.error, secrets);
  }

  const lastLine = lastNonEmptyLine(result.stderr) ?? lastNonEmptyLine(result.stdout);
  const exit = result.exitCode === null ? 'terminated by signal' : `exit code ${result.exitCode}`;

  return lastLine ? `${exit}: ${maskSecrets(lastLine, secrets)}` : exit;
}

function quoteArg(arg: string): string {
  return /[\s"']/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg;
}

/**
 * Runs external executables to completion. Never rejects: failures come back in the result.
 * No timeout is imposed beyond what the tool itself enforces.
 *
 * Tools still running when the application shuts down are terminated, and shutdown waits
 * for them to exit.
 */
@Injectable()
export class CommandRunnerService implements OnApplicationShutdown {
  private readonly logger = new Logger(CommandRunnerService.name);
  private readonly running = new Set<ChildProcess>();

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const secrets = options.secrets ?? [];
    const display = maskSecrets([command, ...args].map(quoteArg).join(' '), secrets);
    this.logger.debug(`Running: ${display}`);

    const result = await new Promise<CommandResult>((resolve) => {
      let stdout = '';
      let stderr = '';

      const child = spawn(command, [...args], {
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      this.running.add(child);

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      child.on('error', (error: Error) => {
        this.running.delete(child);
        resolve({ exitCode: null, stdout, stderr, error: `${command}: ${error.message}` });
      });
      child.on('close', (code: number | null) => {
        this.running.delete(child);
        resolve({ exitCode: code, stdout, stderr });
      });
    });

    const output = maskSecrets(`${result.stdout}${result.stderr}`.trim(), secrets);
    if (output) {
      this.logger.verbose(output);
    }
    this.logger.debug(`${command} finished`, { exitCode: result.exitCode });

    return result;
  }

  /**
   * Sends SIGTERM to every running tool and resolves once all of them have exited.
   * A tool still running after the grace period gets SIGKILL.
   */
  async terminateAll(): Promise<void> {
    await Promise.all([...this.running].map((child) => this.terminate(child)));
  }

  async onApplicationShutdown(): Promise<void> {
    await this.terminateAll();
  }

  private terminate(child: ChildProcess): Promise<void> {
    return new Promise<void>((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        resolve();
        return;
      }

      const escalation = setTimeout(() => {
        this.logger.warn('Tool ignored SIGTERM, killing it', { pid: child.pid });
        child.kill('SIGKILL');
      }, KILL_GRACE_MS);
      child.once('close', () => {
        clearTimeout(escalation);
        resolve();
      });

      this.logger.warn('Terminating running tool', { pid: child.pid });
      child.kill('SIGTERM');
    });
  }
}
