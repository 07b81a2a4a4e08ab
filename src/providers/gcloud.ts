import { execFile } from 'child_process';
import { AuthError, errorCode } from '../lib/errors.ts';
import type { Scopes } from '../lib/scopes.ts';
import { Token } from '../lib/token.ts';
import { type Clock, type CommandOutput, type CommandRunner, type Logger, silentLogger } from '../types.ts';

const PROVIDER_NAME = 'gcloud';

/**
 * Runs a command with `execFile` (no shell) and collects its output.
 * A non-zero exit is reported through `exitCode`; failing to spawn or an abort rejects.
 */
export const execFileRunner: CommandRunner = (file, args, options = {}) =>
  new Promise<CommandOutput>((resolve, reject) => {
    execFile(file, [...args], { encoding: 'utf8', windowsHide: true, signal: options.signal }, (error, stdout, stderr) => {
      if (error && typeof error.code !== 'number') {
        reject(error);
        return;
      }
      resolve({ exitCode: error && typeof error.code === 'number' ? error.code : 0, stdout, stderr });
    });
  });

/** First line of command output, trimmed */
export function firstLine(output: string): string {
  const newline = output.indexOf('\n');
  return (newline === -1 ? output : output.slice(0, newline)).trim();
}

export interface GCloudOptions {
  runner?: CommandRunner;
  clock?: Clock;
  logger?: Logger;
}

export interface GCloudProbe {
  provider: GCloudProvider;
  projectId: string;
}

/**
 * Tokens from the locally logged-in gcloud CLI (`gcloud auth print-access-token`).
 * gcloud does not report an expiry, so tokens get the default one-hour window.
 */
export class GCloudProvider {
  readonly kind = 'gcloud' as const;
  readonly name = PROVIDER_NAME;
  readonly requiresScopes = false;

  private readonly runner: CommandRunner;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    readonly executable: string,
    options: GCloudOptions = {}
  ) {
    this.runner = options.runner ?? execFileRunner;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Locate gcloud with `which` and read its configured project.
   * Resolves undefined when gcloud is not installed.
   */
  static async tryLoad(options: GCloudOptions = {}): Promise<GCloudProbe | undefined> {
    const runner = options.runner ?? execFileRunner;
    const logger = options.logger ?? silentLogger;

    let located: CommandOutput;
    try {
      located = await runner('which', ['gcloud']);
    } catch (error) {
      logger.debug('Could not run which', { code: errorCode(error) });
      return undefined;
    }

    const executable = firstLine(located.stdout);
    if (located.exitCode !== 0 || !executable) return undefined;

    const provider = new GCloudProvider(executable, options);
    const projectId = await provider.run(['config', 'get-value', 'project']);
    if (projectId === '(unset)') throw new AuthError('Subprocess', 'gcloud has no default project configured', { provider: PROVIDER_NAME });

    return { provider, projectId };
  }

  async getToken(_scopes?: Scopes, signal?: AbortSignal): Promise<Token> {
    const accessToken = await this.run(['auth', 'print-access-token', '--quiet'], signal);
    const token = Token.withDefaultLifetime(accessToken, this.clock());
    this.logger.debug('gcloud token issued', { expiresAt: token.expiresAt });
    return token;
  }

  /** Run gcloud and return the first line of stdout; non-zero exit or empty output is a `Subprocess` error */
  private async run(args: readonly string[], signal?: AbortSignal): Promise<string> {
    const command = `gcloud ${args.join(' ')}`;

    let output: CommandOutput;
    try {
      output = await this.runner(this.executable, args, { signal });
    } catch (error) {
      throw new AuthError('Subprocess', `Failed to run ${command}`, { provider: PROVIDER_NAME, code: errorCode(error), cause: error });
    }

    if (output.exitCode !== 0) {
      const stderr = firstLine(output.stderr);
      throw new AuthError('Subprocess', `${command} exited with code ${output.exitCode}${stderr ? `: ${stderr}` : ''}`, { provider: PROVIDER_NAME });
    }

    const value = firstLine(output.stdout);
    if (!value) throw new AuthError('Subprocess', `${command} printed nothing`, { provider: PROVIDER_NAME });
    return value;
  }
}
