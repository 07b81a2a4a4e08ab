import assert from 'assert';
import { Auth } from '../../../src/auth.ts';
import { AuthError } from '../../../src/lib/errors.ts';
import { firstLine, GCloudProvider } from '../../../src/providers/gcloud.ts';
import type { CommandOutput, CommandRunner } from '../../../src/types.ts';
import { createClock, createFakeRunner, errnoError, flushMicrotasks, logger } from '../../lib/test-utils.ts';

const T = 1_700_000_000_000;
const GCLOUD = '/usr/lib/google-cloud-sdk/bin/gcloud';

describe('GCloudProvider', () => {
  it('firstLine keeps only the first line, trimmed', () => {
    assert.strictEqual(firstLine('  ya29.token  \nWARNING: something\n'), 'ya29.token');
    assert.strictEqual(firstLine('single'), 'single');
    assert.strictEqual(firstLine('\nsecond'), '');
  });

  it('tryLoad locates gcloud and reads the configured project', async () => {
    const runner = createFakeRunner({
      'which gcloud': { stdout: `${GCLOUD}\n` },
      [`${GCLOUD} config get-value project`]: { stdout: 'my-project\n' },
    });

    const probe = await GCloudProvider.tryLoad({ runner, logger });
    assert.ok(probe);
    assert.strictEqual(probe.projectId, 'my-project');
    assert.strictEqual(probe.provider.executable, GCLOUD);
    assert.deepStrictEqual(
      runner.calls.map((call) => [call.file, ...call.args].join(' ')),
      ['which gcloud', `${GCLOUD} config get-value project`]
    );
  });

  it('tryLoad resolves undefined when gcloud is not installed', async () => {
    const runner = createFakeRunner({ 'which gcloud': { exitCode: 1, stdout: '' } });
    assert.strictEqual(await GCloudProvider.tryLoad({ runner, logger }), undefined);
  });

  it('tryLoad resolves undefined when which itself is missing', async () => {
    const runner = createFakeRunner({ 'which gcloud': errnoError('ENOENT', 'which') });
    assert.strictEqual(await GCloudProvider.tryLoad({ runner, logger }), undefined);
  });

  it('tryLoad fails when no project is configured', async () => {
    const runner = createFakeRunner({
      'which gcloud': { stdout: GCLOUD },
      [`${GCLOUD} config get-value project`]: { stdout: '(unset)\n' },
    });
    await assert.rejects(GCloudProvider.tryLoad({ runner, logger }), (error: unknown) => error instanceof AuthError && error.kind === 'Subprocess');
  });

  it('getToken prints an access token with a one hour window', async () => {
    const runner = createFakeRunner({ [`${GCLOUD} auth print-access-token --quiet`]: { stdout: 'ya29.local-token\n' } });
    const clock = createClock(T);
    const provider = new GCloudProvider(GCLOUD, { runner, clock: clock.now, logger });

    const token = await provider.getToken();
    assert.strictEqual(token.header, 'Bearer ya29.local-token');
    assert.strictEqual(token.acquiredAt, T);
    assert.strictEqual(token.expiresAt, T + 3600_000);
  });

  it('getToken reports a non-zero exit with the first stderr line', async () => {
    const runner = createFakeRunner({
      [`${GCLOUD} auth print-access-token --quiet`]: { exitCode: 1, stderr: 'ERROR: (gcloud.auth.print-access-token) Reauthentication required.\nPlease run gcloud auth login\n' },
    });
    const provider = new GCloudProvider(GCLOUD, { runner, logger });

    await assert.rejects(provider.getToken(), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.strictEqual(error.kind, 'Subprocess');
      assert.strictEqual(error.fatal, false);
      assert.strictEqual(error.message, '[gcloud] gcloud auth print-access-token --quiet exited with code 1: ERROR: (gcloud.auth.print-access-token) Reauthentication required.');
      return true;
    });
  });

  it('getToken rejects empty output', async () => {
    const runner = createFakeRunner({ [`${GCLOUD} auth print-access-token --quiet`]: { stdout: '\n' } });
    const provider = new GCloudProvider(GCLOUD, { runner, logger });
    await assert.rejects(provider.getToken(), { message: '[gcloud] gcloud auth print-access-token --quiet printed nothing' });
  });

  it('getToken hands its abort signal to the command runner', async () => {
    const runner = createFakeRunner({ [`${GCLOUD} auth print-access-token --quiet`]: { stdout: 'ya29.local-token\n' } });
    const provider = new GCloudProvider(GCLOUD, { runner, logger });
    const controller = new AbortController();

    await provider.getToken(undefined, controller.signal);
    assert.strictEqual(runner.calls[0].signal, controller.signal);
  });

  it('closing the handle aborts a running print-access-token', async () => {
    const signals: AbortSignal[] = [];
    const runner: CommandRunner = (_file, _args, options) =>
      new Promise<CommandOutput>((_resolve, reject) => {
        const signal = options?.signal;
        if (!signal) {
          reject(new Error('expected an abort signal'));
          return;
        }
        signals.push(signal);
        signal.addEventListener('abort', () => reject(Object.assign(new Error('The operation was aborted'), { code: 'ABORT_ERR' })), { once: true });
      });
    const auth = Auth.fromProvider(new GCloudProvider(GCLOUD, { runner, logger }), 'cli-project', { env: {}, logger });

    const pending = auth.header();
    await flushMicrotasks();
    assert.strictEqual(signals.length, 1);
    assert.strictEqual(signals[0].aborted, false);

    auth.close();
    await assert.rejects(pending, (error: unknown) => error instanceof AuthError && error.kind === 'Revoked');
    assert.strictEqual(signals[0].aborted, true);
  });
});
