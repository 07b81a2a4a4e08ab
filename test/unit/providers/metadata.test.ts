import assert from 'assert';
import { AuthError } from '../../../src/lib/errors.ts';
import { DEFAULT_METADATA_HOST, MetadataServerProvider, metadataHostFromEnv } from '../../../src/providers/metadata.ts';
import type { FetchFn } from '../../../src/types.ts';
import { connectError, createClock, createFakeFetch, deferred, flushMicrotasks, jsonResponse, logger, textResponse } from '../../lib/test-utils.ts';

const T = 1_700_000_000_000;
const HOST = 'metadata.test:8080';
const TOKEN_URL = `http://${HOST}/computeMetadata/v1/instance/service-accounts/default/token`;
const PROJECT_URL = `http://${HOST}/computeMetadata/v1/project/project-id`;

function metadataServer(projectBody = 'my-project\n') {
  return createFakeFetch((request) => {
    if (request.url === PROJECT_URL) return textResponse(projectBody);
    if (request.url === TOKEN_URL) return jsonResponse({ access_token: 'gce-token', expires_in: 1800, token_type: 'Bearer' });
    return textResponse('not found', 404);
  });
}

describe('MetadataServerProvider', () => {
  it('metadataHostFromEnv honors GCE_METADATA_HOST', () => {
    assert.strictEqual(metadataHostFromEnv({}), DEFAULT_METADATA_HOST);
    assert.strictEqual(metadataHostFromEnv({ GCE_METADATA_HOST: ' ' }), DEFAULT_METADATA_HOST);
    assert.strictEqual(metadataHostFromEnv({ GCE_METADATA_HOST: HOST }), HOST);
  });

  it('tryLoad returns the project and a pre-issued token', async () => {
    const fetch = metadataServer();
    const clock = createClock(T);

    const probe = await MetadataServerProvider.tryLoad({ host: HOST, fetch, clock: clock.now, logger });
    assert.ok(probe);
    assert.strictEqual(probe.projectId, 'my-project');

    const token = await probe.token();
    assert.strictEqual(token.header, 'Bearer gce-token');
    assert.strictEqual(token.expiresAt, T + 1_800_000);

    assert.deepStrictEqual(fetch.requests.map((request) => request.url).sort(), [PROJECT_URL, TOKEN_URL].sort());
    for (const request of fetch.requests) {
      assert.strictEqual(request.headers.get('metadata-flavor'), 'Google');
    }
  });

  it('tryLoad requests the token while the project lookup is still pending', async () => {
    const tokenRequested = deferred<void>();
    const fetch: FetchFn = async (input) => {
      const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
      if (url === TOKEN_URL) {
        tokenRequested.resolve();
        return jsonResponse({ access_token: 'gce-token', expires_in: 1800 });
      }
      await tokenRequested.promise;
      return textResponse('my-project');
    };

    const probe = await MetadataServerProvider.tryLoad({ host: HOST, fetch, logger });
    assert.strictEqual(probe?.projectId, 'my-project');
  });

  it('tryLoad resolves undefined when the server refuses connections', async () => {
    const fetch: FetchFn = async () => {
      throw connectError('ECONNREFUSED');
    };
    assert.strictEqual(await MetadataServerProvider.tryLoad({ host: HOST, fetch, logger }), undefined);
  });

  it('tryLoad resolves undefined when the host does not resolve', async () => {
    const fetch: FetchFn = async () => {
      throw connectError('ENOTFOUND');
    };
    assert.strictEqual(await MetadataServerProvider.tryLoad({ fetch, logger }), undefined);
  });

  it('tryLoad resolves undefined when the probe times out', async () => {
    const fetch: FetchFn = (_input, init) => {
      const signal = init?.signal;
      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(signal.reason));
      });
    };
    assert.strictEqual(await MetadataServerProvider.tryLoad({ host: HOST, fetch, logger, probeTimeoutMs: 10 }), undefined);
  });

  it('tryLoad cancels its token request when the host is unreachable', async () => {
    const tokenSignals: AbortSignal[] = [];
    const fetch: FetchFn = (input, init) => {
      const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
      if (url === PROJECT_URL) return Promise.reject(connectError('EHOSTUNREACH'));
      const signal = init?.signal;
      if (!signal) return Promise.reject(new Error('token request sent without a signal'));
      tokenSignals.push(signal);
      if (signal.aborted) return Promise.reject(signal.reason);
      return new Promise<Response>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason));
      });
    };

    assert.strictEqual(await MetadataServerProvider.tryLoad({ host: HOST, fetch, logger }), undefined);
    await flushMicrotasks();
    assert.strictEqual(tokenSignals.length, 1);
    assert.strictEqual(tokenSignals[0].aborted, true);
  });

  it('tryLoad leaves the handed-over token request running on success', async () => {
    const fetch = metadataServer();
    const probe = await MetadataServerProvider.tryLoad({ host: HOST, fetch, logger });
    assert.ok(probe?.token);
    await probe.token();
    const tokenRequest = fetch.requests.find((request) => request.url === TOKEN_URL);
    assert.strictEqual(tokenRequest?.signal.aborted, false);
  });

  it('tryLoad surfaces server errors', async () => {
    const fetch = createFakeFetch(() => textResponse('internal error', 500));
    await assert.rejects(MetadataServerProvider.tryLoad({ host: HOST, fetch, logger }), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.strictEqual(error.kind, 'TokenEndpoint');
      assert.strictEqual(error.fatal, false);
      assert.strictEqual(error.message, `[metadata server] ${PROJECT_URL} - 500: internal error`);
      return true;
    });
  });

  it('getProjectId rejects an empty body', async () => {
    const provider = new MetadataServerProvider({ host: HOST, fetch: metadataServer('  \n') });
    await assert.rejects(provider.getProjectId(), (error: unknown) => error instanceof AuthError && error.kind === 'BadResponse');
  });

  it('getProjectId reports a failed body read as a transport error', async () => {
    const consumed = textResponse('my-project');
    await consumed.text();
    const fetch: FetchFn = async () => consumed;
    const provider = new MetadataServerProvider({ host: HOST, fetch });
    await assert.rejects(provider.getProjectId(), (error: unknown) => {
      assert.ok(error instanceof AuthError);
      assert.strictEqual(error.kind, 'Transport');
      assert.strictEqual(error.fatal, false);
      assert.strictEqual(error.message, `[metadata server] Reading response from ${PROJECT_URL} failed`);
      return true;
    });
  });

  it('getToken sends no scopes', async () => {
    const fetch = metadataServer();
    const provider = new MetadataServerProvider({ host: HOST, fetch, logger });
    await provider.getToken();
    assert.strictEqual(fetch.requests[0].url, TOKEN_URL);
    assert.strictEqual(provider.requiresScopes, false);
  });

  it('getToken wraps transport failures as transient errors', async () => {
    const fetch: FetchFn = async () => {
      throw connectError('ECONNRESET');
    };
    const provider = new MetadataServerProvider({ host: HOST, fetch });
    await assert.rejects(provider.getToken(), (error: unknown) => error instanceof AuthError && error.kind === 'Transport' && !error.fatal && error.code === 'ECONNRESET');
  });
});
