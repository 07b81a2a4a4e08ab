import type { Scopes } from '../lib/scopes.ts';
import { EMULATOR_TOKEN, type Token } from '../lib/token.ts';
import type { Env } from '../types.ts';
import { projectFromEnv } from './application-default.ts';

export const DEFAULT_EMULATOR_PROJECT = 'demo-project';

const EMULATOR_HOST_SUFFIX = '_EMULATOR_HOST';

/** Names of the `*_EMULATOR_HOST` variables that are set to a non-empty value */
export function emulatorHostVariables(env: Env): string[] {
  return Object.keys(env)
    .filter((name) => name.endsWith(EMULATOR_HOST_SUFFIX) && Boolean(env[name]?.trim()))
    .sort();
}

export interface EmulatorProbe {
  provider: EmulatorProvider;
  projectId: string;
}

/** Fixed `Bearer owner` credential understood by the Cloud emulators */
export class EmulatorProvider {
  readonly kind = 'emulator' as const;
  readonly name = 'emulator';
  readonly requiresScopes = false;

  async getToken(_scopes?: Scopes, _signal?: AbortSignal): Promise<Token> {
    return EMULATOR_TOKEN;
  }

  static tryLoad(env: Env): EmulatorProbe | undefined {
    if (emulatorHostVariables(env).length === 0) return undefined;
    return { provider: new EmulatorProvider(), projectId: projectFromEnv(env) ?? DEFAULT_EMULATOR_PROJECT };
  }
}
