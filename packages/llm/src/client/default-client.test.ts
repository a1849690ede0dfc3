import { beforeEach, describe, expect, it, vi, afterEach } from 'vitest';
import { Client } from './client.js';
import {
  getDefaultClient,
  setDefaultClient,
  resetDefaultClient,
} from './default-client.js';

describe('Default Client', () => {
  beforeEach(() => {
    resetDefaultClient();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetDefaultClient();
  });

  it('creates a client from the environment on first use', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-openai');
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    const client = getDefaultClient();

    expect(client).toBeInstanceOf(Client);
    expect(client.providerNames).toEqual(['openai']);
  });

  it('returns the same cached instance on later calls', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-openai');

    expect(getDefaultClient()).toBe(getDefaultClient());
  });

  it('returns a client installed with setDefaultClient', () => {
    const custom = new Client({ providers: {} });
    setDefaultClient(custom);

    expect(getDefaultClient()).toBe(custom);
  });

  it('rebuilds after resetDefaultClient', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-openai');
    const first = getDefaultClient();

    resetDefaultClient();

    expect(getDefaultClient()).not.toBe(first);
  });
});
