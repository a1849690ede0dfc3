import { Client } from './client.js';

let defaultClient: Client | null = null;

/** Lazily builds a client from the environment on first use. */
export function getDefaultClient(): Client {
  if (defaultClient === null) {
    defaultClient = Client.fromEnv();
  }
  return defaultClient;
}

export function setDefaultClient(client: Client): void {
  defaultClient = client;
}

export function resetDefaultClient(): void {
  defaultClient = null;
}
