export type ProviderConfig = {
  readonly apiKey: string;
  readonly model: string;
  /** Sampling temperature, 0.0 to 2.0. */
  readonly temperature: number;
  readonly maxTokens: number;
};

export type TransportOptions = {
  readonly timeoutMs?: number;
};

/**
 * How an adapter treats System-role messages: `extract` lifts them into a
 * single system instruction, `inline` keeps them as ordinary turns.
 */
export type SystemMessageMode = 'extract' | 'inline';

export type AdapterOptions = TransportOptions & {
  readonly baseUrl?: string;
  /** Joins extracted System contents. Defaults to a blank line. */
  readonly systemSeparator?: string;
};
