import type { Message, ProviderAdapter, StepResult } from '../types/index.js';
import { isProviderError, stepFailure, stepSuccess } from '../types/index.js';
import type { Client } from '../client/client.js';
import { getDefaultClient } from '../client/default-client.js';

export type RunStepOptions = {
  readonly stepType: string;
  readonly messages: ReadonlyArray<Message>;
  /** Calls this adapter directly, bypassing any client. */
  readonly adapter?: ProviderAdapter;
  /** Provider name resolved through the client. */
  readonly provider?: string;
  readonly client?: Client;
};

/**
 * Performs one provider call and records it as a StepResult. Success means
 * the call returned text, whatever that text is; a provider failure becomes
 * a failed step carrying the error message. Anything that is not a
 * provider failure (misconfiguration, programming errors) is rethrown.
 */
export async function runStep(options: RunStepOptions): Promise<StepResult> {
  const { stepType, messages, adapter } = options;

  try {
    const text = adapter
      ? await adapter.send(messages)
      : await (options.client ?? getDefaultClient()).send(messages, { provider: options.provider });
    return stepSuccess(stepType, text);
  } catch (err) {
    if (isProviderError(err)) {
      return stepFailure(stepType, err.message);
    }
    throw err;
  }
}
