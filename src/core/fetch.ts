import { Agent, Dispatcher } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

/**
 * Picks the dispatcher for portal requests. An explicit dispatcher (a proxy
 * agent, or a MockAgent under test) wins over the TLS setting.
 */
export function getFetchDispatcher(ignoreHttpsErrors: boolean, override?: Dispatcher): Dispatcher | undefined {
  if (override) {
    return override;
  }
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}
