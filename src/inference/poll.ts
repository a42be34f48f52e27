import { TimeoutError } from './errors';
import { sleep as realSleep } from './retry';
import type { InferenceClient, RemoteFile, WaitOptions } from './types';

export type TerminalState = 'active' | 'failed';

/**
 * Polls `client.getFile` until the upload leaves `pending`. The first check
 * happens immediately; later ones are spaced by `pollInterval`.
 */
export async function waitUntilReady(
  client: InferenceClient,
  file: RemoteFile,
  options: WaitOptions
): Promise<{ state: TerminalState; file: RemoteFile; polls: number }> {
  const { pollInterval, timeout = 0, sleep = realSleep, now = Date.now } = options;
  const startTime = now();
  let current = file;
  let polls = 0;

  while (true) {
    current = await client.getFile(current.name);
    polls += 1;

    switch (current.state) {
      case 'active':
      case 'failed':
        return { state: current.state, file: current, polls };
      case 'pending':
        break;
    }

    const elapsed = now() - startTime;
    if (timeout > 0 && elapsed + pollInterval > timeout) {
      throw new TimeoutError(`File ${current.name} not ready within ${timeout}ms`);
    }

    await sleep(pollInterval);
  }
}
