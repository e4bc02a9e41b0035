import { Agent } from 'undici';

import { createInternalError } from '../../errors.js';

export interface ProbeTimeouts {
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

/**
 * One undici Agent per concurrent probe. A probe borrows an agent for its whole
 * run, so connection state is never shared between probes in flight.
 */
export class ProbeClientPool {
  private readonly agents: Agent[];
  private readonly idle: Agent[];

  constructor(size: number, timeouts: ProbeTimeouts) {
    this.agents = Array.from(
      { length: size },
      () =>
        new Agent({
          connect: { timeout: timeouts.connectTimeoutMs },
          headersTimeout: timeouts.readTimeoutMs,
          bodyTimeout: timeouts.readTimeoutMs,
        }),
    );
    this.idle = [...this.agents];
  }

  async use<T>(task: (client: Agent) => Promise<T>): Promise<T> {
    const client = this.idle.pop();
    if (!client) {
      throw createInternalError('Probe client pool exhausted; concurrency exceeds pool size.', {
        size: this.agents.length,
      });
    }

    try {
      return await task(client);
    } finally {
      this.idle.push(client);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.agents.map((agent) => agent.close()));
  }
}
