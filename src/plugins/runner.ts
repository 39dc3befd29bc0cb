/**
 * Runs plugin hooks around an operation.
 * @module plugins/runner
 */

import { toError } from '../errors/base.js';
import type { Logger } from '../observability/types.js';
import type { Plugin, PluginOperation } from './types.js';

/**
 * One hooked call
 */
export interface PluginRun<P, R> {
  plugins: readonly Plugin<P, R>[] | undefined;
  operation: PluginOperation;
  indexUid: string;
  payload: P;
  /** Whether concurrent hooks may run; they are skipped in sequential dispatch */
  concurrent: boolean;
  execute: (payload: P) => Promise<R>;
}

/**
 * Applies pre, concurrent and post hooks in registration order.
 *
 * - pre hooks run one after another; each sees the payload the previous one returned
 * - concurrent hooks start together with the request; their failures are logged and dropped
 * - post hooks run one after another on the result
 */
export class PluginRunner {
  constructor(private readonly logger: Logger) {}

  async run<P, R>(call: PluginRun<P, R>): Promise<R> {
    const plugins = call.plugins ?? [];
    if (plugins.length === 0) {
      return call.execute(call.payload);
    }

    const { operation, indexUid } = call;

    let payload = call.payload;
    for (const plugin of plugins) {
      if (!plugin.preEvent) continue;
      const output = await plugin.run({ event: 'pre', operation, indexUid, payload });
      if (output && output.payload !== undefined) {
        payload = output.payload;
      }
    }

    const concurrentPlugins = plugins.filter((p) => p.concurrentEvent);
    let sideEffects: Promise<unknown>[] = [];
    if (concurrentPlugins.length > 0) {
      if (call.concurrent) {
        const sidePayload = payload;
        sideEffects = concurrentPlugins.map((plugin) =>
          Promise.resolve().then(() =>
            plugin.run({ event: 'concurrent', operation, indexUid, payload: sidePayload })
          )
        );
      } else {
        this.logger.debug('Skipping concurrent hooks in sequential dispatch', {
          operation,
          indexUid,
          plugins: concurrentPlugins.length,
        });
      }
    }

    let result: R;
    try {
      result = await call.execute(payload);
    } finally {
      await this.settle(sideEffects, concurrentPlugins, operation, indexUid);
    }

    for (const plugin of plugins) {
      if (!plugin.postEvent) continue;
      const output = await plugin.run({ event: 'post', operation, indexUid, payload, result });
      if (output && output.result !== undefined) {
        result = output.result;
      }
    }

    return result;
  }

  private async settle<P, R>(
    sideEffects: Promise<unknown>[],
    plugins: readonly Plugin<P, R>[],
    operation: PluginOperation,
    indexUid: string
  ): Promise<void> {
    if (sideEffects.length === 0) {
      return;
    }
    const outcomes = await Promise.allSettled(sideEffects);
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        this.logger.warn('Concurrent hook failed', {
          operation,
          indexUid,
          plugin: plugins[i]?.name ?? `#${i}`,
          error: toError(outcome.reason),
        });
      }
    });
  }
}
