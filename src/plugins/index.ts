/**
 * Plugin hooks for index operations.
 * @module plugins
 */

export type {
  PluginEvent,
  PluginOperation,
  PluginInvocation,
  PluginOutput,
  Plugin,
  IndexPlugins,
  DocumentFilter,
  SearchRequest,
} from './types.js';
export { PluginRunner, type PluginRun } from './runner.js';
