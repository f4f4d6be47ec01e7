import process from 'node:process';

import { Registry, createConsoleLogger, type Logger } from '@depman/core';

import { autoloadImplementations } from './autoload.js';
import { loadDepmanConfig } from './config.js';

export type BootstrapOptions = {
  cwd?: string;
  logger?: Logger;
};

export const DEFAULT_AUTOLOAD_DIRS = ['services'];

/**
 * Loads `depman.config.ts` from `cwd`, collects the markers exported from the autoload
 * directories and returns a registry initialized with them.
 */
export async function bootstrapRegistry(opts: BootstrapOptions = {}): Promise<Registry> {
  const cwd = opts.cwd ?? process.cwd();
  const cfg = await loadDepmanConfig(cwd);
  const logger = opts.logger ?? createConsoleLogger('[depman]', cfg.logging?.level ?? 'info');

  const markers = await autoloadImplementations({
    cwd,
    dirs: cfg.autoload?.dirs ?? DEFAULT_AUTOLOAD_DIRS,
    logger,
  });

  const registry = new Registry({
    name: cfg.registry?.name ?? 'default',
    logger,
    discovery: markers,
  });
  registry.init(true);
  return registry;
}
