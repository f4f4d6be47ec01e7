import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { isImplementationMarker, silentLogger, type ImplementationMarker, type Logger } from '@depman/core';

import { resolveAppPath } from './config.js';

export function listModuleFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile())
    .map((d) => d.name)
    .filter((n) => /\.(ts|js|mjs)$/.test(n) && !n.endsWith('.d.ts'))
    .sort((a, b) => a.localeCompare(b))
    .map((n) => path.join(dir, n));
}

async function importFile(filePath: string): Promise<unknown> {
  return import(pathToFileURL(filePath).toString());
}

/**
 * Markers exported by one module, by export name order. An export may be a marker or
 * an array of markers; other exports are ignored.
 */
export function markersFromModule(mod: unknown): ImplementationMarker[] {
  if (!mod || typeof mod !== 'object') return [];
  const out: ImplementationMarker[] = [];
  for (const name of Object.keys(mod).sort((a, b) => a.localeCompare(b))) {
    const value: unknown = Reflect.get(mod, name);
    if (isImplementationMarker(value)) out.push(value);
    else if (Array.isArray(value)) out.push(...value.filter(isImplementationMarker));
  }
  return out;
}

export async function autoloadImplementations(args: {
  cwd: string;
  dirs: string[];
  logger?: Logger;
}): Promise<ImplementationMarker[]> {
  const logger = args.logger ?? silentLogger;
  const seen = new Set<ImplementationMarker>();
  const markers: ImplementationMarker[] = [];

  for (const d of args.dirs) {
    const dir = resolveAppPath(args.cwd, d);
    if (!fs.existsSync(dir)) {
      logger.warn(`autoload dir not found: ${dir}`);
      continue;
    }
    for (const filePath of listModuleFiles(dir)) {
      const found = markersFromModule(await importFile(filePath));
      // The same marker is often exported both by name and as default.
      for (const marker of found) {
        if (seen.has(marker)) continue;
        seen.add(marker);
        markers.push(marker);
      }
      if (found.length) logger.debug(`autoload ${path.relative(args.cwd, filePath)}: ${found.length} marker(s)`);
    }
  }

  return markers;
}
