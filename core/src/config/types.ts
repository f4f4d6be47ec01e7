import type { ImplementationMarker } from '../discovery/markers.js';
import type { Logger } from '../logging/logger.js';

export type MarkerSource = Iterable<ImplementationMarker> | (() => Iterable<ImplementationMarker>);

export type RegistryOptions = {
  name?: string;
  logger?: Logger;
  // Consulted by init(true); plain registrations never read it.
  discovery?: MarkerSource;
};
