import type { Logger } from '../../../logging/logger.js';
import type { EventSource } from '../types.js';
import { ClaudeMapper } from './claude.js';
import { GenericMapper } from './generic.js';
import { KiroMapper } from './kiro.js';
import type { EventMapper } from './types.js';
import { WindsurfMapper } from './windsurf.js';

export const EVENT_SOURCES: readonly EventSource[] = ['claude', 'windsurf', 'kiro', 'generic'];

export function isEventSource(value: string): value is EventSource {
  return EVENT_SOURCES.some((s) => s === value);
}

/** Mapper for `source`; anything unrecognised gets the generic mapper and a warning. */
export function createMapper(source: string, logger?: Logger): EventMapper {
  switch (source) {
    case 'claude':
      return new ClaudeMapper();
    case 'windsurf':
      return new WindsurfMapper();
    case 'kiro':
      return new KiroMapper();
    case 'generic':
      return new GenericMapper();
    default:
      logger?.warn('Unknown event source; using the generic mapper', { source });
      return new GenericMapper();
  }
}

export type { EventMapper } from './types.js';
export { ClaudeMapper, GenericMapper, KiroMapper, WindsurfMapper };
