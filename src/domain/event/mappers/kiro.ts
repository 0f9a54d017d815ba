import type { KnownEventKind, ProjectLintEvent } from '../types.js';
import type { EventMapper } from './types.js';
import { UNKNOWN_SESSION, now, parsePayload, text } from './payload.js';

const EVENT_NAMES: Readonly<Record<string, KnownEventKind>> = {
  file_save: 'post_write_code',
  'file.save': 'post_write_code',
  file_create: 'post_write_code',
  'file.create': 'post_write_code',
  prompt_submit: 'pre_user_prompt',
  'prompt.submit': 'pre_user_prompt',
  turn_complete: 'post_model_response',
  'turn.complete': 'post_model_response',
};

/** Kiro reads only the exit status, so responses are empty. */
export class KiroMapper implements EventMapper {
  readonly source = 'kiro';

  mapEvent(raw: string): ProjectLintEvent {
    const payload = parsePayload(raw, this.source);
    const eventName = text(payload, 'event') ?? text(payload, 'type') ?? '';
    const kind = Object.hasOwn(EVENT_NAMES, eventName) ? EVENT_NAMES[eventName] : 'unknown';

    return {
      kind,
      source: this.source,
      sessionId: text(payload, 'session_id') ?? UNKNOWN_SESSION,
      timestamp: now(),
      rawKind: eventName,
      filePath: text(payload, 'file') ?? text(payload, 'path'),
      content: text(payload, 'prompt') ?? text(payload, 'content'),
    };
  }

  formatResponse(): string {
    return '';
  }
}
