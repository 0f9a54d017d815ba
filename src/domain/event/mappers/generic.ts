import { EventParseError } from '../../../infra/errors.js';
import type { HookOutcome } from '../../hook/types.js';
import { parseEventKind } from '../types.js';
import type { ProjectLintEvent } from '../types.js';
import type { EventMapper } from './types.js';
import { UNKNOWN_SESSION, now, parsePayload, text } from './payload.js';

/**
 * Accepts events already in the normalized shape, with either snake_case or
 * camelCase keys, and answers with the outcome itself.
 */
export class GenericMapper implements EventMapper {
  readonly source = 'generic';

  mapEvent(raw: string): ProjectLintEvent {
    const payload = parsePayload(raw, this.source);
    const rawKind = text(payload, 'kind') ?? text(payload, 'event_kind');
    if (rawKind === undefined) throw new EventParseError(this.source, 'missing "kind"');

    return {
      kind: parseEventKind(rawKind),
      source: this.source,
      sessionId: text(payload, 'session_id') ?? text(payload, 'sessionId') ?? UNKNOWN_SESSION,
      timestamp: text(payload, 'timestamp') ?? now(),
      rawKind,
      filePath: text(payload, 'file_path') ?? text(payload, 'filePath'),
      command: text(payload, 'command'),
      content: text(payload, 'content'),
      toolName: text(payload, 'tool_name') ?? text(payload, 'toolName'),
      cwd: text(payload, 'cwd'),
    };
  }

  formatResponse(outcome: HookOutcome): string {
    const response: Record<string, unknown> = { decision: outcome.decision.kind };
    if (outcome.decision.message !== undefined) response.message = outcome.decision.message;
    if (outcome.rewrittenCommand !== undefined) response.rewritten_command = outcome.rewrittenCommand;
    return JSON.stringify(response);
  }
}
