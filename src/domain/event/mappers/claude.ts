import type { HookOutcome } from '../../hook/types.js';
import type { KnownEventKind, ProjectLintEvent } from '../types.js';
import type { EventMapper } from './types.js';
import { UNKNOWN_SESSION, now, object, parsePayload, text } from './payload.js';

const EVENT_NAMES: Readonly<Record<string, KnownEventKind>> = {
  PreToolUse: 'pre_tool_use',
  PostToolUse: 'post_tool_use',
  UserPromptSubmit: 'pre_user_prompt',
  SessionStart: 'session_start',
  SessionEnd: 'session_end',
  Stop: 'stop',
  SubagentStop: 'subagent_stop',
  Notification: 'notification',
  PermissionRequest: 'permission_request',
};

const FILE_TOOLS = new Set(['Read', 'Edit', 'Write', 'MultiEdit']);

export class ClaudeMapper implements EventMapper {
  readonly source = 'claude';

  mapEvent(raw: string): ProjectLintEvent {
    const payload = parsePayload(raw, this.source);
    const hookEventName = text(payload, 'hook_event_name') ?? '';
    const kind = Object.hasOwn(EVENT_NAMES, hookEventName) ? EVENT_NAMES[hookEventName] : 'unknown';

    let filePath: string | undefined;
    let command: string | undefined;
    let content: string | undefined;
    const toolName = text(payload, 'tool_name');
    const input = object(payload, 'tool_input');

    if (kind === 'pre_tool_use' || kind === 'post_tool_use') {
      if (toolName === 'Bash') command = text(input, 'command');
      if (toolName !== undefined && FILE_TOOLS.has(toolName)) filePath = text(input, 'file_path');
      if (toolName === 'Write') content = text(input, 'content');
      if (toolName === 'Edit') content = text(input, 'new_string');
    } else if (kind === 'pre_user_prompt') {
      content = text(payload, 'prompt');
    }

    return {
      kind,
      source: this.source,
      sessionId: text(payload, 'session_id') ?? UNKNOWN_SESSION,
      timestamp: now(),
      rawKind: hookEventName,
      filePath,
      command,
      content,
      toolName,
      cwd: text(payload, 'cwd'),
    };
  }

  formatResponse(outcome: HookOutcome): string {
    const { decision } = outcome;
    const response: Record<string, unknown> = { continue: true };

    if (decision.kind === 'deny') {
      response.continue = false;
      response.stopReason = decision.message;
    } else if (decision.message !== undefined) {
      response.systemMessage = decision.message;
    }

    if (decision.kind !== 'deny' && outcome.rewrittenCommand !== undefined) {
      response.hookSpecificOutput = {
        hookEventName: 'PreToolUse',
        permissionDecision: 'allow',
        updatedInput: { command: outcome.rewrittenCommand },
      };
    }
    return JSON.stringify(response);
  }
}
