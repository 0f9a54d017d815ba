import type { HookOutcome } from '../../hook/types.js';
import type { KnownEventKind, ProjectLintEvent } from '../types.js';
import type { EventMapper } from './types.js';
import { isTable } from '../../../infra/validator.js';
import { UNKNOWN_SESSION, now, object, parsePayload, text } from './payload.js';
import type { Payload } from './payload.js';

const ACTION_NAMES: Readonly<Record<string, KnownEventKind>> = {
  pre_read_code: 'pre_read_code',
  post_read_code: 'post_read_code',
  pre_write_code: 'pre_write_code',
  post_write_code: 'post_write_code',
  pre_run_command: 'pre_run_command',
  post_run_command: 'post_run_command',
  pre_mcp_tool_use: 'pre_tool_use',
  post_mcp_tool_use: 'post_tool_use',
  pre_user_prompt: 'pre_user_prompt',
  post_cascade_response: 'post_model_response',
};

/** Joins the `new_string` of every edit so content rules see what is about to be written. */
function editedText(toolInfo: Payload | undefined): string | undefined {
  const edits: unknown = toolInfo?.edits;
  if (!Array.isArray(edits)) return undefined;
  const parts = edits
    .filter(isTable)
    .map((edit) => text(edit, 'new_string'))
    .filter((s): s is string => s !== undefined);
  return parts.length > 0 ? parts.join('\n') : undefined;
}

export class WindsurfMapper implements EventMapper {
  readonly source = 'windsurf';

  mapEvent(raw: string): ProjectLintEvent {
    const payload = parsePayload(raw, this.source);
    const actionName = text(payload, 'agent_action_name') ?? '';
    const kind = Object.hasOwn(ACTION_NAMES, actionName) ? ACTION_NAMES[actionName] : 'unknown';
    const toolInfo = object(payload, 'tool_info');

    let filePath: string | undefined;
    let command: string | undefined;
    let content: string | undefined;
    let toolName: string | undefined;
    let cwd: string | undefined;

    switch (kind) {
      case 'pre_read_code':
      case 'post_read_code':
        filePath = text(toolInfo, 'file_path');
        break;
      case 'pre_write_code':
      case 'post_write_code':
        filePath = text(toolInfo, 'file_path');
        content = editedText(toolInfo);
        break;
      case 'pre_run_command':
      case 'post_run_command':
        command = text(toolInfo, 'command_line');
        cwd = text(toolInfo, 'cwd');
        break;
      case 'pre_tool_use':
      case 'post_tool_use':
        toolName = text(toolInfo, 'mcp_tool_name');
        break;
      case 'pre_user_prompt':
        content = text(toolInfo, 'user_prompt');
        break;
      case 'post_model_response':
        content = text(toolInfo, 'response');
        break;
    }

    return {
      kind,
      source: this.source,
      sessionId: text(payload, 'trajectory_id') ?? UNKNOWN_SESSION,
      timestamp: text(payload, 'timestamp') ?? now(),
      rawKind: actionName,
      filePath,
      command,
      content,
      toolName,
      cwd,
    };
  }

  formatResponse(outcome: HookOutcome): string {
    const { decision } = outcome;
    const response: Record<string, unknown> = { decision: decision.kind };
    if (decision.message !== undefined) response.message = decision.message;
    if (decision.kind !== 'deny' && outcome.rewrittenCommand !== undefined) {
      response.modified_input = { command_line: outcome.rewrittenCommand };
    }
    return JSON.stringify(response);
  }
}
