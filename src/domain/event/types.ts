export const EVENT_KINDS = [
  'session_start',
  'session_end',
  'pre_tool_use',
  'post_tool_use',
  'pre_read_code',
  'post_read_code',
  'pre_write_code',
  'post_write_code',
  'pre_run_command',
  'post_run_command',
  'pre_user_prompt',
  'post_model_response',
  'notification',
  'permission_request',
  'stop',
  'subagent_stop',
] as const;

export type KnownEventKind = (typeof EVENT_KINDS)[number];

/** `unknown` is the fallback for payloads no mapper recognises. */
export type EventKind = KnownEventKind | 'unknown';

export function isEventKind(value: string): value is KnownEventKind {
  return (EVENT_KINDS as readonly string[]).includes(value);
}

export function parseEventKind(value: string | undefined): EventKind {
  if (value === undefined) return 'unknown';
  const normalized = value.trim().toLowerCase();
  return isEventKind(normalized) ? normalized : 'unknown';
}

export type EventSource = 'claude' | 'windsurf' | 'kiro' | 'generic';

export interface ProjectLintEvent {
  readonly kind: EventKind;
  readonly source: EventSource;
  readonly sessionId: string;
  readonly timestamp: string;
  /** Name the IDE used for the event, kept for explanations when `kind` is `unknown`. */
  readonly rawKind?: string;
  readonly filePath?: string;
  readonly command?: string;
  readonly content?: string;
  readonly toolName?: string;
  readonly cwd?: string;
}
