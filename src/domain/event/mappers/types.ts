import type { HookOutcome } from '../../hook/types.js';
import type { EventSource, ProjectLintEvent } from '../types.js';

/** Translates one IDE's hook payload into a normalized event, and the outcome back into what that IDE reads. */
export interface EventMapper {
  readonly source: EventSource;
  /** Throws `EventParseError` when `raw` is not a JSON object. */
  mapEvent(raw: string): ProjectLintEvent;
  /** Text for stdout; empty when the IDE reads nothing but the exit status. */
  formatResponse(outcome: HookOutcome): string;
}
