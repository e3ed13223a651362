import { describeError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import { Match } from '../detectors/types';
import { AnonymizeResult } from '../engine/types';

export interface DetectionEvent {
  match: Match;
  detector: string;
}

export interface AnonymizeEvent {
  text: string;
  /** Detector output before policy filtering and overlap resolution. */
  matches: Match[];
}

export interface AnonymizedEvent {
  text: string;
  /** Matches that received a replacement, left to right. */
  matches: Match[];
  result: AnonymizeResult;
}

export interface HookErrorEvent {
  error: unknown;
  /** Hook that failed, or `anonymize` for a failure of the pipeline itself. */
  stage: GuardHookEvent | 'anonymize';
}

export interface GuardHookMap {
  detection: (event: DetectionEvent) => void;
  /** Returning an event replaces the one passed to later hooks and to the engine. */
  preAnonymize: (event: AnonymizeEvent) => AnonymizeEvent | void;
  /** Returning an event replaces the one passed to later hooks and to the caller. */
  postAnonymize: (event: AnonymizedEvent) => AnonymizedEvent | void;
  error: (event: HookErrorEvent) => void;
}

export type GuardHookEvent = keyof GuardHookMap;

/**
 * Lifecycle callbacks for a guard. A throwing hook never breaks the pipeline:
 * the failure is logged and handed to the `error` hooks.
 */
export class GuardHooks {
  private readonly hooks: { [E in GuardHookEvent]: Array<GuardHookMap[E]> } = {
    detection: [],
    preAnonymize: [],
    postAnonymize: [],
    error: [],
  };

  constructor(private readonly logger: Logger = getLogger('hooks')) {}

  on<E extends GuardHookEvent>(event: E, hook: GuardHookMap[E]): this {
    this.hooks[event].push(hook);
    return this;
  }

  off<E extends GuardHookEvent>(event: E, hook: GuardHookMap[E]): this {
    const registered = this.hooks[event];
    const index = registered.indexOf(hook);
    if (index >= 0) {
      registered.splice(index, 1);
    }
    return this;
  }

  clear(event?: GuardHookEvent): void {
    const events: GuardHookEvent[] = event ? [event] : ['detection', 'preAnonymize', 'postAnonymize', 'error'];
    for (const name of events) {
      this.hooks[name].length = 0;
    }
  }

  count(event: GuardHookEvent): number {
    return this.hooks[event].length;
  }

  emitDetection(event: DetectionEvent): void {
    for (const hook of this.hooks.detection) {
      this.invoke('detection', () => hook(event));
    }
  }

  runPreAnonymize(event: AnonymizeEvent): AnonymizeEvent {
    let current = event;
    for (const hook of this.hooks.preAnonymize) {
      const input = current;
      const replaced = this.invoke('preAnonymize', () => hook(input));
      if (replaced) {
        current = replaced;
      }
    }
    return current;
  }

  runPostAnonymize(event: AnonymizedEvent): AnonymizedEvent {
    let current = event;
    for (const hook of this.hooks.postAnonymize) {
      const input = current;
      const replaced = this.invoke('postAnonymize', () => hook(input));
      if (replaced) {
        current = replaced;
      }
    }
    return current;
  }

  emitError(error: unknown, stage: HookErrorEvent['stage']): void {
    this.logger.warn('Guard stage failed', { stage, error: describeError(error) });
    for (const hook of this.hooks.error) {
      try {
        hook({ error, stage });
      } catch (hookError) {
        // error hooks are not re-entered
        this.logger.warn('Error hook failed', { error: describeError(hookError) });
      }
    }
  }

  private invoke<T>(stage: GuardHookEvent, call: () => T): T | undefined {
    try {
      return call();
    } catch (error) {
      this.emitError(error, stage);
      return undefined;
    }
  }
}
