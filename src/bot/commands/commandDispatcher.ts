import type { CommandBinding, CommandRegistry } from './commandRegistry.js';
import { matchCommand } from './commandMatcher.js';
import type { ConversationKind, Envelope } from './envelope.js';
import { HandlerError, HandlerTimeoutError } from './errors.js';

// Longest delay setTimeout honours; larger values fire after 1 ms.
export const MAX_HANDLER_TIMEOUT_MS = 2147483647;

export type DispatchOutcome =
  | { status: 'handled'; trigger: string; params: string[] }
  | { status: 'ignored' }
  | { status: 'rejected'; trigger: string; scope: ConversationKind }
  | { status: 'failed'; error: HandlerError };

export interface DispatcherOptions {
  /** 0 or unset runs handlers without a deadline. */
  handlerTimeoutMs?: number;
  debug?: boolean;
}

export class CommandDispatcher {
  private readonly handlerTimeoutMs: number;
  private readonly debug: boolean;

  constructor(
    private readonly registry: CommandRegistry,
    options: DispatcherOptions = {},
  ) {
    this.handlerTimeoutMs = Math.min(
      Math.max(0, options.handlerTimeoutMs ?? 0),
      MAX_HANDLER_TIMEOUT_MS,
    );
    this.debug = options.debug ?? false;
  }

  /** Never rejects: handler failures come back as a 'failed' outcome. */
  async dispatch(envelope: Envelope): Promise<DispatchOutcome> {
    const match = matchCommand(envelope, this.registry);

    if (match.kind === 'no-match') {
      return this.report(envelope, { status: 'ignored' });
    }

    if (match.kind === 'scope-rejected') {
      return this.report(envelope, {
        status: 'rejected',
        trigger: match.trigger,
        scope: envelope.conversationKind,
      });
    }

    try {
      await this.invoke(match.binding, match.trigger, envelope, match.params);
    } catch (err) {
      const error = new HandlerError(match.trigger, err);
      console.error(`[DISPATCH] Command "${match.trigger}" failed:`, err);
      return this.report(envelope, { status: 'failed', error });
    }

    return this.report(envelope, {
      status: 'handled',
      trigger: match.trigger,
      params: match.params,
    });
  }

  private async invoke(
    binding: CommandBinding,
    trigger: string,
    envelope: Envelope,
    params: string[],
  ): Promise<void> {
    // Each handler gets its own copy so one cannot alter what the outcome reports.
    const run = binding.handler(envelope, [...params]);
    if (!this.handlerTimeoutMs) {
      await run;
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new HandlerTimeoutError(trigger, this.handlerTimeoutMs)),
        this.handlerTimeoutMs,
      );
    });
    try {
      await Promise.race([run, deadline]);
    } catch (err) {
      if (err instanceof HandlerTimeoutError) {
        run.catch((late) => {
          console.error(`[DISPATCH] Command "${trigger}" failed after timing out:`, late);
        });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private report(envelope: Envelope, outcome: DispatchOutcome): DispatchOutcome {
    if (this.debug) {
      const detail = describeOutcome(outcome);
      console.log(
        `[DISPATCH] ${envelope.conversationKind}/${envelope.senderId} -> ${outcome.status}` +
          (detail ? ` ${detail}` : ''),
      );
    }
    return outcome;
  }
}

function describeOutcome(outcome: DispatchOutcome): string {
  switch (outcome.status) {
    case 'handled':
      return `trigger=${outcome.trigger} params=${outcome.params.length}`;
    case 'rejected':
      return `trigger=${outcome.trigger} scope=${outcome.scope}`;
    case 'failed':
      return `trigger=${outcome.error.trigger}`;
    case 'ignored':
      return '';
  }
}
