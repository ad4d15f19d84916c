import { SynthesisFailedError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { ResilientModelClient } from '../router/model-client.js';
import type { TraceSink } from '../run/context.js';
import { parseDraft } from './parse.js';
import { buildCorrectionPrompt } from './prompts.js';
import type { SynthesisDraft } from './schema.js';

const log = getLogger('synthesizer');

export const DEFAULT_SYNTHESIS_ATTEMPTS = 3;

export interface SynthesisAttempt {
  round: number;
  attempt: number;
  outcome: 'parsed' | 'malformed';
  issue?: string;
}

export interface DraftRequest {
  prompt: string;
  /** 1 for the first pass, 2 for the corrective pass after validation. */
  round: number;
  trace: TraceSink;
  abortSignal?: AbortSignal;
}

/**
 * Asks the model for a JSON draft and re-prompts with the malformed output
 * and the parse problem until it parses or the attempts run out. Calls are
 * strictly sequential.
 */
export class Synthesizer {
  constructor(
    private readonly client: ResilientModelClient,
    private readonly attempts: number = DEFAULT_SYNTHESIS_ATTEMPTS,
  ) {}

  async draft(request: DraftRequest): Promise<SynthesisDraft> {
    const { round, trace } = request;
    let prompt = request.prompt;
    let lastIssue = 'no attempt made';

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      const output = await this.client.complete(prompt, undefined, {
        trace,
        step: 'synthesis',
        abortSignal: request.abortSignal,
      });
      const parsed = parseDraft(output);

      const record: SynthesisAttempt = parsed.ok
        ? { round, attempt, outcome: 'parsed' }
        : { round, attempt, outcome: 'malformed', issue: parsed.issue };
      trace.record({ type: 'synthesis', ...record });

      if (parsed.ok) return parsed.draft;

      lastIssue = parsed.issue;
      log.warn({ round, attempt, issue: parsed.issue }, 'synthesis output malformed');
      prompt = buildCorrectionPrompt(request.prompt, output, parsed.issue);
    }

    throw new SynthesisFailedError(this.attempts, lastIssue);
  }
}
