import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { HitlChoice, HitlMode } from '../core/types.js';
import { ConfigError } from '../core/errors.js';
import { hashFraction } from '../utils/crypto.js';
import type { HitlRequest, HitlResolver } from './types.js';

export interface SeededResolverOptions {
  seed: number;
  /** Probability of CONTINUE, in [0, 1]. */
  pContinue: number;
}

/**
 * Deterministic and stateless: the choice is a function of
 * (seed, runId, taskId), so reusing the resolver across runs does not drift.
 */
export function createSeededResolver(options: SeededResolverOptions): HitlResolver {
  const { seed, pContinue } = options;
  if (!Number.isFinite(pContinue) || pContinue < 0 || pContinue > 1) {
    throw new ConfigError(`pContinue must be within [0, 1] (got ${pContinue})`);
  }
  return (request: HitlRequest): HitlChoice => {
    const x = hashFraction(`${seed}|${request.runId}|${request.taskId}`);
    return x < pContinue ? 'CONTINUE' : 'STOP';
  };
}

export function createConstantResolver(choice: HitlChoice): HitlResolver {
  return () => choice;
}

/**
 * Answers from a fixed script, in order; once the script runs out every
 * request gets `fallback`.
 */
export function createScriptedResolver(choices: readonly HitlChoice[], fallback: HitlChoice = 'STOP'): HitlResolver & { calls: HitlRequest[] } {
  const queue = [...choices];
  const calls: HitlRequest[] = [];
  const resolver = (request: HitlRequest): HitlChoice => {
    calls.push(request);
    return queue.shift() ?? fallback;
  };
  return Object.assign(resolver, { calls });
}

export interface InteractiveResolverOptions {
  input?: Readable;
  output?: Writable;
  /** Invalid answers tolerated before failing closed to STOP. */
  maxTries?: number;
}

export function parseHitlAnswer(answer: string): HitlChoice | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === 'c' || normalized === 'continue') return 'CONTINUE';
  if (normalized === 's' || normalized === 'stop') return 'STOP';
  return null;
}

/**
 * Prompt on a terminal. One line reader serves every request, so answers
 * piped ahead of time are consumed in order. Closed input or too many
 * invalid answers → STOP, and once the input has ended every later request
 * is answered STOP without prompting.
 */
export function createInteractiveResolver(options: InteractiveResolverOptions = {}): HitlResolver & { close(): void } {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const maxTries = options.maxTries ?? 5;

  let rl: readline.Interface | undefined;
  let lines: AsyncIterator<string> | undefined;
  let ended = false;

  const close = (): void => {
    ended = true;
    lines = undefined;
    rl?.close();
    rl = undefined;
  };

  const nextLine = async (): Promise<string | null> => {
    if (ended) return null;
    if (!lines) {
      rl = readline.createInterface({ input, terminal: false });
      lines = rl[Symbol.asyncIterator]();
    }
    const next = await lines.next();
    if (next.done) {
      close();
      return null;
    }
    return next.value;
  };

  const resolver = async (request: HitlRequest): Promise<HitlChoice> => {
    if (ended) return 'STOP';
    const question =
      `[HITL] run_id=${request.runId} task_id=${request.taskId} layer=${request.layer} ` +
      `reason=${request.reasonCode} -> (c=CONTINUE / s=STOP): `;
    for (let i = 0; i < maxTries; i++) {
      output.write(question);
      const line = await nextLine();
      if (line === null) return 'STOP';
      const choice = parseHitlAnswer(line);
      if (choice) return choice;
      output.write("Invalid input. Please enter 'c' or 's'.\n");
    }
    return 'STOP';
  };

  return Object.assign(resolver, { close });
}

export interface ResolverSettings {
  mode: HitlMode;
  seed: number;
  pContinue: number;
}

/** Resolver for a configured HITL mode. `none` leaves every pause pending. */
export function resolverForMode(settings: ResolverSettings, interactive: InteractiveResolverOptions = {}): HitlResolver | undefined {
  switch (settings.mode) {
    case 'seeded':
      return createSeededResolver({ seed: settings.seed, pContinue: settings.pContinue });
    case 'interactive':
      return createInteractiveResolver(interactive);
    case 'continue':
      return createConstantResolver('CONTINUE');
    case 'stop':
      return createConstantResolver('STOP');
    case 'none':
      return undefined;
  }
}
