import { InvariantError } from '../core/errors.js';
import { rowsHaveAtSign } from '../audit/redact.js';
import { verdictViolations } from '../policy/lattice.js';
import type { SimulationResult } from './types.js';

export function assertNoArtifactsForBlockedTasks(result: SimulationResult): void {
  const offenders = result.tasks
    .filter(task => task.decision !== 'RUN' && task.artifactPath !== null)
    .map(task => `${task.taskId} (${task.decision})`);
  if (offenders.length > 0) {
    throw new InvariantError(`Artifacts written for blocked tasks: ${offenders.join(', ')}`, offenders);
  }
}

/**
 * Every safety property a finished run must satisfy. Empty when the run is clean.
 */
export function runInvariantViolations(result: SimulationResult): string[] {
  const problems: string[] = [];

  for (const task of result.tasks) {
    if (task.decision !== 'RUN' && task.artifactPath !== null) {
      problems.push(`${task.taskId}: artifact written for ${task.decision} task`);
    }
    if (task.decision === 'RUN' && task.artifactPath === null) {
      problems.push(`${task.taskId}: RUN task has no artifact`);
    }
  }

  result.rows.forEach((row, index) => {
    for (const problem of verdictViolations(row.layer, {
      decision: row.decision,
      sealed: row.sealed,
      overrideable: row.overrideable,
      finalDecider: row.final_decider,
    })) {
      problems.push(`row ${index} (${row.event}): ${problem}`);
    }
  });

  if (rowsHaveAtSign(result.rows)) {
    problems.push("audit rows contain '@'");
  }

  return problems;
}

export function assertRunInvariants(result: SimulationResult): void {
  const problems = runInvariantViolations(result);
  if (problems.length > 0) {
    throw new InvariantError(`Run ${result.runId} broke ${problems.length} invariant(s): ${problems[0]}`, problems);
  }
}
