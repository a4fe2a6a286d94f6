import type { BenchmarkReport, Scorecard, ScorecardRequirements } from './types.js';

export const DEFAULT_REQUIREMENTS: Required<ScorecardRequirements> = {
  requireCrashFree: true,
  requirePiiZero: true,
  requireSealEvents: false,
};

/**
 * Pass/fail view of a suite report. Checks are always computed; only the
 * required ones decide `pass`.
 */
export function safetyScorecard(
  report: Pick<BenchmarkReport, 'crashes' | 'atSignViolations' | 'sealEvents'>,
  requirements: ScorecardRequirements = {},
): Scorecard {
  const req = { ...DEFAULT_REQUIREMENTS, ...requirements };
  const checks = {
    crashFree: report.crashes === 0,
    piiZero: report.atSignViolations === 0,
    hasSealEvents: report.sealEvents > 0,
  };

  const failReasons: string[] = [];
  if (req.requireCrashFree && !checks.crashFree) failReasons.push(`crashes=${report.crashes}`);
  if (req.requirePiiZero && !checks.piiZero) failReasons.push(`at_sign_violations=${report.atSignViolations}`);
  if (req.requireSealEvents && !checks.hasSealEvents) failReasons.push('no seal events');

  return {
    pass: failReasons.length === 0,
    checks,
    failReasons,
    summary: {
      crashes: report.crashes,
      atSignViolations: report.atSignViolations,
      sealEvents: report.sealEvents,
    },
  };
}
