/**
 * Benchmark module — seeded suites, fixed profiles and stress runs.
 */

export { BenchmarkRunner, BENCHMARK_DEFAULTS, emptyDecisionCounts } from './runner.js';
export { BenchmarkReporter } from './reporter.js';
export { safetyScorecard, DEFAULT_REQUIREMENTS } from './scorecard.js';
export { BENCHMARK_PROFILES, getProfile, getProfileNames, deriveRates, runProfiles } from './profiles.js';
export {
  StressRunner,
  ARL_FILE_SUFFIX,
  drawFaults,
  incidentFileName,
  topKey,
  writeStressOutputs,
  type StressOutputPaths,
  type StressRunnerOptions,
} from './stress.js';
export { StressConfigSchema } from './types.js';
export type {
  BenchmarkConfig,
  BenchmarkReport,
  BenchmarkProfile,
  DerivedRates,
  ProfileResult,
  Scorecard,
  ScorecardRequirements,
  StressConfig,
  StressConfigInput,
  StressIncident,
  StressReport,
  StressRunSummary,
} from './types.js';
