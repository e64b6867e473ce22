export { runCohortCli } from './cohortCli';
export type { CohortCliOptions } from './cohortCli';
