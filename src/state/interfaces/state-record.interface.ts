/**
 * The only record that survives between runs, one per hostname.
 */
export interface StateRecord {
  hostname: string;
  email: string;
  isStagingEnvironment: boolean;
  /** ISO-8601 timestamp of the run that wrote the record. */
  lastRunTimestamp: string;
  certificateConfirmedPresent: boolean;
}
