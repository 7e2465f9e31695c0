export type ProbeErrorKind = 'Unreachable' | 'AuthFailed' | 'MalformedResponse' | 'ServerError';

export type UpdateErrorKind =
  | ProbeErrorKind
  | 'ReleaseUnavailable'
  | 'ComparisonIncomparable'
  | 'UpdateCommandFailed'
  | 'RecoveryTimeout'
  | 'VersionUnchanged';

export type OrchestratorState =
  | 'IDLE'
  | 'PROBED'
  | 'UP_TO_DATE'
  | 'NEEDS_UPDATE'
  | 'UPDATE_SENT'
  | 'WAITING_FOR_RECOVERY'
  | 'RECOVERED'
  | 'TIMED_OUT'
  | 'DONE';

/**
 * What an outcome means to an operator. `up_to_date` is "nothing to do",
 * `check_failed` and `undetermined` are "could not check", `update_failed`
 * and `recovery_timeout` are "update attempted and failed".
 */
export type OutcomeStatus =
  | 'up_to_date'
  | 'update_available'
  | 'dry_run'
  | 'updated'
  | 'check_failed'
  | 'undetermined'
  | 'update_failed'
  | 'recovery_timeout';

export interface ReconcileOptions {
  checkOnly?: boolean;
  forceUpdate?: boolean;
  dryRun?: boolean;
  // Seconds; a per-device timeout takes precedence
  timeout?: number;
}

export interface UpdateOutcome {
  ip: string;
  dnsName: string | null;
  success: boolean;
  status: OutcomeStatus;
  message: string;
  currentVersion: string;
  previousVersion: string;
  latestVersion: string;
  needsUpdate: boolean;
  updateStarted: boolean;
  updateCompleted: boolean;
  isMinimal: boolean;
  errorKind?: UpdateErrorKind;
  states: OrchestratorState[];
  elapsedMs: number;
  timeoutSeconds?: number;
}

export interface FleetSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  latestVersion: string;
  options: ReconcileOptions;
  total: number;
  checked: number;
  needsUpdate: number;
  updated: number;
  success: number;
  failed: number;
  outcomes: UpdateOutcome[];
}
