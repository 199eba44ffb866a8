export enum DeployErrorCode {
  MISSING_PREREQUISITE = 'MISSING_PREREQUISITE',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  GIT_CLONE_FAILED = 'GIT_CLONE_FAILED',
  NO_BUILD_MANIFEST = 'NO_BUILD_MANIFEST',
  SSH_FAILED = 'SSH_FAILED',
  REMOTE_EXEC_FAILED = 'REMOTE_EXEC_FAILED',
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  CLEANUP_FAILED = 'CLEANUP_FAILED',
  DEPLOY_FAILED = 'DEPLOY_FAILED',
  HEALTH_CHECK_FAILED = 'HEALTH_CHECK_FAILED',
}

// Process exit codes. 10 prerequisites, 20 validation, 30 ssh, 40 remote exec, 50 deploy/runtime.
export const EXIT_CODES: Readonly<Record<DeployErrorCode, number>> = {
  [DeployErrorCode.MISSING_PREREQUISITE]: 10,
  [DeployErrorCode.VALIDATION_FAILED]: 20,
  [DeployErrorCode.GIT_CLONE_FAILED]: 20,
  [DeployErrorCode.NO_BUILD_MANIFEST]: 20,
  [DeployErrorCode.SSH_FAILED]: 30,
  [DeployErrorCode.REMOTE_EXEC_FAILED]: 40,
  [DeployErrorCode.TRANSFER_FAILED]: 40,
  [DeployErrorCode.CLEANUP_FAILED]: 40,
  [DeployErrorCode.DEPLOY_FAILED]: 50,
  [DeployErrorCode.HEALTH_CHECK_FAILED]: 50,
};

export const EXIT_SUCCESS = 0;
export const EXIT_UNEXPECTED = 50;

export class DeployError extends Error {
  readonly code: DeployErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DeployErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DeployError';
    this.code = code;
    this.context = context;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export function exitCodeFor(err: unknown): number {
  return err instanceof DeployError ? err.exitCode : EXIT_UNEXPECTED;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
