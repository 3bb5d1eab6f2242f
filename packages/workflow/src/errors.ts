/**
 * @tessera/workflow — Error types.
 */

export type SyncDataErrorCode = "KEY_NOT_FOUND" | "INVALID_VALUE";

export class SyncDataError extends Error {
  constructor(
    public readonly code: SyncDataErrorCode,
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = "SyncDataError";
  }
}

export type WorkflowErrorCode =
  | "INVALID_PAYLOAD"
  | "NOT_A_PARTICIPANT"
  | "NO_MAJORITY_VALUE"
  | "WORKFLOW_FINISHED"
  | "NO_TRANSITION"
  | "POST_CONDITION_FAILED"
  | "PERIOD_NOT_FINISHED";

export class WorkflowError extends Error {
  constructor(
    public readonly code: WorkflowErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}

/**
 * Raised while a workflow is being defined, never while it runs.
 */
export class WorkflowDefinitionError extends Error {
  constructor(public readonly problems: readonly string[]) {
    super(`Invalid workflow definition:\n  - ${problems.join("\n  - ")}`);
    this.name = "WorkflowDefinitionError";
  }
}
