import type { ActivitySource } from "../shared/types.js";

export type ErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "CONFIG_INVALID"
  | "PROPOSAL_APPLY_CONFLICT"
  | "REVIEW_TARGET_NOT_FOUND"
  | "STORE_CORRUPT"
  | "ROADMAP_EDIT_INVALID"
  | "LOCK_HELD";

export class DaybookError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Soft failure: one source (or part of one) could not be read. */
export class SourceUnavailable extends DaybookError {
  readonly source: ActivitySource;
  readonly path: string | null;

  constructor(source: ActivitySource, message: string, path: string | null = null) {
    super("SOURCE_UNAVAILABLE", message);
    this.source = source;
    this.path = path;
  }
}

/** Fatal: the configuration cannot be used. Raised before any collection. */
export class ConfigInvalid extends DaybookError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_INVALID", issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.issues = issues;
  }
}

export class ProposalApplyConflict extends DaybookError {
  readonly proposalId: string;

  constructor(proposalId: string, message: string) {
    super("PROPOSAL_APPLY_CONFLICT", message);
    this.proposalId = proposalId;
  }
}

export class ReviewTargetNotFound extends DaybookError {
  readonly target: string;

  constructor(target: string) {
    super("REVIEW_TARGET_NOT_FOUND", `Proposal not found: ${target}`);
    this.target = target;
  }
}

/** A persisted store file exists but cannot be parsed or fails validation. */
export class StoreCorrupt extends DaybookError {
  readonly file: string;

  constructor(file: string, detail: string) {
    super("STORE_CORRUPT", `Cannot read ${file}: ${detail}`);
    this.file = file;
  }
}

/** A manual roadmap edit names a missing theme or would break an invariant. */
export class RoadmapEditInvalid extends DaybookError {
  constructor(message: string) {
    super("ROADMAP_EDIT_INVALID", message);
  }
}

export class LockHeld extends DaybookError {
  readonly lockFile: string;

  constructor(lockFile: string, holder: string) {
    super("LOCK_HELD", `Another daybook process holds ${lockFile} (${holder})`);
    this.lockFile = lockFile;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
