/** Lifecycle of one smart update. */
export type UpdateState = "idle" | "running" | "succeeded" | "retryable-failure" | "fatal-failure";

export type UpdateClassification = "success" | "retryable-mirror" | "retryable-transient" | "fatal";

/** Why an attempt was classified the way it was. */
export type ClassificationReason =
  | "clean-exit"
  | "mirror-signature"
  | "release-missing"
  | "mirror-timeout"
  | "transient-signature"
  | "fatal-signature"
  | "unrecognized-failure";

export interface UpdateAttempt {
  readonly attempt: number;
  readonly mirror: string;
  readonly classification: UpdateClassification;
  readonly reason: ClassificationReason;
  /** The signature that matched, when one did. */
  readonly signature: string | null;
  readonly exitCode: number;
  readonly output: string;
  readonly durationMs: number;
}

export type UpdateFailureReason =
  | "fatal-error"
  | "attempts-exhausted"
  | "no-alternative-mirror"
  | "rerank-failed"
  | "switch-failed"
  | "cancelled";

export interface UpdateResult {
  readonly state: "succeeded" | "fatal-failure";
  readonly succeeded: boolean;
  readonly attempts: readonly UpdateAttempt[];
  /** attempts - 1 */
  readonly retries: number;
  readonly finalMirror: string;
  readonly reason?: UpdateFailureReason;
}

/** Case-insensitive substrings that classify `apt-get update` output. */
export interface SignatureSet {
  readonly fatal: readonly string[];
  readonly mirror: readonly string[];
  readonly transient: readonly string[];
  /** Transient signatures that, on a line naming the mirror's host, blame the mirror. */
  readonly mirrorTimeout: readonly string[];
}
