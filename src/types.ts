export type Details = Record<string, unknown>;

/** Outcome of one assertion made by a probe. Never mutated once recorded. */
export interface CheckResult {
  readonly name: string;
  readonly success: boolean;
  readonly message: string;
  readonly details: Readonly<Details>;
  /** Seconds. */
  readonly duration: number;
  /** ISO-8601. */
  readonly timestamp: string;
}

export interface FailedCheck {
  category: string;
  checkName: string;
  message: string;
  details: Readonly<Details>;
  duration: number;
}
