export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message || err.name : String(err);
}

/** Registry misuse: the id is not part of the metric schema. */
export class UnknownMetricError extends Error {
  readonly metricId: string;

  constructor(metricId: string) {
    super(`UNKNOWN_METRIC: ${metricId}`);
    this.name = "UnknownMetricError";
    this.metricId = metricId;
  }
}

/** The parser was handed something that is not backend text. Callers treat this as a defect. */
export class ParseInputError extends Error {
  readonly metricId: string;

  constructor(metricId: string, message: string) {
    super(`PARSE_INPUT: ${message}`);
    this.name = "ParseInputError";
    this.metricId = metricId;
  }
}

export class BackendError extends Error {
  readonly metricId: string;
  readonly timedOut: boolean;

  constructor(metricId: string, message: string, opts: { timedOut?: boolean; cause?: unknown } = {}) {
    super(`BACKEND: ${message}`, { cause: opts.cause });
    this.name = "BackendError";
    this.metricId = metricId;
    this.timedOut = opts.timedOut ?? false;
  }
}

export class ValidationRuleError extends Error {
  readonly ruleId: string;
  readonly metricIds: string[];

  constructor(ruleId: string, metricIds: string[], cause: unknown) {
    super(`RULE_ERROR: ${ruleId} (${errorMessage(cause)})`, { cause });
    this.name = "ValidationRuleError";
    this.ruleId = ruleId;
    this.metricIds = metricIds;
  }
}
