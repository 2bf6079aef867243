/**
 * Reported outcomes, worst first. The index is the precedence: a lower index wins.
 */
export const OUTCOMES = [
  'Failed',
  'Blocked',
  'Paused',
  'Active',
  'NotApplicable',
  'Passed',
  'NeverRun',
] as const;

export type Outcome = (typeof OUTCOMES)[number];

export const NEVER_RUN: Outcome = 'NeverRun';

const RANK = new Map<string, number>(
  OUTCOMES.map((outcome, index) => [outcome.toLowerCase(), OUTCOMES.length - 1 - index])
);

/**
 * Maps a raw status string onto an Outcome. Empty, missing and unrecognized
 * statuses (ADO's "None", "Unspecified", "InProgress", ...) become NeverRun.
 */
export function parseOutcome(raw: string | null | undefined): Outcome {
  if (!raw) {
    return NEVER_RUN;
  }
  const key = raw.trim().toLowerCase();
  return OUTCOMES.find((outcome) => outcome.toLowerCase() === key) ?? NEVER_RUN;
}

export function rankOf(outcome: Outcome): number {
  return RANK.get(outcome.toLowerCase()) ?? 0;
}

/** The higher-precedence outcome; on a tie the first argument. */
export function worse(a: Outcome, b: Outcome): Outcome {
  return rankOf(a) >= rankOf(b) ? a : b;
}

export function reconcile(raws: Iterable<string | null | undefined>): Outcome {
  let result: Outcome = NEVER_RUN;
  for (const raw of raws) {
    result = worse(result, parseOutcome(raw));
  }
  return result;
}

interface OutcomeCarrier {
  outcome?: string | null;
}

export interface PointOutcomeFields {
  outcome?: string | null;
  mostRecentResult?: OutcomeCarrier | null;
  lastTestRun?: OutcomeCarrier | null;
  lastResultDetails?: OutcomeCarrier | null;
}

/**
 * Points expose their latest outcome in one of several places depending on the
 * API revision and tenant. The first non-empty value in this order is used:
 * outcome, mostRecentResult.outcome, lastTestRun.outcome, lastResultDetails.outcome.
 */
export function extractPointOutcome(point: PointOutcomeFields): string | undefined {
  const candidates = [
    point.outcome,
    point.mostRecentResult?.outcome,
    point.lastTestRun?.outcome,
    point.lastResultDetails?.outcome,
  ];
  for (const candidate of candidates) {
    if (candidate) {
      return candidate;
    }
  }
  return undefined;
}
