import { Response } from 'express';
import { AdmissionOutcome, OutcomeStatus } from '../types';

export const STATUS_CODES: Record<OutcomeStatus, number> = {
  ok: 200,
  bad_request: 400,
  rate_limited: 429,
  overloaded: 503,
  internal_error: 500,
};

/**
 * Write an outcome as JSON, quota headers included
 */
export function sendOutcome<T>(res: Response, outcome: AdmissionOutcome<T>): void {
  res.set(outcome.headers);
  res.status(STATUS_CODES[outcome.status]).json(outcome.body);
}
