import type { PipelineAggregateError } from '../errors/PipelineErrors.js';

/** Terminal value of one pipeline run. Exactly one is produced per run. */
export type PipelineResult = { readonly ok: true } | { readonly ok: false; readonly error: PipelineAggregateError };

export const completedResult: PipelineResult = { ok: true };

export function failedResult(error: PipelineAggregateError): PipelineResult {
  return { ok: false, error };
}
