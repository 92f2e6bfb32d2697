import { customAlphabet } from 'nanoid';

const suffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 8);

/**
 * New run id of the form `YYYY-MM-DD-<flowId>-<suffix>`. The UTC date prefix
 * keeps ids sortable and decides the run's archive month.
 */
export function createRunId(flowId: string, now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10);
  const flow = flowId.trim().replace(/[^A-Za-z0-9._-]+/g, '-') || 'run';
  return `${date}-${flow}-${suffix()}`;
}
