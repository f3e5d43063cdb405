const EXPORT_PREFIX = 'job_export';
const EXPORT_EXTENSION = '.csv';

function safeSegment(value: string): string {
  return value
    .trim()
    .replace(/@/g, '_at_')
    .replace(/\./g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Deterministic export file name for a submitter (and optional run)
 * e.g. jane.doe@example.com -> job_export_jane_doe_at_example_com.csv
 */
export function exportFileName(identity?: string, runId?: string): string {
  const parts = [EXPORT_PREFIX];
  if (identity && identity.trim()) parts.push(safeSegment(identity));
  if (runId && runId.trim()) parts.push(safeSegment(runId));
  return `${parts.join('_')}${EXPORT_EXTENSION}`;
}
