import { describe, it, expect } from 'vitest';
import { exportFileName } from '../../src/utils/filename';

describe('exportFileName', () => {
  it('uses a fixed name without an identity', () => {
    expect(exportFileName()).toBe('job_export.csv');
  });

  it('derives a safe name from an email address', () => {
    expect(exportFileName('jane.doe@example.com')).toBe('job_export_jane_doe_at_example_com.csv');
  });

  it('appends the run identifier', () => {
    expect(exportFileName('jane@example.com', '2026-03-10')).toBe(
      'job_export_jane_at_example_com_2026-03-10.csv'
    );
  });

  it('replaces characters that are unsafe in file names', () => {
    expect(exportFileName('a b/c')).toBe('job_export_a_b_c.csv');
  });

  it('is deterministic', () => {
    expect(exportFileName('jane@example.com')).toBe(exportFileName('jane@example.com'));
  });
});
