import type { z } from 'zod';
import { ServicescapeError, ErrorCode } from '../errors.js';

type Issue = z.ZodError['issues'][number];

/** `  1. services.0.info.name: must not be empty`, one line per issue. */
export function formatIssues(issues: readonly Issue[]): string {
  return issues
    .map((issue, idx) => {
      const path = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
      return `  ${String(idx + 1)}. ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Parses `data` or throws INPUT_INVALID. The issue list goes into both
 * messages so the CLI can show it without a stack trace.
 */
export function validate<T>(schema: z.ZodType<T>, data: unknown, source = 'input'): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const { issues } = result.error;
  const listing = formatIssues(issues);
  throw new ServicescapeError(
    `Invalid ${source}:\n${listing}`,
    ErrorCode.INPUT_INVALID,
    `Invalid ${source} (${String(issues.length)} problem${issues.length === 1 ? '' : 's'}):\n${listing}`,
    { source, issueCount: issues.length }
  );
}
