import type { ZodError } from 'zod';

/** A producer handed the bus a kind/payload pair that fails its schema. */
export class InvalidEventError extends Error {
  constructor(
    readonly kind: string,
    readonly issues: ZodError['issues'],
  ) {
    super(`Invalid ${kind} event: ${issues.map(issue => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ')}`);
    this.name = 'InvalidEventError';
  }
}
