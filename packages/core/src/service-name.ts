import { z } from 'zod';
import { ArgumentError } from './errors.js';

export const SERVICE_SUFFIX = '.service';

/** Operator-supplied unit name; used as a file name and a systemctl argument. */
export const ServiceName = z
  .string()
  .min(1, 'Service name must not be empty.')
  .refine((name) => !name.includes('\0') && !name.includes('/'), {
    message: 'Service name contains symbols that are not allowed.',
  });
export type ServiceName = z.infer<typeof ServiceName>;

export function validateServiceName(name: string): string {
  const result = ServiceName.safeParse(name);
  if (!result.success) {
    throw new ArgumentError(result.error.issues[0]?.message ?? 'Invalid service name.');
  }
  return result.data;
}

/** Validate and append `.service` when missing. Idempotent. */
export function normalizeServiceName(name: string): string {
  const valid = validateServiceName(name);
  return valid.endsWith(SERVICE_SUFFIX) ? valid : `${valid}${SERVICE_SUFFIX}`;
}
