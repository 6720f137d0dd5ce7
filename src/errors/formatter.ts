import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Detail lines for an error, beyond its message.
 * Never includes credential material or environment values.
 */
export function appErrorDetails(error: AppError): readonly string[] {
  switch (error._tag) {
    case 'ConfigInvalid':
      return error.issues.length > 1 ? error.issues.map((i) => `${i.path}: ${i.message}`) : [];

    case 'CredentialRequestFailed':
      return error.reason === 'rejected' && error.cause !== undefined
        ? [`Cause: ${safeToString(error.cause)}`]
        : [];

    case 'InvalidEnviron':
      return [`Entry without '=': ${error.entry.length > 40 ? `${error.entry.slice(0, 40)}...` : error.entry}`];

    case 'CommandFailed':
      return [];

    default:
      return assertNever(error);
  }
}

export function formatAppError(error: AppError): string {
  const details = appErrorDetails(error);
  return details.length ? `${error.message}\n\n${details.map((d) => `  - ${d}`).join('\n')}` : error.message;
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
