import type { NotificationErrorCode } from '@/domain/notifications/types';

/**
 * Per-request failure. The worker logs it and moves on to the next item.
 */
export class NotificationError extends Error {
  constructor(
    public readonly code: NotificationErrorCode,
    message: string,
    public readonly target?: string,
  ) {
    super(message);
    this.name = 'NotificationError';
  }
}

export function isNotificationError(error: unknown): error is NotificationError {
  return error instanceof NotificationError;
}
