import type { Logger } from "../lib/logger.js";

/** Values the delivery side fills into its message template. */
export interface NotificationContext {
  referenceNumber: string;
  title: string;
  transitionName?: string;
  stateName?: string;
  actorId?: string;
}

export interface NotificationRequest {
  kind: string;
  recordId: string;
  recipients: string[];
  context: NotificationContext;
}

/** Delivery is external; the core only hands requests over. */
export interface Notifier {
  notify(request: NotificationRequest): Promise<void>;
}

/** Writes notification requests to the log. Used when no delivery channel is configured. */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notify(request: NotificationRequest): Promise<void> {
    this.logger.info({ notification: request }, "notification requested");
  }
}

/**
 * Hands a request to the notifier without waiting for it. Delivery failures
 * are logged and never reach the caller.
 */
export function dispatchNotification(
  notifier: Notifier,
  logger: Logger,
  request: NotificationRequest,
): void {
  void Promise.resolve()
    .then(() => notifier.notify(request))
    .catch((err: unknown) => {
      logger.warn({ err, notification: request }, "notification delivery failed");
    });
}
