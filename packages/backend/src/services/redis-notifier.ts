/**
 * Redis Notifier
 * Publishes workflow notifications on a Redis channel for whoever listens
 */

import type { Notifier, WorkflowNotification } from '@packsync/sync-engine';

/** The part of an ioredis connection the notifier needs */
export interface NotificationPublisher {
  publish(channel: string, message: string): Promise<number>;
}

export class RedisNotifier implements Notifier {
  constructor(
    private readonly redis: NotificationPublisher,
    private readonly channel: string
  ) {}

  async notify(notification: WorkflowNotification): Promise<void> {
    const message = JSON.stringify({
      ...notification,
      timestamp: notification.timestamp.toISOString(),
    });
    await this.redis.publish(this.channel, message);
  }
}
