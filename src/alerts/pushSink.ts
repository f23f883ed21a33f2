import type { AxiosInstance } from 'axios';
import { createHttpClient, postJson } from '../core/http.js';

export interface PushNotification {
  alertId: string;
  /** Recipient of the push. */
  userId: string;
  title: string;
  body: string;
  data: Record<string, string>;
}

/** Platform push collaborator: wakes a user whose app holds no live session. */
export interface PushSink {
  deliver(notification: PushNotification): Promise<void>;
}

export class WebhookPushSink implements PushSink {
  private readonly client: AxiosInstance;

  constructor(webhookUrl: string, timeoutMs = 5000, client?: AxiosInstance) {
    this.client = client ?? createHttpClient(webhookUrl, timeoutMs);
  }

  async deliver(notification: PushNotification): Promise<void> {
    await postJson<PushNotification, unknown>(this.client, '', notification);
  }
}

export class ConsolePushSink implements PushSink {
  async deliver(notification: PushNotification): Promise<void> {
    process.stdout.write(
      `${JSON.stringify({ ts: new Date().toISOString(), push: notification.title, ...notification })}\n`
    );
  }
}
