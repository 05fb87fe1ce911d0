export type NotificationLevel = "info" | "warning" | "error";

export interface Notification {
  level: NotificationLevel;
  title: string;
  body: string;
}

export interface Notifier {
  readonly enabled: boolean;
  send(notification: Notification): Promise<void>;
}
