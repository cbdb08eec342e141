export type MessagingPlatform = 'matrix';

export interface PlatformRuntime {
  platform: MessagingPlatform;
  start(): Promise<void>;
  /** Ends the sync loop after the current iteration */
  stop(): void;
}
