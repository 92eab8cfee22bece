export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or unreadable configuration. Fatal at startup, rejected on reload. */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'CONFIG_INVALID', issues.length > 0 ? { issues } : undefined);
  }
}

export class SampleError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SAMPLE_INVALID', details);
  }
}

export class NotificationError extends AppError {
  constructor(
    message: string,
    public readonly channel: string,
    public readonly cause?: unknown
  ) {
    super(message, 'NOTIFICATION_FAILED', { channel });
  }
}
