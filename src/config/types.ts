export interface DecoyConfig {
  readonly gateway: GatewayConfig;
  readonly sessions: SessionsConfig;
  readonly reporter: ReporterConfig;
  readonly logging: LoggingConfig;
}

export interface GatewayConfig {
  readonly port: number;
  readonly hostname: string;
  /** When set, every /api/* route requires a matching x-api-key header. */
  readonly apiKey?: string;
}

export interface SessionDefaults {
  readonly channel: string;
  readonly language: string;
  readonly locale: string;
}

export interface SessionsConfig {
  /** Flag count at which a session becomes a confirmed scam. */
  readonly confirmThreshold: number;
  /** A turn is flagged when the scorer's confidence is strictly above this. */
  readonly flagConfidence: number;
  readonly timeoutMs: number;
  readonly sweepIntervalMs: number;
  readonly defaults: SessionDefaults;
  readonly fallbackReply: string;
}

export interface ReporterConfig {
  readonly enabled: boolean;
  readonly endpoint: string;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
