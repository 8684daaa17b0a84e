export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LumenConfig {
  readonly server: ServerConfig;
  readonly bridge: BridgeConfig;
  readonly storage: StorageConfig;
  readonly analyzer: AnalyzerConfig;
  readonly prediction: PredictionConfig;
  readonly automation: AutomationConfig;
  readonly location: LocationConfig;
  readonly adaptive: AdaptiveConfig;
  readonly logging?: LoggingConfig;
}

export interface ServerConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}

export interface BridgeConfig {
  readonly host?: string;
  readonly username?: string;
  readonly pollIntervalMs: number;
  readonly timeoutMs: number;
}

export interface StorageConfig {
  readonly retentionDays: number;
}

export interface AnalyzerConfig {
  readonly minOccurrences: number;
  readonly timeWindowMinutes: number;
  readonly confidenceThreshold: number;
  readonly analysisWindowDays: number;
  /** Local "HH:MM" at which the daily mining run starts. */
  readonly dailyRunTime: string;
}

export interface PredictionConfig {
  readonly minConfidence: number;
  readonly lookaheadMinutes: number;
  readonly recommendationThreshold: number;
}

export interface AutomationConfig {
  /** React to observed events with mined sequence patterns. */
  readonly reactive: boolean;
  readonly dryRun: boolean;
  /** Local "HH:MM" at which sunrise/sunset jobs are recomputed. */
  readonly sunRefreshTime: string;
}

export interface LocationConfig {
  readonly latitude: number;
  readonly longitude: number;
  /** IANA zone; the `Etc/GMT` zone of `utcOffsetMinutes` when none is configured. */
  readonly timezone: string;
  readonly utcOffsetMinutes: number;
}

export interface AdaptiveConfig {
  readonly pollIntervalMs: number;
  readonly errorBackoffMs: number;
  readonly replaceGraceMs: number;
  readonly toleranceLux: number;
  readonly defaults: {
    readonly minBrightness: number;
    readonly maxBrightness: number;
    readonly step: number;
  };
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
