import type { LogFormat, LogLevel } from '../common/logger';
import type { CustomPatternConfig } from '../detectors/patternDetector';
import type { OverlapStrategy } from '../engine/types';

export interface GuardConfig {
  detectors?: string[];
  policy?: string;
  policyPath?: string;
  overlapStrategy?: OverlapStrategy;
  validateMatches?: boolean;
  customPatterns?: CustomPatternConfig[];
}

export interface ServerConfig {
  host?: string;
  port?: number;
  bodyLimit?: number;
}

export interface LoggingConfig {
  level?: LogLevel;
  format?: LogFormat;
}

export interface PiiVeilConfig {
  guard: GuardConfig;
  server?: ServerConfig;
  logging?: LoggingConfig;
  profiles?: Record<string, Partial<Omit<PiiVeilConfig, 'profiles'>>>;
}
