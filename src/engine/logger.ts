/**
 * Structured logging for the style engine
 * Consistent "[Component] action" format; entries retained for inspection
 */

import { getEngineConfig } from "../config/engineConfig";
import type { LogEntry, LogLevel } from "../types/resolver.types";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class EngineLogger {
  private entries: LogEntry[] = [];

  info(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("info", component, action, metadata);
  }

  warn(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("warn", component, action, metadata);
  }

  error(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("error", component, action, metadata);
  }

  debug(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("debug", component, action, metadata);
  }

  /**
   * Log with duration since startTime
   */
  timed(
    level: LogLevel,
    component: string,
    action: string,
    startTime: number,
    metadata?: Record<string, unknown>
  ): void {
    const duration = Date.now() - startTime;
    this.log(level, component, action, { ...metadata, duration });
  }

  private log(
    level: LogLevel,
    component: string,
    action: string,
    metadata?: Record<string, unknown>
  ): void {
    const config = getEngineConfig();
    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      component,
      action,
      ...(metadata ? { metadata } : {}),
    };

    this.entries.push(entry);
    if (this.entries.length > config.logCapacity) {
      this.entries.splice(0, this.entries.length - config.logCapacity);
    }

    if (LEVEL_RANK[level] < LEVEL_RANK[config.logLevel]) return;

    const message = `[${component}] ${action}`;
    const logData = metadata ? { ...metadata } : {};

    switch (level) {
      case "info":
        console.log(message, logData);
        break;
      case "warn":
        console.warn(message, logData);
        break;
      case "error":
        console.error(message, logData);
        break;
      case "debug":
        console.debug(message, logData);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

export const engineLogger = new EngineLogger();
