/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Airnet logger - consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that abort model assembly or evaluation
 * - warn: Always logged - accepted but suspicious input (overwritten names, self links)
 * - info: Logged when AIRNET_DEBUG is set - assembly milestones
 * - debug: Logged when AIRNET_DEBUG is set - per-record and per-law detail
 *
 * Enable debug logging with the AIRNET_DEBUG=true environment variable.
 */

import { isDebugEnabled } from './config.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component/module name (e.g., 'Model', 'ElementFactory', 'Doorway') */
  component: string;
  /** Operation being performed (e.g., 'resolveLinks', 'calculate') */
  operation?: string;
  /** Node, link or element name if applicable */
  name?: string;
  /** Element type tag if applicable */
  elementType?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.name !== undefined) {
    prefix += ` '${ctx.name}'`;
  }
  if (ctx.elementType) {
    prefix += ` (${ctx.elementType})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    /**
     * Log an error - always visible in console
     */
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}:`, formatError(error), ctx.data);
        } else {
          console.error(`${prefix} ${message}:`, formatError(error));
        }
      } else if (ctx?.data !== undefined) {
        console.error(`${prefix} ${message}`, ctx.data);
      } else {
        console.error(`${prefix} ${message}`);
      }
    },

    /**
     * Log a warning - always visible in console
     */
    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message, data, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },
  };
}
