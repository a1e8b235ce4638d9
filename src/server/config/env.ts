/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults.
 * Invalid values are collected and reported together.
 */

// Load dotenv early so every module sees the variables from .env
import * as dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import { ServiceConfigurationError } from '../utils/serviceErrors.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function optionalEnv(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export type NodeEnv = 'development' | 'production' | 'test';
export type FileNaming = 'source' | 'timestamp';

export const DEFAULT_CURRICULUM_URL = 'https://abit.itmo.ru/program/master/ai';
export const DEFAULT_PDF_LINK_PATTERN = '\\.pdf(?:$|[?#])';

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;
  HOST: string;

  // Artifact Store
  DATA_DIR: string;

  // Fetcher Configuration
  CURRICULUM_URL: string;
  PDF_LINK_PATTERN: RegExp;
  PDF_LINK_TEXT?: string;
  BROWSER_EXECUTABLE_PATH?: string;
  BROWSER_LOCALE: string;
  NAVIGATION_TIMEOUT_MS: number;
  DOWNLOAD_TIMEOUT_MS: number;
  FILE_NAMING: FileNaming;

  // Bot Configuration
  TELEGRAM_BOT_TOKEN?: string;
  TELEGRAM_API_URL: string;
  BOT_POLL_TIMEOUT_SECONDS: number;
  BOT_ERROR_DELAY_MS: number;

  // Logging Configuration
  LOG_LEVEL?: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If any variable holds an invalid value
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (validatedEnv && source === process.env) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = source.NODE_ENV || 'development';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(source.PORT, 8000);
  if (port < 0 || port > 65535) {
    errors.push(`PORT: Invalid value "${source.PORT}". Must be between 0 and 65535.`);
  }

  const curriculumUrl = optionalEnv(source.CURRICULUM_URL) ?? DEFAULT_CURRICULUM_URL;
  try {
    new URL(curriculumUrl);
  } catch {
    errors.push(`CURRICULUM_URL: Invalid URL "${curriculumUrl}".`);
  }

  let pdfLinkPattern = new RegExp(DEFAULT_PDF_LINK_PATTERN, 'i');
  const rawPattern = optionalEnv(source.PDF_LINK_PATTERN);
  if (rawPattern) {
    try {
      pdfLinkPattern = new RegExp(rawPattern, 'i');
    } catch {
      errors.push(`PDF_LINK_PATTERN: Invalid regular expression "${rawPattern}".`);
    }
  }

  const fileNaming = source.FILE_NAMING || 'source';
  if (fileNaming !== 'source' && fileNaming !== 'timestamp') {
    errors.push(`FILE_NAMING: Invalid value "${fileNaming}". Must be source or timestamp.`);
  }

  const navigationTimeout = parseNumericEnv(source.NAVIGATION_TIMEOUT_MS, 60_000);
  const downloadTimeout = parseNumericEnv(source.DOWNLOAD_TIMEOUT_MS, 30_000);
  if (navigationTimeout <= 0) {
    errors.push(`NAVIGATION_TIMEOUT_MS: Invalid value "${source.NAVIGATION_TIMEOUT_MS}". Must be positive.`);
  }
  if (downloadTimeout <= 0) {
    errors.push(`DOWNLOAD_TIMEOUT_MS: Invalid value "${source.DOWNLOAD_TIMEOUT_MS}". Must be positive.`);
  }

  // Telegram caps long polling at 50 seconds
  const pollTimeout = parseNumericEnv(source.BOT_POLL_TIMEOUT_SECONDS, 30);
  if (pollTimeout < 0 || pollTimeout > 50) {
    errors.push(`BOT_POLL_TIMEOUT_SECONDS: Invalid value "${source.BOT_POLL_TIMEOUT_SECONDS}". Must be between 0 and 50.`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  const env: Env = {
    NODE_ENV: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',
    PORT: port,
    HOST: optionalEnv(source.HOST) ?? '127.0.0.1',
    DATA_DIR: path.resolve(optionalEnv(source.DATA_DIR) ?? 'data'),
    CURRICULUM_URL: curriculumUrl,
    PDF_LINK_PATTERN: pdfLinkPattern,
    PDF_LINK_TEXT: source.PDF_LINK_TEXT === undefined ? 'учебный план' : optionalEnv(source.PDF_LINK_TEXT),
    BROWSER_EXECUTABLE_PATH: optionalEnv(source.BROWSER_EXECUTABLE_PATH) ?? optionalEnv(source.PUPPETEER_EXECUTABLE_PATH),
    BROWSER_LOCALE: optionalEnv(source.BROWSER_LOCALE) ?? 'ru-RU',
    NAVIGATION_TIMEOUT_MS: navigationTimeout,
    DOWNLOAD_TIMEOUT_MS: downloadTimeout,
    FILE_NAMING: fileNaming === 'timestamp' ? 'timestamp' : 'source',
    TELEGRAM_BOT_TOKEN: optionalEnv(source.TELEGRAM_BOT_TOKEN),
    TELEGRAM_API_URL: optionalEnv(source.TELEGRAM_API_URL) ?? 'https://api.telegram.org',
    BOT_POLL_TIMEOUT_SECONDS: pollTimeout,
    BOT_ERROR_DELAY_MS: parseNumericEnv(source.BOT_ERROR_DELAY_MS, 3000),
    LOG_LEVEL: optionalEnv(source.LOG_LEVEL),
  };

  if (source === process.env) {
    validatedEnv = env;
  }
  return env;
}

/**
 * Get validated environment (validates on first call)
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * The bot token is only required by the bot process
 * @throws {ServiceConfigurationError} If TELEGRAM_BOT_TOKEN is not set
 */
export function requireBotToken(env: Env = getEnv()): string {
  if (!env.TELEGRAM_BOT_TOKEN) {
    throw new ServiceConfigurationError('Telegram bot', ['TELEGRAM_BOT_TOKEN']);
  }
  return env.TELEGRAM_BOT_TOKEN;
}
