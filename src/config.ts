/**
 * Configuration loading and credential checks
 */

import * as dotenv from 'dotenv';
import { daysBetween } from './utils/dates';

export const DEFAULT_BASE_URL = 'https://note.com';
export const DEFAULT_TIME_ZONE = 'Asia/Tokyo';
export const DEFAULT_DATA_DIR = 'data';
export const DEFAULT_CRON = '0 9 * * *';

const COOKIE_MIN_LENGTH = 50;
const COOKIE_LIFETIME_DAYS = 90;
const COOKIE_WARNING_DAYS = 10;

export interface StatsConfig {
  readonly cookie: string;
  readonly username?: string;
  readonly cookieSetDate?: string;
  readonly baseUrl: string;
  readonly dataDir: string;
  readonly timeZone: string;
  readonly cron: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the immutable run configuration from an environment map.
 * Pass nothing to read `.env` and `process.env`.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): StatsConfig {
  let source = env;
  if (!source) {
    dotenv.config();
    source = process.env;
  }

  return Object.freeze({
    cookie: source.NOTE_COOKIE?.trim() ?? '',
    username: optional(source.NOTE_USERNAME),
    cookieSetDate: optional(source.COOKIE_SET_DATE),
    baseUrl: optional(source.STATS_BASE_URL) ?? DEFAULT_BASE_URL,
    dataDir: optional(source.STATS_DATA_DIR) ?? DEFAULT_DATA_DIR,
    timeZone: optional(source.STATS_TIME_ZONE) ?? DEFAULT_TIME_ZONE,
    cron: optional(source.STATS_CRON) ?? DEFAULT_CRON,
  });
}

export function maskCookie(cookie: string): string {
  return `${cookie.substring(0, 20)}... (${cookie.length} chars)`;
}

export function describeConfig(config: StatsConfig): string[] {
  return [
    `NOTE_COOKIE = ${maskCookie(config.cookie)}`,
    `NOTE_USERNAME = ${config.username ?? '(not set)'}`,
    `COOKIE_SET_DATE = ${config.cookieSetDate ?? '(not set)'}`,
    `data dir = ${config.dataDir}, time zone = ${config.timeZone}`,
  ];
}

/**
 * Reject credentials that cannot possibly authenticate, before any request is made
 */
export function validateCookie(cookie: string): void {
  if (!cookie) {
    throw new ConfigError('NOTE_COOKIE is empty. Set it in .env or in the scheduler secrets.');
  }
  if (cookie.startsWith('NOTE_COOKIE=')) {
    throw new ConfigError("NOTE_COOKIE contains the 'NOTE_COOKIE=' prefix. Set the value only.");
  }
  if (!cookie.includes('=')) {
    throw new ConfigError(`NOTE_COOKIE is not in key=value form. Starts with: ${cookie.substring(0, 30)}`);
  }
  if (cookie.length < COOKIE_MIN_LENGTH) {
    console.warn(
      `⚠️  NOTE_COOKIE looks short (${cookie.length} chars). If requests fail, copy the complete Cookie header from the browser.`
    );
  }
}

export type CookieExpiryStatus =
  | { state: 'unknown' }
  | { state: 'invalid'; value: string }
  | { state: 'ok' | 'expiring' | 'expired'; daysElapsed: number; daysRemaining: number };

/** Advisory only: nothing stops a run with an old cookie */
export function checkCookieExpiry(cookieSetDate: string | undefined, today: string): CookieExpiryStatus {
  if (!cookieSetDate) return { state: 'unknown' };

  const daysElapsed = daysBetween(cookieSetDate, today);
  if (daysElapsed === undefined) return { state: 'invalid', value: cookieSetDate };

  const daysRemaining = COOKIE_LIFETIME_DAYS - daysElapsed;
  if (daysRemaining <= 0) return { state: 'expired', daysElapsed, daysRemaining };
  if (daysRemaining <= COOKIE_WARNING_DAYS) return { state: 'expiring', daysElapsed, daysRemaining };
  return { state: 'ok', daysElapsed, daysRemaining };
}

export function logCookieExpiry(status: CookieExpiryStatus): void {
  switch (status.state) {
    case 'unknown':
      console.warn('⚠️  COOKIE_SET_DATE is not set. Skipping cookie expiry check.');
      break;
    case 'invalid':
      console.warn(`⚠️  COOKIE_SET_DATE is not a valid YYYY-MM-DD date: ${status.value}`);
      break;
    case 'expired':
      console.warn(`🚨 Cookie may have expired (${status.daysElapsed} days since it was set)`);
      break;
    case 'expiring':
      console.warn(`⚠️  About ${status.daysRemaining} days left before the cookie expires. Refresh it soon.`);
      break;
    case 'ok':
      console.log(`✓ Cookie expiry: about ${status.daysRemaining} days left`);
      break;
  }
}
