import { promises as fs } from 'fs';

export type NavigationSettings = {
  userAgent: string;
  fetchTimeoutMs: number;
  debugLogsEnabled: boolean;
  debugLogFile: string | null;
};

export const DEFAULT_USER_AGENT = 'DragonFly/1.0';
export const MIN_FETCH_TIMEOUT_MS = 1000;
export const MAX_FETCH_TIMEOUT_MS = 120000;

export const DEFAULT_NAVIGATION_SETTINGS: NavigationSettings = {
  userAgent: DEFAULT_USER_AGENT,
  fetchTimeoutMs: 15000,
  debugLogsEnabled: false,
  debugLogFile: null,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function normalizeUserAgent(value: unknown): string {
  if (typeof value !== 'string') return DEFAULT_NAVIGATION_SETTINGS.userAgent;

  const normalized = value.trim();
  if (!normalized) return DEFAULT_NAVIGATION_SETTINGS.userAgent;

  return normalized;
}

function normalizeFetchTimeoutMs(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return DEFAULT_NAVIGATION_SETTINGS.fetchTimeoutMs;
  }

  const rounded = Math.floor(value);
  return Math.min(Math.max(rounded, MIN_FETCH_TIMEOUT_MS), MAX_FETCH_TIMEOUT_MS);
}

function normalizeDebugLogFile(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const normalized = value.trim();
  return normalized || null;
}

export function normalizeNavigationSettings(value: unknown): NavigationSettings {
  if (!isRecord(value)) return { ...DEFAULT_NAVIGATION_SETTINGS };

  return {
    userAgent: normalizeUserAgent(value.userAgent),
    fetchTimeoutMs: normalizeFetchTimeoutMs(value.fetchTimeoutMs),
    debugLogsEnabled:
      typeof value.debugLogsEnabled === 'boolean'
        ? value.debugLogsEnabled
        : DEFAULT_NAVIGATION_SETTINGS.debugLogsEnabled,
    debugLogFile: normalizeDebugLogFile(value.debugLogFile),
  };
}

/**
 * Reads settings from a JSON file. A missing or malformed file yields the
 * defaults rather than an error.
 */
export async function loadNavigationSettings(filePath: string): Promise<NavigationSettings> {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return normalizeNavigationSettings(parsed);
  } catch {
    return { ...DEFAULT_NAVIGATION_SETTINGS };
  }
}

export function getRequestHeaders(settings: NavigationSettings): Record<string, string> {
  return {
    'User-Agent': settings.userAgent,
  };
}
