/**
 * Tool Paths Configuration
 *
 * Locates the ffmpeg binary and reads the optional JSON config file.
 * The config file is read-only: nothing here ever writes it.
 *
 * Priority order for ffmpeg:
 * 1. User-configured path (from config file)
 * 2. FFMPEG_PATH environment variable
 * 3. The PATH search
 * 4. Auto-detected paths (searches common locations)
 */

import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs';
import { getLogger } from './rolling-logger.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ToolPathsConfig {
  ffmpegPath?: string;
  audioBitrate?: string;   // e.g. '128k'
  logDir?: string;         // Enables file logging
  killGraceMs?: number;    // SIGTERM -> SIGKILL delay on cancel
}

export type EngineSource = 'config' | 'env' | 'path' | 'detected';

export interface ResolvedEngine {
  path: string;
  source: EngineSource;
}

export interface ToolStatus {
  configured: boolean;
  detected: boolean;
  path: string | null;
  source: EngineSource | null;
}

interface ToolPathsState {
  config: ToolPathsConfig;
  configPath: string;
  loaded: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// State
// ─────────────────────────────────────────────────────────────────────────────

const state: ToolPathsState = {
  config: {},
  configPath: '',
  loaded: false,
};

// ─────────────────────────────────────────────────────────────────────────────
// Config File
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Platform config directory: ~/Library/Application Support, %APPDATA%,
 * or $XDG_CONFIG_HOME (~/.config).
 */
export function getUserConfigDir(): string {
  const platform = os.platform();
  const homeDir = os.homedir();

  if (platform === 'darwin') {
    return path.join(homeDir, 'Library', 'Application Support', 'm4b-maker');
  } else if (platform === 'win32') {
    const appData = process.env.APPDATA || path.join(homeDir, 'AppData', 'Roaming');
    return path.join(appData, 'm4b-maker');
  }
  const xdg = process.env.XDG_CONFIG_HOME || path.join(homeDir, '.config');
  return path.join(xdg, 'm4b-maker');
}

export function getConfigPath(): string {
  if (state.configPath) {
    return state.configPath;
  }
  state.configPath = process.env.M4B_MAKER_CONFIG || path.join(getUserConfigDir(), 'config.json');
  return state.configPath;
}

/**
 * Point the loader at a different file (CLI --config). Forces a reload.
 */
export function setConfigPath(configPath: string): void {
  state.configPath = configPath;
  state.loaded = false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only known keys with the right types
 */
export function parseConfig(raw: unknown): ToolPathsConfig {
  if (!isRecord(raw)) return {};

  const config: ToolPathsConfig = {};
  if (typeof raw.ffmpegPath === 'string' && raw.ffmpegPath) config.ffmpegPath = raw.ffmpegPath;
  if (typeof raw.audioBitrate === 'string' && /^\d+k$/.test(raw.audioBitrate)) config.audioBitrate = raw.audioBitrate;
  if (typeof raw.logDir === 'string' && raw.logDir) config.logDir = raw.logDir;
  if (typeof raw.killGraceMs === 'number' && Number.isFinite(raw.killGraceMs) && raw.killGraceMs >= 0) {
    config.killGraceMs = raw.killGraceMs;
  }
  return config;
}

export function loadConfig(): ToolPathsConfig {
  if (state.loaded) {
    return state.config;
  }

  const configPath = getConfigPath();
  const logger = getLogger();

  try {
    if (fs.existsSync(configPath)) {
      const content = fs.readFileSync(configPath, 'utf-8');
      state.config = parseConfig(JSON.parse(content));
      logger.debug('[TOOL-PATHS] Loaded config', { configPath });
    } else {
      state.config = {};
    }
  } catch (err) {
    logger.warn('[TOOL-PATHS] Ignoring unreadable config', { configPath, error: err instanceof Error ? err.message : String(err) });
    state.config = {};
  }

  state.loaded = true;
  return state.config;
}

export function getConfig(): ToolPathsConfig {
  return { ...loadConfig() };
}

/**
 * Drop cached config (tests)
 */
export function resetConfig(): void {
  state.config = {};
  state.configPath = '';
  state.loaded = false;
}

// ─────────────────────────────────────────────────────────────────────────────
// Auto-Detection Helpers
// ─────────────────────────────────────────────────────────────────────────────

function isExecutable(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, os.platform() === 'win32' ? fs.constants.F_OK : fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function findExistingPath(candidates: string[]): string | null {
  for (const candidate of candidates) {
    if (isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Look a bare command name up on PATH the way the OS would
 */
export function findOnPath(command: string, envPath: string = process.env.PATH ?? ''): string | null {
  const names = os.platform() === 'win32'
    ? (process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').map(ext => command + ext.toLowerCase()).concat(command)
    : [command];

  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    const found = findExistingPath(names.map(name => path.join(dir, name)));
    if (found) return found;
  }
  return null;
}

function getFfmpegCandidates(): string[] {
  const platform = os.platform();
  const homeDir = os.homedir();

  if (platform === 'win32') {
    return [
      path.join(homeDir, 'scoop', 'shims', 'ffmpeg.exe'),
      'C:\\Program Files\\ffmpeg\\bin\\ffmpeg.exe',
      'C:\\ffmpeg\\bin\\ffmpeg.exe',
      path.join(homeDir, 'ffmpeg', 'bin', 'ffmpeg.exe'),
    ];
  } else if (platform === 'darwin') {
    return [
      '/opt/homebrew/bin/ffmpeg',
      '/usr/local/bin/ffmpeg',
    ];
  }
  return [
    '/usr/bin/ffmpeg',
    '/usr/local/bin/ffmpeg',
    '/snap/bin/ffmpeg',
  ];
}

// ─────────────────────────────────────────────────────────────────────────────
// Tool Path Getters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolve the ffmpeg executable, or null when it cannot be found anywhere.
 * A configured or env path that does not exist is skipped, not trusted.
 */
export function resolveFfmpeg(): ResolvedEngine | null {
  const config = loadConfig();

  if (config.ffmpegPath && isExecutable(config.ffmpegPath)) {
    return { path: config.ffmpegPath, source: 'config' };
  }

  const envPath = process.env.FFMPEG_PATH;
  if (envPath && isExecutable(envPath)) {
    return { path: envPath, source: 'env' };
  }

  const onPath = findOnPath('ffmpeg');
  if (onPath) {
    return { path: onPath, source: 'path' };
  }

  const detected = findExistingPath(getFfmpegCandidates());
  if (detected) {
    return { path: detected, source: 'detected' };
  }

  return null;
}

export function getToolStatus(): Record<'ffmpeg', ToolStatus> {
  const config = loadConfig();
  const resolved = resolveFfmpeg();

  return {
    ffmpeg: {
      configured: !!config.ffmpegPath,
      detected: resolved !== null,
      path: resolved?.path ?? null,
      source: resolved?.source ?? null,
    },
  };
}
