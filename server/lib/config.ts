import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'
import os from 'os'
import path from 'path'
import { ConfigError, getErrorMessage } from './errors'
import { isLogLevel, type LogLevel } from './logger'
import type { KeywordCasing } from '../../src/lib/sql/autocomplete/types'

export interface MainConfig {
  log_level: LogLevel
  keyword_casing: KeywordCasing
  prompt: string
  destructive_warning: boolean
}

export interface CompletionConfig {
  max_suggestions: number
  substring_matching: boolean
}

export interface AppConfig {
  main: MainConfig
  completion: CompletionConfig
  /** File the config was read from, null when defaults are used */
  path: string | null
}

export const DEFAULT_CONFIG: AppConfig = {
  main: {
    log_level: 'info',
    keyword_casing: 'auto',
    prompt: '\\d> ',
    destructive_warning: true,
  },
  completion: {
    max_suggestions: 100,
    substring_matching: true,
  },
  path: null,
}

const KEYWORD_CASINGS: readonly KeywordCasing[] = ['upper', 'lower', 'auto']

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function isKeywordCasing(value: unknown): value is KeywordCasing {
  return typeof value === 'string' && KEYWORD_CASINGS.some((casing) => casing === value)
}

/**
 * `$XDG_CONFIG_HOME/litequery/config.toml`, falling back to `~/.config`.
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config')
  return path.join(base, 'litequery', 'config.toml')
}

/**
 * Parse and validate TOML config text. Missing keys take defaults.
 */
export function parseConfig(content: string, source: string | null = null): AppConfig {
  let parsed: Record<string, unknown>
  try {
    parsed = parse(content)
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source ?? 'config'}: ${getErrorMessage(error)}`)
  }

  const main = { ...DEFAULT_CONFIG.main }
  const completion = { ...DEFAULT_CONFIG.completion }

  // Parse [main] section
  if (parsed.main !== undefined) {
    if (!isTable(parsed.main)) {
      throw new ConfigError('main must be a table')
    }
    const m = parsed.main

    if (m.log_level !== undefined) {
      if (!isLogLevel(m.log_level)) {
        throw new ConfigError('main.log_level must be one of debug, info, warn, error, silent')
      }
      main.log_level = m.log_level
    }

    if (m.keyword_casing !== undefined) {
      if (!isKeywordCasing(m.keyword_casing)) {
        throw new ConfigError('main.keyword_casing must be one of upper, lower, auto')
      }
      main.keyword_casing = m.keyword_casing
    }

    if (m.prompt !== undefined) {
      if (typeof m.prompt !== 'string') {
        throw new ConfigError('main.prompt must be a string')
      }
      main.prompt = m.prompt
    }

    if (m.destructive_warning !== undefined) {
      if (typeof m.destructive_warning !== 'boolean') {
        throw new ConfigError('main.destructive_warning must be a boolean')
      }
      main.destructive_warning = m.destructive_warning
    }
  }

  // Parse [completion] section
  if (parsed.completion !== undefined) {
    if (!isTable(parsed.completion)) {
      throw new ConfigError('completion must be a table')
    }
    const c = parsed.completion

    if (c.max_suggestions !== undefined) {
      if (typeof c.max_suggestions !== 'number' || !Number.isInteger(c.max_suggestions) || c.max_suggestions < 1) {
        throw new ConfigError('completion.max_suggestions must be a positive integer')
      }
      completion.max_suggestions = c.max_suggestions
    }

    if (c.substring_matching !== undefined) {
      if (typeof c.substring_matching !== 'boolean') {
        throw new ConfigError('completion.substring_matching must be a boolean')
      }
      completion.substring_matching = c.substring_matching
    }
  }

  return { main, completion, path: source }
}

/**
 * Load config from `configPath`, or from the default location when it is
 * omitted. Only an explicitly given path has to exist.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? defaultConfigPath()

  if (!existsSync(resolved)) {
    if (configPath !== undefined) {
      throw new ConfigError(`Config file not found: ${configPath}`)
    }
    return DEFAULT_CONFIG
  }

  const content = readFileSync(resolved, 'utf-8')
  return parseConfig(content, resolved)
}
