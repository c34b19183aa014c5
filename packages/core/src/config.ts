/**
 * Configuration Loader
 *
 * Loads settings from <configDir>/config.yaml and passwords from the
 * environment or <configDir>/credentials.json. Passwords are only read,
 * never written.
 */

import * as os from 'node:os'
import * as path from 'node:path'
import { existsSync, readFileSync, writeFileSync } from 'node:fs'
import { parse, parseDocument } from 'yaml'
import { z } from 'zod'
import { DEFAULT_CALDAV_SERVER } from './calendar/caldav-client.js'
import { ConfigError, errorMessage } from './errors.js'
import { DEFAULT_SHIFTWEB_URL } from './source/shiftweb-client.js'

const CONFIG_DIR_NAME = '.shift_sync'
const CONFIG_FILENAME = 'config.yaml'
const CREDENTIALS_FILENAME = 'credentials.json'

const configSchema = z.object({
  shiftweb: z.object({
    id: z.string().min(1),
    baseUrl: z.string().url().default(DEFAULT_SHIFTWEB_URL),
  }),
  caldav: z.object({
    username: z.string().min(1),
    // Unset until a calendar has been chosen with `shift-sync calendars`
    calendarUrl: z.string().url().optional(),
    serverUrl: z.string().url().default(DEFAULT_CALDAV_SERVER),
  }),
  extractor: z
    .object({
      headingSelector: z.string().min(1),
      tableSelector: z.string().min(1),
      dateCellSelector: z.string().min(1),
      shopCellSelector: z.string().min(1),
      timeCellSelector: z.string().min(1),
      workedMarker: z.string().min(1),
      rangeSeparator: z.string().min(1),
      title: z.string().min(1),
      overnight: z.enum(['next-day', 'reject']),
    })
    .partial()
    .default({}),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

const credentialsSchema = z.object({
  shiftweb: z.string().min(1).optional(),
  caldav: z.string().min(1).optional(),
})

export type ShiftSyncConfig = z.infer<typeof configSchema>

export interface ShiftSyncSecrets {
  shiftwebPassword?: string
  caldavPassword?: string
}

type Env = Record<string, string | undefined>

/**
 * Directory holding config.yaml: $SHIFT_SYNC_DIR or ~/.shift_sync
 */
export function findConfigDir(env: Env = process.env): string {
  return env.SHIFT_SYNC_DIR ?? path.join(os.homedir(), CONFIG_DIR_NAME)
}

export function configPath(configDir: string = findConfigDir()): string {
  return path.join(configDir, CONFIG_FILENAME)
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Parse and validate config.yaml contents.
 */
export function parseConfig(raw: string, source = CONFIG_FILENAME): ShiftSyncConfig {
  let yaml: unknown
  try {
    yaml = parse(raw)
  } catch (err) {
    throw new ConfigError(`Could not parse ${source}: ${errorMessage(err)}`, { cause: err })
  }

  const result = configSchema.safeParse(yaml ?? {})
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`)
  }
  return result.data
}

/**
 * Load calendar and ShiftWeb settings from config.yaml
 */
export function loadConfig(configDir: string = findConfigDir()): ShiftSyncConfig {
  const file = configPath(configDir)
  if (!existsSync(file)) {
    throw new ConfigError(`Config not found at ${file}. See README for the expected layout.`)
  }
  return parseConfig(readFileSync(file, 'utf-8'), file)
}

/**
 * Load passwords. Environment variables win over credentials.json.
 */
export function loadSecrets(
  configDir: string = findConfigDir(),
  env: Env = process.env,
): ShiftSyncSecrets {
  let stored: z.infer<typeof credentialsSchema> = {}
  const file = path.join(configDir, CREDENTIALS_FILENAME)

  if (existsSync(file)) {
    let json: unknown
    try {
      json = JSON.parse(readFileSync(file, 'utf-8'))
    } catch (err) {
      throw new ConfigError(`Could not parse ${file}: ${errorMessage(err)}`, { cause: err })
    }
    const result = credentialsSchema.safeParse(json)
    if (!result.success) {
      throw new ConfigError(`Invalid ${file}: ${formatIssues(result.error)}`)
    }
    stored = result.data
  }

  return {
    shiftwebPassword: env.SHIFT_SYNC_WEB_PASSWORD || stored.shiftweb,
    caldavPassword: env.SHIFT_SYNC_CALDAV_PASSWORD || stored.caldav,
  }
}

export function requireSecret(value: string | undefined, what: string, envName: string): string {
  if (!value) {
    throw new ConfigError(`${what} password missing: set ${envName} or add it to ${CREDENTIALS_FILENAME}`)
  }
  return value
}

/**
 * Point config.yaml at a calendar collection, keeping the rest of the file
 * (comments included) as written.
 */
export function saveCalendarUrl(calendarUrl: string, configDir: string = findConfigDir()): void {
  const file = configPath(configDir)
  if (!existsSync(file)) {
    throw new ConfigError(`Config not found at ${file}`)
  }
  const doc = parseDocument(readFileSync(file, 'utf-8'))
  doc.setIn(['caldav', 'calendarUrl'], calendarUrl)
  writeFileSync(file, doc.toString(), 'utf-8')
}
