#!/usr/bin/env node
import { writeFileSync } from 'node:fs'
import { parseArgs } from 'node:util'
import { createCalendar, discoverCalendars } from './calendar/caldav-client.js'
import { syncShifts } from './calendar/sync.js'
import type { CalendarCredentials } from './calendar/types.js'
import {
  configPath,
  findConfigDir,
  loadConfig,
  loadSecrets,
  requireSecret,
  saveCalendarUrl,
  type ShiftSyncConfig,
} from './config.js'
import { ConfigError, errorMessage } from './errors.js'
import { createLogger, type Logger } from './logger.js'
import { collectShifts, formatReport, formatShiftLine, sortByStart } from './pipeline.js'
import { encodeCalendar } from './shifts/ics.js'
import type { ShiftRecord } from './shifts/types.js'
import { buildMonthRange, formatYearMonth } from './source/months.js'
import { ShiftWebClient } from './source/shiftweb-client.js'

const VERSION = '0.4.0'

const USAGE = `Fetch confirmed shifts from ShiftWeb and publish them to a CalDAV calendar.

Usage:
  shift-sync [sync]          sync this month and next into the configured calendar
  shift-sync list            print shifts only (no calendar access)
  shift-sync export          write shifts as one .ics document
  shift-sync calendars       list calendars of the CalDAV account
  shift-sync show-config     print the current settings (no passwords)

Options:
  --from YYYY-MM             first month (sync, list, export)
  --to YYYY-MM               last month (sync, list, export)
  --out FILE                 export target (default: stdout)
  --use N                    calendars: publish into calendar number N
  --create NAME              calendars: create a new calendar and publish into it
  --version                  print the version
  --help                     print this help

Config: $SHIFT_SYNC_DIR/config.yaml (default ~/.shift_sync/config.yaml)
Passwords: SHIFT_SYNC_WEB_PASSWORD, SHIFT_SYNC_CALDAV_PASSWORD or credentials.json`

interface CliOptions {
  from?: string
  to?: string
  out?: string
  use?: string
  create?: string
}

function caldavCredentials(config: ShiftSyncConfig, configDir: string): CalendarCredentials {
  const password = requireSecret(
    loadSecrets(configDir).caldavPassword,
    'CalDAV',
    'SHIFT_SYNC_CALDAV_PASSWORD',
  )
  return { username: config.caldav.username, password }
}

async function fetchShifts(
  config: ShiftSyncConfig,
  configDir: string,
  options: CliOptions,
  log: Logger,
): Promise<ShiftRecord[]> {
  const months = buildMonthRange({ from: options.from, to: options.to })
  const password = requireSecret(
    loadSecrets(configDir).shiftwebPassword,
    'ShiftWeb',
    'SHIFT_SYNC_WEB_PASSWORD',
  )

  const client = new ShiftWebClient({ baseUrl: config.shiftweb.baseUrl, logger: log })
  await client.login(config.shiftweb.id, password)

  const perMonth = await collectShifts(client, months, config.extractor, log)
  for (const { month, shifts } of perMonth) {
    console.log(`${formatYearMonth(month)}: ${shifts.length} shifts`)
  }
  return perMonth.flatMap((entry) => entry.shifts)
}

async function runSync(
  config: ShiftSyncConfig,
  configDir: string,
  options: CliOptions,
  log: Logger,
): Promise<void> {
  const collectionUrl = config.caldav.calendarUrl
  if (!collectionUrl) {
    throw new ConfigError('No calendar chosen yet. Run `shift-sync calendars --use N` first.')
  }
  const credentials = caldavCredentials(config, configDir)

  const shifts = await fetchShifts(config, configDir, options, log)
  console.log(`Total: ${shifts.length} shifts`)

  const report = await syncShifts(shifts, { collectionUrl, credentials }, { logger: log })
  for (const line of formatReport(report)) {
    console.log(line)
  }
}

async function runList(
  config: ShiftSyncConfig,
  configDir: string,
  options: CliOptions,
  log: Logger,
): Promise<void> {
  const shifts = sortByStart(await fetchShifts(config, configDir, options, log))
  for (const shift of shifts) {
    console.log(formatShiftLine(shift))
  }
  console.log(`Total: ${shifts.length} shifts`)
}

async function runExport(
  config: ShiftSyncConfig,
  configDir: string,
  options: CliOptions,
  log: Logger,
): Promise<void> {
  const shifts = await fetchShifts(config, configDir, options, log)
  const ics = encodeCalendar(shifts)
  if (options.out) {
    writeFileSync(options.out, ics, 'utf-8')
    console.log(`Wrote ${shifts.length} events to ${options.out}`)
  } else {
    process.stdout.write(ics)
  }
}

async function runCalendars(
  config: ShiftSyncConfig,
  configDir: string,
  options: CliOptions,
): Promise<void> {
  const credentials = caldavCredentials(config, configDir)

  if (options.create) {
    const created = await createCalendar(credentials, options.create, config.caldav.serverUrl)
    saveCalendarUrl(created.url, configDir)
    console.log(`Created "${created.displayName}" and saved it: ${created.url}`)
    return
  }

  const { calendars } = await discoverCalendars(credentials, config.caldav.serverUrl)

  if (options.use) {
    const index = Number(options.use)
    const chosen = Number.isInteger(index) ? calendars[index - 1] : undefined
    if (!chosen) {
      throw new ConfigError(`--use expects a number between 1 and ${calendars.length}`)
    }
    saveCalendarUrl(chosen.url, configDir)
    console.log(`Publishing into "${chosen.displayName}": ${chosen.url}`)
    return
  }

  if (calendars.length === 0) {
    console.log('No calendars found. Create one with --create NAME.')
    return
  }
  calendars.forEach((calendar, i) => {
    const current = calendar.url === config.caldav.calendarUrl ? ' (current)' : ''
    console.log(`[${i + 1}] ${calendar.displayName}  ->  ${calendar.url}${current}`)
  })
}

function runShowConfig(config: ShiftSyncConfig, configDir: string): void {
  console.log(`ShiftWeb ID: ${config.shiftweb.id}`)
  console.log(`ShiftWeb URL: ${config.shiftweb.baseUrl}`)
  console.log(`CalDAV user: ${config.caldav.username}`)
  console.log(`Calendar: ${config.caldav.calendarUrl ?? '(not set)'}`)
  console.log(`Config file: ${configPath(configDir)}`)
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      from: { type: 'string' },
      to: { type: 'string' },
      out: { type: 'string' },
      use: { type: 'string' },
      create: { type: 'string' },
      version: { type: 'boolean' },
      help: { type: 'boolean' },
    },
  })

  if (values.help) {
    console.log(USAGE)
    return
  }
  if (values.version) {
    console.log(`shift-sync version ${VERSION}`)
    return
  }
  if (positionals.length > 1) {
    throw new ConfigError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`)
  }

  const command = positionals[0] ?? 'sync'
  const configDir = findConfigDir()
  const config = loadConfig(configDir)
  const log = createLogger({ level: config.logLevel, pretty: process.stderr.isTTY })
  const options: CliOptions = values

  switch (command) {
    case 'sync':
      await runSync(config, configDir, options, log)
      break
    case 'list':
      await runList(config, configDir, options, log)
      break
    case 'export':
      await runExport(config, configDir, options, log)
      break
    case 'calendars':
      await runCalendars(config, configDir, options)
      break
    case 'show-config':
      runShowConfig(config, configDir)
      break
    default:
      throw new ConfigError(`Unknown command: ${command}\n\n${USAGE}`)
  }
}

main().catch((err: unknown) => {
  console.error('Error:', errorMessage(err))
  process.exit(1)
})
