/**
 * CalDAV Client Implementation
 *
 * Uses tsdav for the wire protocol: a bare PUT per event for
 * synchronization, and a logged-in DAVClient for discovery and calendar
 * creation.
 */

import {
  DAVClient,
  createObject,
  getBasicAuthHeaders,
  type DAVCalendar,
  type DAVResponse,
} from 'tsdav'
import { randomUUID } from 'node:crypto'
import { TransportError, errorMessage } from '../errors.js'
import type {
  CalendarCredentials,
  CalendarInfo,
  CalendarWriter,
  DiscoveryResult,
  PutOptions,
  PutResult,
} from './types.js'

export const DEFAULT_CALDAV_SERVER = 'https://caldav.icloud.com'

function authHeaders(credentials: CalendarCredentials): Record<string, string> {
  const { authorization } = getBasicAuthHeaders(credentials)
  return authorization ? { authorization } : {}
}

/**
 * CalendarWriter that PUTs straight to the resource URL.
 * No discovery round-trips: the collection URL is already known.
 */
export function createCalDAVWriter(): CalendarWriter {
  return {
    async put(url: string, body: string, options: PutOptions): Promise<PutResult> {
      const response = await createObject({
        url,
        data: body,
        headers: {
          ...authHeaders(options.credentials),
          'content-type': options.contentType,
        },
      })
      return { status: response.status, body: await response.text() }
    },
  }
}

/**
 * Log in and resolve the account's principal and calendar home
 */
async function connect(
  credentials: CalendarCredentials,
  serverUrl: string,
): Promise<{ client: DAVClient; principalUrl: string; homeUrl: string }> {
  const client = new DAVClient({
    serverUrl,
    credentials: {
      username: credentials.username,
      password: credentials.password,
    },
    authMethod: 'Basic',
    defaultAccountType: 'caldav',
  })

  try {
    await client.login()
  } catch (err) {
    throw new TransportError(`CalDAV login failed: ${errorMessage(err)}`, serverUrl, undefined, {
      cause: err,
    })
  }

  const principalUrl = client.account?.principalUrl
  if (!principalUrl) {
    throw new TransportError('current-user-principal not found', serverUrl)
  }
  const homeUrl = client.account?.homeUrl
  if (!homeUrl) {
    throw new TransportError('calendar-home-set not found', principalUrl)
  }

  return { client, principalUrl, homeUrl }
}

function toCalendarInfo(calendar: DAVCalendar): CalendarInfo {
  // displayName can be string or object, extract string value
  const displayName =
    typeof calendar.displayName === 'string' && calendar.displayName.trim()
      ? calendar.displayName.trim()
      : '(no name)'
  return { displayName, url: calendar.url }
}

/**
 * Find the calendars an account can publish into.
 */
export async function discoverCalendars(
  credentials: CalendarCredentials,
  serverUrl: string = DEFAULT_CALDAV_SERVER,
): Promise<DiscoveryResult> {
  const { client, principalUrl, homeUrl } = await connect(credentials, serverUrl)

  let davCalendars: DAVCalendar[]
  try {
    davCalendars = await client.fetchCalendars()
  } catch (err) {
    throw new TransportError(`Calendar listing failed: ${errorMessage(err)}`, homeUrl, undefined, {
      cause: err,
    })
  }

  return { principalUrl, homeUrl, calendars: davCalendars.map(toCalendarInfo) }
}

/**
 * Create a new calendar collection under the account's calendar home.
 */
export async function createCalendar(
  credentials: CalendarCredentials,
  displayName: string,
  serverUrl: string = DEFAULT_CALDAV_SERVER,
): Promise<CalendarInfo> {
  const { client, homeUrl } = await connect(credentials, serverUrl)
  const url = `${homeUrl.replace(/\/+$/, '')}/${randomUUID()}/`

  let responses: DAVResponse[]
  try {
    responses = await client.makeCalendar({
      url,
      props: {
        displayname: displayName,
      },
    })
  } catch (err) {
    throw new TransportError(`MKCALENDAR failed: ${errorMessage(err)}`, url, undefined, {
      cause: err,
    })
  }

  const failed = responses.find((response) => !response.ok)
  if (failed) {
    throw new TransportError(
      `MKCALENDAR failed: ${failed.statusText || 'unexpected status'}`,
      url,
      failed.status,
    )
  }

  return { displayName, url }
}
