/**
 * ShiftWeb Client
 *
 * Logs into the ShiftWeb scheduling site and downloads month pages for
 * the markup extractor. The site keeps the session in cookies, which this
 * client stores and replays on every request.
 */

import type { Logger } from 'pino'
import { TransportError, errorMessage } from '../errors.js'
import { silentLogger } from '../logger.js'
import type { YearMonth } from '../shifts/extractor.js'
import { formatYearMonth } from './months.js'

export const DEFAULT_SHIFTWEB_URL = 'https://example-shift.com'

const MAX_REDIRECTS = 5
const LOGIN_PAGE_PATH = '/login.php'

interface PageResponse {
  /** URL the last redirect landed on */
  url: string
  text: string
}

export interface ShiftWebClientOptions {
  baseUrl?: string
  fetch?: typeof fetch
  logger?: Logger
}

export class ShiftWebClient {
  private readonly baseUrl: string
  private readonly fetchFn: typeof fetch
  private readonly log: Logger
  private cookies = new Map<string, string>()
  private loggedIn = false

  constructor(options: ShiftWebClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_SHIFTWEB_URL).replace(/\/+$/, '')
    this.fetchFn = options.fetch ?? fetch
    this.log = (options.logger ?? silentLogger).child({ component: 'shiftweb' })
  }

  get isLoggedIn(): boolean {
    return this.loggedIn
  }

  /**
   * Open a session. The login page is loaded first so the site can hand
   * out its session cookie before credentials are posted.
   */
  async login(id: string, password: string): Promise<void> {
    const loginPage = `${this.baseUrl}/login.php?err=1`
    await this.request(loginPage)

    const body = new URLSearchParams({ id, password, savelogin: '1' })
    const { text } = await this.request(
      `${this.baseUrl}/cont/login/check_login.php?${encodeURIComponent(id)}`,
      {
        method: 'POST',
        body: body.toString(),
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
          'X-Requested-With': 'XMLHttpRequest',
          Origin: this.baseUrl,
          Referer: loginPage,
        },
      },
    )
    this.log.info({ response: text.slice(0, 200) }, 'Login API response')
    this.loggedIn = true
  }

  /**
   * HTML of the confirmed-shift page for one month.
   */
  async fetchMonthPage(ym: YearMonth): Promise<string> {
    const shiftPage = `${this.baseUrl}/shift.php`
    if (!this.loggedIn) {
      throw new TransportError('Not logged in to ShiftWeb', shiftPage)
    }
    const params = new URLSearchParams({ mod: 'look', date2: formatYearMonth(ym) })
    const { url, text: html } = await this.request(`${shiftPage}?${params.toString()}`, {
      headers: { Referer: shiftPage },
    })
    if (new URL(url).pathname.endsWith(LOGIN_PAGE_PATH)) {
      throw new TransportError(
        'ShiftWeb sent the login page instead of shifts; check the ShiftWeb ID and password',
        url,
      )
    }
    this.log.info({ month: formatYearMonth(ym) }, 'Fetched shift page')
    return html
  }

  /**
   * GET or POST, following redirects by hand: cookies set on each hop go
   * out with the next request.
   */
  private async request(url: string, init: RequestInit = {}): Promise<PageResponse> {
    let target = url
    let current = init

    for (let hops = 0; ; hops++) {
      const response = await this.send(target, current)
      this.storeCookies(response.headers)

      const location = response.headers.get('location')
      if (response.status >= 300 && response.status < 400 && location) {
        await response.text()
        if (hops >= MAX_REDIRECTS) {
          throw new TransportError(`Too many redirects from ${url}`, target, response.status)
        }
        const method = (current.method ?? 'GET').toUpperCase()
        if (response.status === 303 || (method === 'POST' && response.status <= 302)) {
          const headers = new Headers(current.headers)
          headers.delete('Content-Type')
          current = { headers }
        }
        target = new URL(location, target).toString()
        this.log.debug({ from: url, to: target, status: response.status }, 'Following redirect')
        continue
      }

      const text = await response.text()
      if (response.status >= 400) {
        throw new TransportError(
          `HTTP ${response.status} from ${target}: ${text.slice(0, 200)}`,
          target,
          response.status,
        )
      }
      return { url: target, text }
    }
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    const headers = new Headers(init.headers)
    if (this.cookies.size > 0) {
      headers.set('Cookie', this.cookieHeader())
    }

    try {
      return await this.fetchFn(url, { ...init, headers, redirect: 'manual' })
    } catch (err) {
      throw new TransportError(`Request failed: ${errorMessage(err)}`, url, undefined, {
        cause: err,
      })
    }
  }

  private storeCookies(headers: Headers): void {
    for (const setCookie of headers.getSetCookie()) {
      const pair = setCookie.split(';', 1)[0] ?? ''
      const eq = pair.indexOf('=')
      if (eq <= 0) continue
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim())
    }
  }

  private cookieHeader(): string {
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ')
  }
}
