import { randomUUID } from 'node:crypto'
import type { Context } from 'hono'
import { getSignedCookie, setSignedCookie } from 'hono/cookie'

export const SESSION_COOKIE = 'relay_session'

const SESSION_MAX_AGE_SECONDS = 7 * 86_400

/** Session id from a valid signed cookie, or undefined when absent or tampered with. */
export async function readSessionId(c: Context, secret: string): Promise<string | undefined> {
  const value = await getSignedCookie(c, secret, SESSION_COOKIE)
  return value || undefined
}

/** The caller's session id when its cookie verifies, otherwise a fresh one. */
export async function resolveSessionId(c: Context, secret: string): Promise<string> {
  return (await readSessionId(c, secret)) ?? randomUUID()
}

/** Reuse the caller's session id or mint one, and (re)issue the signed cookie. */
export async function issueSessionId(c: Context, secret: string, secure: boolean): Promise<string> {
  const sessionId = await resolveSessionId(c, secret)
  await setSignedCookie(c, SESSION_COOKIE, sessionId, secret, {
    httpOnly: true,
    secure,
    sameSite: 'Lax',
    path: '/',
    maxAge: SESSION_MAX_AGE_SECONDS,
  })
  return sessionId
}
