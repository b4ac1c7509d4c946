import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { eq } from 'drizzle-orm';
import { tokens } from '@gatehouse/database';
import { createLogger } from '@gatehouse/observability';
import { createTestApp, type TestApp } from '../test/setup.js';
import { findSetCookie, get, loginAs, registerUser } from '../test/helpers.js';

describe('app', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  afterEach(async () => {
    vi.useRealTimers();
    await t.close();
  });

  it('sets security headers on every response', async () => {
    const response = await get(t.app, '/');

    expect(response.headers.get('content-security-policy')).toBe("default-src 'self'; style-src 'self' 'unsafe-inline'");
    expect(response.headers.get('x-content-type-options')).toBe('nosniff');
    expect(response.headers.get('x-frame-options')).toBe('DENY');
    expect(response.headers.get('x-xss-protection')).toBe('1; mode=block');
  });

  it('echoes a well-formed request id and generates one otherwise', async () => {
    const echoed = await t.app.request('/health', { headers: { 'X-Request-Id': 'req-123' } });
    expect(echoed.headers.get('x-request-id')).toBe('req-123');

    const generated = await t.app.request('/health', { headers: { 'X-Request-Id': 'bad id with spaces' } });
    expect(generated.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('reports health', async () => {
    const response = await get(t.app, '/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', subscribers: 0 });
  });

  it('greets anonymous visitors on the home page', async () => {
    const response = await get(t.app, '/');

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('You are not logged in.');
  });

  it('greets a logged in user by full name', async () => {
    await registerUser(t.app, { username: 'alice', fullName: 'Alice A', email: 'alice@example.com', password: 'pw' });
    const cookie = await loginAs(t.app, 'alice', 'pw');

    const body = await (await get(t.app, '/', cookie)).text();

    expect(body).toContain('<p>Welcome, Alice A.</p>');
    expect(body).toContain('<a href="/confirm_request">Confirm it</a>');
  });

  it('clears an unknown session cookie', async () => {
    const response = await get(t.app, '/', 'session=not-a-session');

    expect(response.status).toBe(200);
    expect(findSetCookie(response, 'session')).toContain('Max-Age=0');
  });

  it('drops an expired session and its row', async () => {
    await registerUser(t.app, { username: 'alice', fullName: 'Alice A', email: 'alice@example.com', password: 'pw' });
    const cookie = await loginAs(t.app, 'alice', 'pw');

    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(Date.now() + 86_400_000 + 1000);

    const response = await get(t.app, '/user', cookie);

    expect(await response.text()).toContain('You are not logged in.');
    expect(findSetCookie(response, 'session')).toContain('Max-Age=0');
    expect(t.db.select().from(tokens).where(eq(tokens.kind, 'session')).all()).toHaveLength(0);
  });

  it('returns 404 for unknown paths', async () => {
    const response = await get(t.app, '/nowhere');

    expect(response.status).toBe(404);
  });
});

describe('request logging', () => {
  it('logs each completed request with its token query masked', async () => {
    const lines: Record<string, unknown>[] = [];
    const logger = createLogger({ level: 'info' }, { write: (line: string) => void lines.push(JSON.parse(line)) });
    const t = createTestApp({}, logger);

    await t.app.request('/health?rtoken=abc', { headers: { 'X-Request-Id': 'req-7' } });

    const completed = lines.filter((line) => line.msg === 'Request completed');
    expect(completed).toHaveLength(1);
    expect(completed[0]).toMatchObject({
      requestId: 'req-7',
      status: 200,
      req: { method: 'GET', url: '/health?rtoken=[REDACTED]', requestId: 'req-7' },
    });
    await t.close();
  });
});
