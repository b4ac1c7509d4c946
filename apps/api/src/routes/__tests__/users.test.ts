import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestApp, type TestApp } from '../../test/setup.js';
import { get, loginAs, registerUser } from '../../test/helpers.js';

describe('list views', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await registerUser(t.app, { username: 'alice', fullName: 'Alice A', email: 'alice@example.com', password: 'pw' });
    await registerUser(t.app, { username: 'root', fullName: 'Root R', email: 'root@example.com', password: 'pw' });
    t.makeAdmin('root');
  });

  afterEach(async () => {
    await t.close();
  });

  describe('GET /user', () => {
    it('shows a notice without a session', async () => {
      const response = await get(t.app, '/user');

      expect(response.status).toBe(200);
      expect(await response.text()).toContain('<p>You are not logged in.</p>');
    });

    it('shows the current user', async () => {
      const cookie = await loginAs(t.app, 'alice', 'pw');

      const body = await (await get(t.app, '/user', cookie)).text();

      expect(body).toContain('<dt>Email</dt><dd>alice@example.com</dd>');
      expect(body).toContain('<dt>Administrator</dt><dd>no</dd>');
      expect(body).toContain('<dt>Last Login Result</dt><dd></dd>');
    });
  });

  describe('GET /users', () => {
    it('returns 401 without a session', async () => {
      const response = await get(t.app, '/users');

      expect(response.status).toBe(401);
      expect(await response.text()).toBe('Unauthorized');
    });

    it('returns 401 for a non-admin user', async () => {
      const cookie = await loginAs(t.app, 'alice', 'pw');

      const response = await get(t.app, '/users', cookie);

      expect(response.status).toBe(401);
    });

    it('lists every user for an admin', async () => {
      const cookie = await loginAs(t.app, 'root', 'pw');

      const response = await get(t.app, '/users', cookie);
      const body = await response.text();

      expect(response.status).toBe(200);
      expect(body).toContain('<td>alice</td><td>Alice A</td><td>alice@example.com</td>');
      expect(body).toContain('<td>root</td><td>Root R</td><td>root@example.com</td>');
      expect(body).not.toContain('scrypt$');
    });
  });

  describe('GET /events', () => {
    it('returns 401 for a non-admin user', async () => {
      const cookie = await loginAs(t.app, 'alice', 'pw');

      const response = await get(t.app, '/events', cookie);

      expect(response.status).toBe(401);
    });

    it('lists the journal for an admin', async () => {
      const cookie = await loginAs(t.app, 'root', 'pw');

      const response = await get(t.app, '/events', cookie);
      const body = await response.text();

      expect(response.status).toBe(200);
      expect(body).toContain('<td>register</td><td>true</td><td>alice</td>');
      expect(body).toContain('<td>login</td><td>true</td><td>root</td>');
    });
  });
});
