import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestApp, type TestApp } from '../../test/setup.js';
import { postForm, registerUser } from '../../test/helpers.js';

describe('POST /confirm_request', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await registerUser(t.app, { username: 'alice', fullName: 'Alice A', email: 'alice@example.com', password: 'pw' });
  });

  afterEach(async () => {
    await t.close();
  });

  it('emails a confirmation link', async () => {
    const response = await postForm(t.app, '/confirm_request', { email: 'alice@example.com', action: 'confirm_request' });

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('An email has been sent to alice@example.com.');

    const mail = t.mail.last();
    expect(mail.subject).toBe('Gatehouse confirm email');
    expect(mail.body).toMatch(/^To confirm your email for Gatehouse, please visit http:\/\/localhost:3000\/confirm\?ctoken=[A-Za-z0-9_-]{16} by /);

    const [latest] = await t.services.journal.list();
    expect(latest).toMatchObject({ name: 'save_token', success: true, username: 'alice', message: 'saved confirm token' });
  });

  it('sends a not-registered notice for unknown emails', async () => {
    const response = await postForm(t.app, '/confirm_request', { email: 'nobody@example.com', action: 'confirm_request' });

    expect(response.status).toBe(200);
    expect(t.mail.last().body).toContain('The email address nobody@example.com is not registered for Gatehouse.');
  });

  it('rejects other actions', async () => {
    const response = await postForm(t.app, '/confirm_request', { email: 'alice@example.com', action: 'password' });

    expect(await response.text()).toContain('Please provide a valid action.');
  });
});
