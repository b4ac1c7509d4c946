import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestApp, type TestApp } from '../../test/setup.js';
import { postForm } from '../../test/helpers.js';

const aliceForm = {
  username: 'alice',
  fullName: 'Alice A',
  email: 'alice@example.com',
  password1: 'pw',
  password2: 'pw',
};

describe('POST /register', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  it('creates the user, journals the event and redirects to login', async () => {
    const response = await postForm(t.app, '/register', aliceForm);

    expect(response.status).toBe(303);
    expect(response.headers.get('location')).toBe('/login');

    const users = await t.services.users.listUsers();
    expect(users).toHaveLength(1);
    expect(users[0]).toMatchObject({
      username: 'alice',
      fullName: 'Alice A',
      email: 'alice@example.com',
      isAdmin: false,
      confirmed: false,
    });

    const events = await t.services.journal.list();
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      name: 'register',
      success: true,
      username: 'alice',
      message: 'registered user',
    });
  });

  it('sends a registration email with a confirmation link', async () => {
    await postForm(t.app, '/register', aliceForm);

    const mail = t.mail.last();
    expect(mail.to).toEqual(['alice@example.com']);
    expect(mail.from).toBe('noreply@example.com');
    expect(mail.subject).toBe('Gatehouse registration');
    expect(mail.body).toMatch(/http:\/\/localhost:3000\/confirm\?ctoken=[A-Za-z0-9_-]{16} by /);
  });

  it('rejects a duplicate username without adding a row', async () => {
    await postForm(t.app, '/register', aliceForm);

    const response = await postForm(t.app, '/register', { ...aliceForm, email: 'bob@example.com' });

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('User Name already exists.');
    expect(await t.services.users.listUsers()).toHaveLength(1);

    const [latest] = await t.services.journal.list();
    expect(latest).toMatchObject({
      name: 'register',
      success: false,
      username: 'alice',
      message: 'user name already exists',
    });
  });

  it('rejects a duplicate email', async () => {
    await postForm(t.app, '/register', aliceForm);

    const response = await postForm(t.app, '/register', { ...aliceForm, username: 'bob' });

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('Email already registered.');
    expect(await t.services.users.listUsers()).toHaveLength(1);

    const [latest] = await t.services.journal.list();
    expect(latest).toMatchObject({ name: 'register', success: false, username: 'bob' });
  });

  it.each([
    ['a missing field', { ...aliceForm, fullName: '' }, 'Please provide required values.'],
    ['a whitespace-only password', { ...aliceForm, password1: '   ', password2: '   ' }, 'Please provide required values.'],
    ['mismatched passwords', { ...aliceForm, password2: 'other' }, 'Passwords do not match.'],
    ['an invalid email', { ...aliceForm, email: 'not-an-email' }, 'Please provide a valid email.'],
  ])('re-renders the form for %s', async (_case, form, message) => {
    const response = await postForm(t.app, '/register', form);

    expect(response.status).toBe(200);
    expect(await response.text()).toContain(message);
    expect(await t.services.users.listUsers()).toHaveLength(0);
  });

  it('trims fields before storing them', async () => {
    await postForm(t.app, '/register', { ...aliceForm, username: '  alice ', email: ' alice@example.com ' });

    const user = await t.services.users.userByName('alice');
    expect(user.email).toBe('alice@example.com');
  });

  it('accepts a username of exactly 10 octets', async () => {
    const response = await postForm(t.app, '/register', { ...aliceForm, username: 'abcdefghij' });

    expect(response.status).toBe(303);
  });

  it('fails with 500 for a username longer than 10 octets', async () => {
    const response = await postForm(t.app, '/register', { ...aliceForm, username: 'abcdefghijk' });

    expect(response.status).toBe(500);
    expect(await response.text()).toBe('Internal Server Error');
    expect(await t.services.users.listUsers()).toHaveLength(0);
  });

  it('still registers when the confirmation email cannot be sent', async () => {
    t.mail.failure = new Error('connection refused');

    const response = await postForm(t.app, '/register', aliceForm);

    expect(response.status).toBe(303);
    expect(await t.services.users.existsByUsername('alice')).toBe(true);
  });
});

describe('GET /register', () => {
  it('renders the registration form', async () => {
    const t = createTestApp();

    const response = await t.app.request('/register');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/html');
    expect(await response.text()).toContain('<form method="post" action="/register">');
    await t.close();
  });
});
