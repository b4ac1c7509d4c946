import { html } from 'hono/html';
import { alert, type Html } from './layout.js';

export function registerForm(message?: string): Html {
  return html`${alert(message)}
<form method="post" action="/register">
  <label>User Name <input name="username" maxlength="10" autocomplete="username" required /></label>
  <label>Full Name <input name="fullName" autocomplete="name" required /></label>
  <label>Email <input name="email" type="email" autocomplete="email" required /></label>
  <label>Password <input name="password1" type="password" autocomplete="new-password" required /></label>
  <label>Confirm Password <input name="password2" type="password" autocomplete="new-password" required /></label>
  <button type="submit">Register</button>
</form>`;
}

export function loginForm(redirect: string | undefined, message?: string): Html {
  const action = redirect ? `/login?r=${encodeURIComponent(redirect)}` : '/login';
  return html`${alert(message)}
<form method="post" action="${action}">
  <label>User Name <input name="username" autocomplete="username" required /></label>
  <label>Password <input name="password" type="password" autocomplete="current-password" required /></label>
  <label><input name="remember" type="checkbox" /> Remember me</label>
  <button type="submit">Login</button>
</form>
<p><a href="/forgot">Forgot user name or password?</a></p>`;
}

export function forgotForm(message?: string): Html {
  return html`${alert(message)}
<form method="post" action="/forgot">
  <label>Email <input name="email" type="email" autocomplete="email" required /></label>
  <label><input name="action" type="radio" value="user" /> Forgot user name</label>
  <label><input name="action" type="radio" value="password" /> Forgot password</label>
  <button type="submit">Send</button>
</form>`;
}

export function confirmRequestForm(message?: string): Html {
  return html`${alert(message)}
<form method="post" action="/confirm_request">
  <label>Email <input name="email" type="email" autocomplete="email" required /></label>
  <input name="action" type="hidden" value="confirm_request" />
  <button type="submit">Send confirmation</button>
</form>`;
}

export function resetForm(rtoken: string, message?: string): Html {
  return html`${alert(message)}
<form method="post" action="/reset">
  <label>Reset Token <input name="rtoken" value="${rtoken}" required /></label>
  <label>New Password <input name="password1" type="password" autocomplete="new-password" required /></label>
  <label>Confirm Password <input name="password2" type="password" autocomplete="new-password" required /></label>
  <button type="submit">Reset password</button>
</form>
<p><a href="/forgot">Request a new reset token</a></p>`;
}

export function confirmForm(ctoken: string, message?: string): Html {
  return html`${alert(message)}
<form method="post" action="/confirm">
  <label>Confirmation Token <input name="ctoken" value="${ctoken}" required /></label>
  <button type="submit">Confirm</button>
</form>
<p><a href="/confirm_request">Request a new token</a></p>`;
}
