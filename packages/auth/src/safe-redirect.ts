/**
 * Local-only redirect validation for untrusted targets such as the `r`
 * parameter on /login.
 */

export type RedirectValidation = { ok: true; safe: string } | { ok: false; reason: string };

const CONTROL_OR_SPACE = /[\u0000-\u001f\u007f]|\s/;
const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

function reject(reason: string): RedirectValidation {
  return { ok: false, reason };
}

function decodeOnce(path: string): string | null {
  try {
    return decodeURIComponent(path);
  } catch {
    return null;
  }
}

/**
 * Resolve `.` and `..` segments; `..` never climbs above the root. Empty
 * segments collapse, a trailing slash survives.
 */
function canonicalizePath(path: string): string {
  const segments: string[] = [];
  const parts = path.split('/');
  for (const segment of parts) {
    if (segment === '' || segment === '.') {
      continue;
    }
    if (segment === '..') {
      segments.pop();
      continue;
    }
    segments.push(segment);
  }
  const last = parts[parts.length - 1];
  const trailingSlash = segments.length > 0 && (last === '' || last === '.' || last === '..');
  return `/${segments.join('/')}${trailingSlash ? '/' : ''}`;
}

/**
 * Validate a redirect target and return its canonical local form.
 *
 * Rejects absolute and scheme-relative URLs, backslashes, control
 * characters, unescaped whitespace and anything not starting with `/`.
 * The path is percent-decoded once, canonicalized and re-encoded per
 * segment; query and fragment are kept as given.
 */
export function validateLocalRedirect(target: string): RedirectValidation {
  if (!target) {
    return reject('empty target');
  }
  if (CONTROL_OR_SPACE.test(target)) {
    return reject('control character or whitespace');
  }
  if (target.includes('\\')) {
    return reject('backslash');
  }
  if (SCHEME.test(target)) {
    return reject('absolute URL');
  }
  if (target.startsWith('//')) {
    return reject('scheme-relative URL');
  }
  if (!target.startsWith('/')) {
    return reject('not a local path');
  }

  const suffixStart = target.search(/[?#]/);
  const rawPath = suffixStart === -1 ? target : target.slice(0, suffixStart);
  const suffix = suffixStart === -1 ? '' : target.slice(suffixStart);

  const decoded = decodeOnce(rawPath);
  if (decoded === null) {
    return reject('malformed percent-encoding');
  }
  if (decoded.includes('\\') || /[\u0000-\u001f\u007f]/.test(decoded)) {
    return reject('encoded backslash or control character');
  }

  const path = canonicalizePath(decoded)
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');

  return { ok: true, safe: `${path}${suffix}` };
}

/**
 * The validated target, or the fallback when validation fails.
 */
export function safeLocalRedirect(target: string | undefined, fallback = '/'): string {
  if (!target) {
    return fallback;
  }
  const result = validateLocalRedirect(target);
  return result.ok ? result.safe : fallback;
}
