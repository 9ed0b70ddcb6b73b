import { InvalidUrlError, MissingHostError } from "../lib/api-errors.js";
import type { ThreadRef } from "./types.js";

// Generic URI grammar, RFC 3986 appendix B.
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;
const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*$/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
// reg-name (unreserved, sub-delims, pct-encoded, non-ASCII) or a bracketed IP
// literal, then an optional all-digit port.
const HOST_PATTERN =
  /^(?:\[[0-9A-Za-z:.%_~-]+\]|(?:[A-Za-z0-9\-._~!$&'()*+,;=]|%[0-9A-Fa-f]{2}|[^\x00-\x7f])*)(?::[0-9]*)?$/u;
const STRAY_PERCENT = /%(?![0-9A-Fa-f]{2})/;
const ESCAPE_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

/**
 * Derive the thread a URL belongs to. The host keeps its case and port and the
 * path is percent-decoded but otherwise untouched, so `/post` and `/post/` are
 * different threads.
 *
 * @throws InvalidUrlError when the URL does not parse.
 * @throws MissingHostError when it has no authority.
 */
export function parseThreadRef(rawUrl: string): ThreadRef {
  if (CONTROL_CHARS.test(rawUrl)) {
    throw new InvalidUrlError(rawUrl, "contains control characters");
  }

  const match = URI_PATTERN.exec(rawUrl);
  if (!match) {
    throw new InvalidUrlError(rawUrl, "not a URI");
  }

  const [, scheme, authority, rawPath = ""] = match;

  if (scheme !== undefined && !SCHEME_PATTERN.test(scheme)) {
    throw new InvalidUrlError(rawUrl, "invalid scheme");
  }

  const host = authority === undefined ? "" : stripUserinfo(authority);
  if (host === "") {
    throw new MissingHostError(rawUrl);
  }
  if (!HOST_PATTERN.test(host)) {
    throw new InvalidUrlError(rawUrl, "invalid host or port");
  }

  if (STRAY_PERCENT.test(rawPath)) {
    throw new InvalidUrlError(rawUrl, "invalid escape in path");
  }

  return { host, path: decodePath(rawPath) };
}

// Escaped bytes that are not valid UTF-8 decode to U+FFFD instead of failing.
function decodePath(rawPath: string): string {
  return rawPath.replace(ESCAPE_RUN, (run) =>
    Buffer.from(run.replaceAll("%", ""), "hex").toString("utf8"),
  );
}

function stripUserinfo(authority: string): string {
  const at = authority.lastIndexOf("@");
  return at === -1 ? authority : authority.slice(at + 1);
}

/** Printable form used in log lines, e.g. `example.com/post`. */
export function formatThreadRef(thread: ThreadRef): string {
  return `${thread.host}${thread.path}`;
}
