/**
 * MIME Header Parser
 *
 * Parses the header blocks of stored messages and their parts into
 * `name: value` pairs, and Content-Type values into kind plus parameters.
 * Headers are never folded in this dialect, so each line is one header.
 *
 * @packageDocumentation
 */

import { FormatError } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';
import type { RawHeader } from '../types/message.js';

/**
 * Splits text at its first blank line
 *
 * @param text - Header block, blank line, then body
 * @returns The header block and the body; the body is undefined when there
 *   is no blank line
 */
export function splitHeaderBlock(text: string): { headerBlock: string; body: string | undefined } {
  const separatorMatch = text.match(/\r?\n\r?\n/);
  if (!separatorMatch || separatorMatch.index === undefined) {
    return { headerBlock: text, body: undefined };
  }
  return {
    headerBlock: text.substring(0, separatorMatch.index),
    body: text.substring(separatorMatch.index + separatorMatch[0].length),
  };
}

/**
 * Parses a header block into ordered name/value pairs
 *
 * @param headerBlock - Raw header block (one header per line)
 * @returns Pairs with lower-cased names and trimmed values
 */
export function parseHeaderBlock(headerBlock: string): Result<RawHeader[]> {
  const headers: RawHeader[] = [];

  // Split into lines (handle both CRLF and LF)
  for (const line of headerBlock.split(/\r?\n/)) {
    if (!line.trim()) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex <= 0) {
      return err(new FormatError('Header line has no name', line));
    }

    headers.push({
      name: line.substring(0, colonIndex).trim().toLowerCase(),
      value: line.substring(colonIndex + 1).trim(),
    });
  }

  return ok(headers);
}

/**
 * Finds the value of the first header with the given (lower-case) name
 */
export function findHeader(headers: readonly RawHeader[], name: string): string | undefined {
  return headers.find(header => header.name === name)?.value;
}

/**
 * Parses a Content-Type header value
 *
 * @param contentType - e.g. `text/plain; charset="utf-8"`
 * @returns The lower-cased `type/subtype` and its parameters
 */
export function parseContentType(contentType: string): Result<{
  kind: string;
  params: Record<string, string>;
}> {
  const params: Record<string, string> = {};

  // Split by semicolon to separate type from parameters
  const parts = contentType.split(';').map(p => p.trim());
  const kind = parts[0].toLowerCase();
  if (!/^[a-z0-9!#$&^_.+-]+\/[a-z0-9!#$&^_.+-]+$/.test(kind)) {
    return err(new FormatError(`Unparsable content type "${parts[0]}"`, contentType));
  }

  for (let i = 1; i < parts.length; i++) {
    const param = parts[i];
    if (param === '') continue;

    const eqIndex = param.indexOf('=');
    if (eqIndex <= 0) {
      return err(new FormatError(`Malformed content type parameter "${param}"`, contentType));
    }
    const name = param.substring(0, eqIndex).trim().toLowerCase();
    let value = param.substring(eqIndex + 1).trim();

    // Remove quotes if present
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }

    params[name] = value;
  }

  return ok({ kind, params });
}
