/**
 * @module version/parser
 * Parses loosely formatted folder names into {@link Version} values.
 *
 * A version prefix is one to four groups of decimal digits at the very start
 * of the string, separated by runs of the delimiter characters
 * `^ _ - . , ~` and space:
 *
 * - `2.1`, `2_1`, `02-01 hotfix`, `1--2` are all accepted
 * - `v2.1` is rejected (no leading digit)
 * - `1.2.3.4.5` is rejected (a fifth group is never truncated away)
 *
 * Anything after the recognized prefix is ignored, so `3.0 Release Notes`
 * parses as `3.0.0.0`.
 */

import { Version } from './version';
import { MalformedVersionError } from '../core/errors';

/** Maximum number of numeric groups in a version prefix */
const MAX_GROUPS = 4;

const DELIMITERS = new Set(['^', '_', '-', '.', ',', '~', ' ']);

/**
 * Attempts to parse a version prefix from `text`.
 *
 * @param text - Folder name or version string
 * @returns The parsed version, or `null` when `text` has no valid version prefix
 *
 * @example
 * ```typescript
 * TryParseVersion('01.02');     // Version 1.2.0.0
 * TryParseVersion('1.2.3.4.5'); // null
 * TryParseVersion('v1.2');      // null
 * ```
 */
export function TryParseVersion(text: string): Version | null {
  const groups: number[] = [];

  const first = readDigits(text, 0);
  if (first === null) {
    return null;
  }
  groups.push(first.Value);
  let position = first.End;

  for (;;) {
    const afterDelimiters = skipDelimiters(text, position);
    if (afterDelimiters === position) {
      break;
    }

    const next = readDigits(text, afterDelimiters);
    if (next === null) {
      // Trailing delimiters without a digit group are not part of the prefix
      break;
    }

    if (groups.length === MAX_GROUPS) {
      return null;
    }
    groups.push(next.Value);
    position = next.End;
  }

  if (groups.some((g) => !Number.isSafeInteger(g))) {
    return null;
  }

  const [major, minor = 0, build = 0, revision = 0] = groups;
  return new Version(major, minor, build, revision);
}

/**
 * Parses a version prefix from `text`, throwing when there is none.
 *
 * @throws MalformedVersionError if `text` does not start with a valid version prefix
 */
export function ParseVersion(text: string): Version {
  const parsed = TryParseVersion(text);
  if (parsed === null) {
    throw new MalformedVersionError(text);
  }
  return parsed;
}

interface DigitRun {
  Value: number;
  End: number;
}

function readDigits(text: string, start: number): DigitRun | null {
  let end = start;
  while (end < text.length && isDigit(text.charCodeAt(end))) {
    end++;
  }
  if (end === start) {
    return null;
  }
  // Leading zeros are insignificant: "007" is 7
  return { Value: Number(text.slice(start, end)), End: end };
}

function skipDelimiters(text: string, start: number): number {
  let end = start;
  while (end < text.length && DELIMITERS.has(text[end])) {
    end++;
  }
  return end;
}

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}
