/**
 * Version strings in manifests are free-form; a custom integration must use
 * one of a handful of well-known schemes. Each strategy below recognises one.
 */

import { VersionParseError } from "@hearth/errors";
import * as semver from "semver";

export type VersionStrategy = "calver" | "semver" | "simplever" | "buildver" | "pep440";

/** Every strategy, in the order they are tried. */
export const ALL_VERSION_STRATEGIES: readonly VersionStrategy[] = [
  "calver",
  "semver",
  "simplever",
  "buildver",
  "pep440",
];

const CALVER = /^(?:\d{2}|\d{4})\.\d{1,2}(?:\.\d{1,2})?(?:\.?\d+)?(?:[.-]?[a-z]+\d*)?$/i;
const SIMPLEVER = /^v?\d+(?:\.\d+)*$/;
const BUILDVER = /^\d+$/;
const PEP440 =
  /^(?:[1-9]\d*!)?(?:0|[1-9]\d*)(?:\.(?:0|[1-9]\d*))*(?:(?:a|b|rc)(?:0|[1-9]\d*))?(?:\.post(?:0|[1-9]\d*))?(?:\.dev(?:0|[1-9]\d*))?$/;

const MATCHERS: Readonly<Record<VersionStrategy, (value: string) => boolean>> = {
  calver: (value) => CALVER.test(value),
  semver: (value) => semver.valid(value) !== null,
  simplever: (value) => SIMPLEVER.test(value),
  buildver: (value) => BUILDVER.test(value),
  pep440: (value) => PEP440.test(value),
};

export interface ParsedVersion {
  readonly raw: string;
  /** First strategy that accepted the string. */
  readonly strategy: VersionStrategy;
}

/**
 * Parse `value` against `strategies`, returning the first that matches.
 *
 * @throws {VersionParseError} when no strategy accepts the value
 */
export function parseVersion(
  value: string,
  strategies: readonly VersionStrategy[] = ALL_VERSION_STRATEGIES,
): ParsedVersion {
  const raw = value.trim();
  for (const strategy of strategies) {
    if (raw.length > 0 && MATCHERS[strategy](raw)) {
      return { raw, strategy };
    }
  }
  throw new VersionParseError(value, strategies);
}

/**
 * Compare two versions under semver rules, coercing loose forms such as
 * `2023.4` or `v3`. Returns undefined when either side cannot be coerced.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 | undefined {
  const left = semver.coerce(a);
  const right = semver.coerce(b);
  if (left === null || right === null) return undefined;
  return semver.compare(left, right);
}
