/**
 * Parser for comma-separated package specifier strings.
 */
import { InvalidSpecError, ErrorCodes } from '../../utils/errors.js';
import { VERSION_OPERATORS, type PackageRequirement, type VersionOperator } from './types.js';

// Starts and ends alphanumeric, so a name never reads as a command-line option
const NAME_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9_.-]*[A-Za-z0-9])?$/;
const OPERATOR_CHARS = /[=<>~!]/;

// Release segments, optional pre/post/dev parts and a local label
const VERSION_PATTERN =
  /^v?(?:\d+!)?\d+(?:\.\d+)*(?:[-_.]?(?:a|b|c|rc|alpha|beta|pre|preview)[-_.]?\d*)?(?:(?:[-_.]?(?:post|rev|r)[-_.]?\d*)|-\d+)?(?:[-_.]?dev[-_.]?\d*)?(?:\+[a-z0-9]+(?:[-_.][a-z0-9]+)*)?$/i;
const WILDCARD_PATTERN = /^v?(?:\d+!)?\d+(?:\.\d+)*\.\*$/i;

/**
 * Normalize a package name for duplicate detection:
 * case-insensitive, underscores and hyphens equivalent.
 */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/_/g, '-');
}

/**
 * Check a version string against the rules for its operator.
 */
export function isValidVersion(version: string, operator: VersionOperator): boolean {
  if (WILDCARD_PATTERN.test(version)) {
    return operator === '==' || operator === '!=';
  }
  if (!VERSION_PATTERN.test(version)) {
    return false;
  }
  if (operator === '~=') {
    // Compatible release needs at least two release segments
    const release = version.replace(/^v?(?:\d+!)?/i, '').match(/^\d+(?:\.\d+)*/);
    return release !== null && release[0].split('.').length >= 2;
  }
  return true;
}

function matchOperator(text: string): VersionOperator | undefined {
  return VERSION_OPERATORS.find((op) => text.startsWith(op));
}

/**
 * Parse a single specifier token like `boto3>=1.26.1`.
 */
export function parseRequirement(token: string): PackageRequirement {
  const trimmed = token.trim();
  const opIndex = trimmed.search(OPERATOR_CHARS);
  const name = (opIndex === -1 ? trimmed : trimmed.slice(0, opIndex)).trim();

  if (!name || !NAME_PATTERN.test(name)) {
    throw new InvalidSpecError(
      ErrorCodes.INVALID_NAME,
      `Invalid package name in "${trimmed}": names must start and end with a letter or digit and may only contain letters, digits, ".", "_" and "-"`,
      { token: trimmed }
    );
  }

  if (opIndex === -1) {
    return { name };
  }

  const rest = trimmed.slice(opIndex);
  const operator = matchOperator(rest);
  if (!operator) {
    throw new InvalidSpecError(
      ErrorCodes.INVALID_OPERATOR,
      `Unrecognized version operator in "${trimmed}". Use one of: ${VERSION_OPERATORS.join(' ')}`,
      { token: trimmed }
    );
  }

  const version = rest.slice(operator.length).trim();
  if (!version) {
    throw new InvalidSpecError(
      ErrorCodes.INVALID_VERSION,
      `Missing version after "${operator}" in "${trimmed}"`,
      { token: trimmed, package: name }
    );
  }
  if (!isValidVersion(version, operator)) {
    throw new InvalidSpecError(
      ErrorCodes.INVALID_VERSION,
      `Malformed version "${version}" for ${name}${operator}`,
      { token: trimmed, package: name, version }
    );
  }

  return { name, operator, version };
}

/**
 * Parse a comma-separated specifier string into requirements, preserving input order.
 *
 * @example
 * parseRequirements('boto3>=1.26.1,requests')
 * // [{ name: 'boto3', operator: '>=', version: '1.26.1' }, { name: 'requests' }]
 */
export function parseRequirements(spec: string): PackageRequirement[] {
  if (!spec || !spec.trim()) {
    throw new InvalidSpecError(ErrorCodes.EMPTY_SPEC, 'Package string cannot be empty');
  }

  const tokens = spec.split(',');
  const seen = new Map<string, string>();
  const requirements: PackageRequirement[] = [];

  tokens.forEach((token, index) => {
    if (!token.trim()) {
      throw new InvalidSpecError(
        ErrorCodes.EMPTY_TOKEN,
        `Empty package entry at position ${index + 1}`,
        { position: index + 1 }
      );
    }

    const requirement = parseRequirement(token);
    const key = normalizePackageName(requirement.name);
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new InvalidSpecError(
        ErrorCodes.DUPLICATE_PACKAGE,
        `Duplicate package "${requirement.name}" (already listed as "${previous}")`,
        { package: key }
      );
    }
    seen.set(key, requirement.name);
    requirements.push(Object.freeze(requirement));
  });

  return requirements;
}

/**
 * Render a requirement back into installer form: `name<op><version>` or `name`.
 */
export function formatRequirement(requirement: PackageRequirement): string {
  return requirement.operator && requirement.version
    ? `${requirement.name}${requirement.operator}${requirement.version}`
    : requirement.name;
}
