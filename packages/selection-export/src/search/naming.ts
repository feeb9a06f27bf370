/**
 * Search naming
 *
 * Template substitution for output names and folders, and the derived
 * reference forms used in them.
 */

/** Characters that cannot appear in a file name */
const ILLEGAL_CHARACTERS = /[\\/:*?"<>|]/g;

export const DEFAULT_REPLACEMENT_CHARACTER = '_';

export interface SearchStrings {
  /** Search reference with `/` replaced */
  readonly reference: string;
  readonly siteName: string;
  readonly shortRef: string;
  readonly subref: string;
  /** Buffer size and unit, e.g. `500m` */
  readonly radius: string;
}

/**
 * Derive every template value from the raw search inputs
 */
export function searchStringsFor(
  searchRef: string,
  siteName: string,
  radius: string,
  replacement: string = DEFAULT_REPLACEMENT_CHARACTER
): SearchStrings {
  const reference = searchRef.split('/').join(replacement);
  const shortRef = keepNumbersAndSpaces(reference, replacement);
  return {
    reference,
    siteName: stripIllegals(siteName, replacement),
    shortRef,
    subref: subrefOf(shortRef, replacement),
    radius,
  };
}

/**
 * Replace `%ref%`, `%shortref%`, `%subref%`, `%sitename%` and `%radius%`,
 * ignoring case
 */
export function replaceSearchStrings(template: string, strings: SearchStrings): string {
  return template
    .replace(/%ref%/gi, strings.reference)
    .replace(/%shortref%/gi, strings.shortRef)
    .replace(/%subref%/gi, strings.subref)
    .replace(/%sitename%/gi, strings.siteName)
    .replace(/%radius%/gi, strings.radius);
}

export function stripIllegals(name: string, replacement: string = DEFAULT_REPLACEMENT_CHARACTER): string {
  return name.replace(ILLEGAL_CHARACTERS, replacement);
}

/**
 * Strip each segment of a path, keeping its separators and a drive prefix
 */
export function stripPathIllegals(path: string, replacement: string = DEFAULT_REPLACEMENT_CHARACTER): string {
  const drive = /^[A-Za-z]:/.exec(path)?.[0] ?? '';
  return (
    drive +
    path
      .slice(drive.length)
      .split(/([\\/])/)
      .map((segment) => (segment === '/' || segment === '\\' ? segment : stripIllegals(segment, replacement)))
      .join('')
      .trim()
  );
}

/**
 * Digits, spaces and the replacement character only
 */
export function keepNumbersAndSpaces(text: string, replacement: string = DEFAULT_REPLACEMENT_CHARACTER): string {
  return [...text].filter((ch) => /[0-9 ]/.test(ch) || ch === replacement).join('');
}

/**
 * Text after the last replacement character; the whole reference when
 * there is none
 */
export function subrefOf(shortRef: string, replacement: string = DEFAULT_REPLACEMENT_CHARACTER): string {
  const index = shortRef.lastIndexOf(replacement);
  return (index === -1 ? shortRef : shortRef.slice(index + replacement.length)).trim();
}

/**
 * Buffer layer name: prefix and radius, with dots replaced
 */
export function bufferLayerName(prefix: string, radius: string): string {
  return `${prefix}_${radius}`.split('.').join('_');
}
