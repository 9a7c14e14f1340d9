/**
 * Metric name handling for the plaintext protocol.
 */

export interface NameAndTags {
  /** Dotted metric name used as the path component */
  name: string;
  /** Tag suffix including its leading semicolon, or empty */
  tags: string;
}

/**
 * Split a raw metric name into its path and tag suffix.
 *
 * `disk.used;datacenter=dc1;rack=a1` yields `disk.used` and
 * `;datacenter=dc1;rack=a1`. Only the first semicolon splits; the suffix is
 * carried verbatim.
 *
 * @see https://graphite.readthedocs.io/en/latest/tags.html
 */
export function splitNameAndTags(raw: string): NameAndTags {
  const index = raw.indexOf(';');
  if (index === -1) {
    return { name: raw, tags: '' };
  }
  return { name: raw.slice(0, index), tags: raw.slice(index) };
}

/**
 * Field key for a percentile fraction: `p * 100` in its shortest decimal
 * form with the first `.` removed (0.5 -> `50`, 0.999 -> `999`).
 */
export function percentileKey(fraction: number): string {
  return formatShortestDecimal(fraction * 100).replace('.', '');
}

/**
 * Shortest round-trip decimal rendering, never in exponent notation.
 */
export function formatShortestDecimal(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const [, sign = '', lead = '', fraction = '', exp = '0'] = match;
  const exponent = Number(exp);
  const digits = lead + fraction;

  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  if (digits.length > exponent + 1) {
    return `${sign}${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`;
  }
  return `${sign}${digits.padEnd(exponent + 1, '0')}`;
}
