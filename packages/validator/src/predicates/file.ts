import type { UploadedFile } from '../shape/field-value.js';

const KILOBYTE = 1024;
const MEGABYTE = KILOBYTE * 1024;
const GIGABYTE = MEGABYTE * 1024;

export const IMAGE_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'webp'];

const FILE_SIZE_PATTERN = /^([1-9]|[1-9][0-9]+)(kb|KB|mb|MB|gb|GB|tb|TB)$/;

export type SizeUnit = 'kb' | 'mb' | 'gb' | 'tb';

export interface SizeLimit {
  /** Amount as written in the rule, e.g. `2` for `2mb` */
  amount: string;
  unit: SizeUnit;
  /** Byte limit; undefined for `tb`, which computes no limit */
  bytes: number | undefined;
}

function toUnit(symbol: string): SizeUnit | undefined {
  switch (symbol.toLowerCase()) {
    case 'kb':
      return 'kb';
    case 'mb':
      return 'mb';
    case 'gb':
      return 'gb';
    case 'tb':
      return 'tb';
    default:
      return undefined;
  }
}

const MULTIPLIERS: Record<SizeUnit, number | undefined> = {
  kb: KILOBYTE,
  mb: MEGABYTE,
  gb: GIGABYTE,
  // accepted by the grammar, but there is no terabyte multiplier
  tb: undefined,
};

/**
 * Parse `amount(kb|mb|gb|tb)`. Returns undefined when the parameter does not
 * follow the grammar.
 */
export function parseSizeLimit(param: string): SizeLimit | undefined {
  const [, amount, symbol] = FILE_SIZE_PATTERN.exec(param) ?? [];
  const unit = symbol === undefined ? undefined : toUnit(symbol);
  if (amount === undefined || unit === undefined) {
    return undefined;
  }

  const multiplier = MULTIPLIERS[unit];
  return { amount, unit, bytes: multiplier === undefined ? undefined : Number(amount) * multiplier };
}

/** Violates only when the file is strictly larger than the limit. */
export function isOverSizeLimit(size: number, limit: SizeLimit): boolean {
  return limit.bytes !== undefined && limit.bytes > 0 && size > limit.bytes;
}

/**
 * Extension list from a rule parameter, normalized for comparison.
 */
export function parseExtensions(params: readonly string[]): string[] {
  return params.map((ext) => ext.trim().replace(/^\./, '').toLowerCase()).filter((ext) => ext.length > 0);
}

export function isNotAllowedExtension(detected: string | undefined, allowed: readonly string[]): boolean {
  if (detected === undefined) {
    return true;
  }
  return !allowed.includes(detected.trim().replace(/^\./, '').toLowerCase());
}

export async function isNotReadable(file: UploadedFile): Promise<boolean> {
  try {
    await file.read();
    return false;
  } catch {
    return true;
  }
}
