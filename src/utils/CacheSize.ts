import safeStringify from 'fast-safe-stringify';

/**
 * Helpers for the optional byte budget of the response cache
 */

const SIZE_UNITS: Record<string, number> = {
  'b': 1,
  'kb': 1000,
  'mb': 1000 * 1000,
  'gb': 1000 * 1000 * 1000,
  'kib': 1024,
  'mib': 1024 * 1024,
  'gib': 1024 * 1024 * 1024
};

/**
 * Parse a size string and return the size in bytes
 *
 * @param sizeStr - Size string (e.g., '300', '3kb', '5MB', '2GiB')
 * @throws Error if the size string is invalid
 */
export function parseSizeString(sizeStr: string): number {
  const trimmed = sizeStr.trim();
  if (trimmed.length === 0) {
    throw new Error('Size string must be a non-empty string');
  }

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.floor(parseFloat(trimmed));
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*([a-zA-Z]+)$/);
  if (!match) {
    throw new Error(`Invalid size format: ${sizeStr}. Expected format: '100', '5KB', '10MB', etc.`);
  }

  const [, valueStr, unitStr] = match;
  const multiplier = SIZE_UNITS[unitStr.toLowerCase()];
  if (typeof multiplier === 'undefined') {
    throw new Error(`Unsupported size unit: ${unitStr}. Supported units: ${Object.keys(SIZE_UNITS).join(', ')}`);
  }

  return Math.floor(parseFloat(valueStr) * multiplier);
}

/**
 * Format bytes as a human-readable string
 *
 * @param binary - Use binary units (1024) instead of decimal (1000)
 */
export function formatBytes(bytes: number, binary: boolean = false): string {
  if (bytes === 0) return '0 B';
  if (bytes < 0) return `${bytes} B`;

  const k = binary ? 1024 : 1000;
  const sizes = binary
    ? ['B', 'KiB', 'MiB', 'GiB', 'TiB']
    : ['B', 'KB', 'MB', 'GB', 'TB'];

  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  const size = bytes / Math.pow(k, i);
  const formatted = size % 1 === 0 ? size.toString() : size.toFixed(1);

  return `${formatted} ${sizes[i]}`;
}

/**
 * Approximate in-memory size of a cached response payload.
 * Strings count 2 bytes per character; objects are measured through their
 * serialized form, which tolerates circular references.
 */
export function estimateValueSize(value: unknown): number {
  if (value === null || typeof value === 'undefined') {
    return 8;
  }

  switch (typeof value) {
    case 'boolean':
      return 4;
    case 'number':
      return 8;
    case 'string':
      return value.length * 2;
    case 'object':
      if (Array.isArray(value)) {
        return value.reduce((total: number, item: unknown) => total + estimateValueSize(item), 24);
      }
      return safeStringify(value).length * 2 + 16;
    default:
      return 32;
  }
}

/**
 * @throws Error if maxSizeBytes does not parse to a positive size
 */
export function validateSizeConfig(config: { maxSizeBytes?: string }): void {
  if (typeof config.maxSizeBytes === 'undefined') {
    return;
  }
  let bytes: number;
  try {
    bytes = parseSizeString(config.maxSizeBytes);
  } catch (error) {
    throw new Error(`Invalid maxSizeBytes: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
  if (bytes <= 0) {
    throw new Error('Invalid maxSizeBytes: must be positive');
  }
}
