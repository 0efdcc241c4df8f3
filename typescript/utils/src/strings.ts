function trimToLength(value: string, maxLength: number) {
  if (!value) return '';
  const trimmed = value.trim();
  return trimmed.length > maxLength
    ? trimmed.substring(0, maxLength) + '...'
    : trimmed;
}

export function errorToString(error: unknown, maxLength = 300) {
  if (!error) return 'Unknown Error';
  if (typeof error === 'string') return trimToLength(error, maxLength);
  if (typeof error === 'number') return `Error code: ${error}`;
  if (error instanceof Error) return trimToLength(error.message, maxLength);
  return trimToLength(JSON.stringify(error), maxLength);
}

export function ensure0x(hexstr: string) {
  return hexstr.startsWith('0x') ? hexstr : `0x${hexstr}`;
}

export function strip0x(hexstr: string) {
  return hexstr.startsWith('0x') ? hexstr.slice(2) : hexstr;
}
