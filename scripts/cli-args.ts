/**
 * Minimal flag parsing shared by the scripts: `--flag value` and bare `--switch`.
 */

export function getArgValue(flag: string, argv: readonly string[] = process.argv): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  const value = argv[idx + 1];
  // Negative numbers are values, not flags
  if (value === undefined || (value.startsWith('-') && !/^-\d/.test(value))) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

export function requireArg(flag: string, argv: readonly string[] = process.argv): string {
  const value = getArgValue(flag, argv);
  if (value === undefined) {
    throw new Error(`${flag} is required`);
  }
  return value;
}

export function getIntArg(flag: string, fallback: number, argv: readonly string[] = process.argv): number {
  const value = getArgValue(flag, argv);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

export function getFloatArg(flag: string, fallback: number, argv: readonly string[] = process.argv): number {
  const value = getArgValue(flag, argv);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

export function hasFlag(flag: string, argv: readonly string[] = process.argv): boolean {
  return argv.includes(flag);
}

export function getChoiceArg<T extends string>(
  flag: string,
  choices: readonly T[],
  fallback: T,
  argv: readonly string[] = process.argv
): T {
  const value = getArgValue(flag, argv);
  if (value === undefined) return fallback;
  const match = choices.find(choice => choice === value);
  if (!match) {
    throw new Error(`${flag} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}
