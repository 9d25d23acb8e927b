export interface CleanupArgs {
  days: number | undefined;
  dryRun: boolean;
}

/**
 * Parses `--days N` and `--dry-run`. Throws on anything else so a typo
 * never turns into a live purge with the default retention.
 */
export function parseCleanupArgs(argv: readonly string[]): CleanupArgs {
  const result: CleanupArgs = { days: undefined, dryRun: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--days': {
        const value = argv[++i];
        const days = Number(value);
        if (value === undefined || !Number.isInteger(days) || days < 1) {
          throw new Error('--days must be a positive integer');
        }
        result.days = days;
        break;
      }

      case '--dry-run':
        result.dryRun = true;
        break;

      default:
        throw new Error(`Unknown argument: ${arg ?? ''}`);
    }
  }

  return result;
}
