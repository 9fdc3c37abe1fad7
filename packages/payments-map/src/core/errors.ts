/**
 * Payments Map Error Types
 *
 * Data problems never raise: missing fields, unknown categories and
 * unplaced countries are defaulted or skipped. I/O errors propagate as the
 * underlying fs errors. The only custom error covers invalid configuration.
 */

/**
 * Error thrown when a config file or environment override is invalid
 *
 * RECOVERY:
 * - Fix the listed issues in the config file
 * - Or pass --config to point at a different file
 */
export class ConfigError extends Error {
  /**
   * @param configPath - Config file that failed, null for environment values
   * @param issues - One line per invalid setting
   */
  constructor(
    message: string,
    public readonly configPath: string | null,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }

  getSummary(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue}`);
    }
    return lines.join('\n');
  }
}
