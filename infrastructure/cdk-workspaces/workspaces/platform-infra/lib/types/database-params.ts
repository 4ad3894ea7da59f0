/**
 * Aurora MySQL Serverless v2 Parameters
 */
export interface DatabaseParams {
  /**
   * Minimum Aurora capacity units (0.5 ACU steps)
   */
  readonly minCapacity: number;

  /**
   * Maximum Aurora capacity units (0.5 ACU steps)
   */
  readonly maxCapacity: number;

  /**
   * Number of reader instances next to the writer.
   * Must be at least 1 when multiAz is set.
   */
  readonly readerCount: number;

  readonly backupRetentionDays: number;

  /**
   * Daily backup window in UTC, `hh24:mi-hh24:mi`
   */
  readonly preferredBackupWindow: string;

  readonly deletionProtection: boolean;
  readonly multiAz: boolean;
  readonly enablePerformanceInsights: boolean;
}
